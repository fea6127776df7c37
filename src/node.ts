import assert from "node:assert/strict";
import type { NodeField, NodeKind, StoreNode } from "./storage/interface.js";
import { joinPath, sanitizeName } from "./paths.js";

export const ID_FIELDS: readonly NodeField[] = ["id"];

export const NODE_FIELDS: readonly NodeField[] = [
  "id",
  "name",
  "kind",
  "size",
  "createdTime",
  "modifiedTime",
];

export const TRASH_FIELDS: readonly NodeField[] = [...NODE_FIELDS, "parents"];

/** Fields needed to walk the ancestor chain of a node. */
export const ANCESTOR_FIELDS: readonly NodeField[] = ["id", "name", "parents"];

export interface NodeJson {
  id: string;
  name: string;
  path: string;
  type: NodeKind;
  size: number;
  createdTime: string;
  modifiedTime: string;
}

function parseTimestamp(label: string, value: string | undefined): Date {
  assert.ok(value !== undefined, `${label} was not fetched`);
  const t = new Date(value);
  assert.ok(!Number.isNaN(t.getTime()), `unable to parse ${label} (\`${value}')`);
  return t;
}

/**
 * Immutable snapshot of one remote entry.
 *
 * `parentPath` is relative to the root that was configured when the node
 * was resolved; it is never stored remotely and is not valid across roots.
 */
export class DriveNode {
  private constructor(
    private readonly record: Readonly<StoreNode>,
    readonly parentPath: string,
    readonly isRoot: boolean,
  ) {}

  static of(record: StoreNode, parentPath: string): DriveNode {
    return new DriveNode({ ...record }, parentPath, false);
  }

  /** The configured root: its path is always empty. */
  static root(record: StoreNode): DriveNode {
    return new DriveNode({ ...record }, "", true);
  }

  /** The same record, re-anchored as a root. */
  asRoot(): DriveNode {
    return this.isRoot ? this : new DriveNode(this.record, "", true);
  }

  get id(): string {
    return this.record.id;
  }

  get name(): string {
    assert.ok(this.record.name !== undefined, `name of ${this.id} was not fetched`);
    return sanitizeName(this.record.name);
  }

  get path(): string {
    return this.isRoot ? "" : joinPath(this.parentPath, this.name);
  }

  get kind(): NodeKind {
    assert.ok(this.record.kind !== undefined, `kind of ${this.id} was not fetched`);
    return this.record.kind;
  }

  isDirectory(): boolean {
    return this.kind === "directory";
  }

  get size(): number {
    return this.record.size ?? 0;
  }

  get createdTime(): Date {
    return parseTimestamp("createdTime", this.record.createdTime);
  }

  get modifiedTime(): Date {
    return parseTimestamp("modifiedTime", this.record.modifiedTime);
  }

  get parents(): readonly string[] {
    return this.record.parents ?? [];
  }

  /** Extra parents are store-level noise; the first one is the logical parent. */
  get parentId(): string | undefined {
    return this.parents[0];
  }

  get md5Checksum(): string | undefined {
    return this.record.md5Checksum;
  }

  toJSON(): NodeJson {
    return {
      id: this.id,
      name: this.isRoot ? "" : this.name,
      path: this.path,
      type: this.kind,
      size: this.size,
      createdTime: this.createdTime.toISOString(),
      modifiedTime: this.modifiedTime.toISOString(),
    };
  }
}
