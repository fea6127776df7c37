import crypto from "node:crypto";
import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import type {
  LookupOptions,
  NodeField,
  NodeKind,
  NodePatch,
  ObjectStore,
  StoreNode,
} from "./interface.js";

export const MEMORY_ROOT_ID = "root";

interface MemoryEntry {
  id: string;
  name: string;
  kind: NodeKind;
  content: Buffer;
  parents: string[];
  trashed: boolean;
  createdAt: Date;
  modifiedAt: Date;
}

function project(entry: MemoryEntry, fields: readonly NodeField[]): StoreNode {
  const node: StoreNode = { id: entry.id };
  for (const field of fields) {
    switch (field) {
      case "id":
        break;
      case "name":
        node.name = entry.name;
        break;
      case "kind":
        node.kind = entry.kind;
        break;
      case "size":
        if (entry.kind === "file") node.size = entry.content.byteLength;
        break;
      case "createdTime":
        node.createdTime = entry.createdAt.toISOString();
        break;
      case "modifiedTime":
        node.modifiedTime = entry.modifiedAt.toISOString();
        break;
      case "parents":
        node.parents = [...entry.parents];
        break;
      case "md5Checksum":
        if (entry.kind === "file") {
          node.md5Checksum = crypto.createHash("md5").update(entry.content).digest("hex");
        }
        break;
      case "trashed":
        node.trashed = entry.trashed;
        break;
    }
  }
  return node;
}

/**
 * Process-local object store with the same multi-parent semantics as the
 * Postgres store. Nothing survives the process.
 */
export class MemoryStore implements ObjectStore {
  private entries = new Map<string, MemoryEntry>();

  constructor() {
    const now = new Date();
    this.entries.set(MEMORY_ROOT_ID, {
      id: MEMORY_ROOT_ID,
      name: "My Drive",
      kind: "directory",
      content: Buffer.alloc(0),
      parents: [],
      trashed: false,
      createdAt: now,
      modifiedAt: now,
    });
  }

  // ── Lifecycle ──────────────────────────────────────────────

  async close(): Promise<void> {
    this.entries.clear();
  }

  // ── Internal ───────────────────────────────────────────────

  private entry(id: string): MemoryEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new Error(`File not found: ${id}`);
    }
    return entry;
  }

  private insert(parentId: string, name: string, kind: NodeKind, content: Buffer): MemoryEntry {
    this.entry(parentId);
    const now = new Date();
    const entry: MemoryEntry = {
      id: crypto.randomUUID(),
      name,
      kind,
      content,
      parents: [parentId],
      trashed: false,
      createdAt: now,
      modifiedAt: now,
    };
    this.entries.set(entry.id, entry);
    return entry;
  }

  // ── Queries ────────────────────────────────────────────────

  async getRoot(fields: readonly NodeField[]): Promise<StoreNode> {
    return project(this.entry(MEMORY_ROOT_ID), fields);
  }

  async get(id: string, fields: readonly NodeField[]): Promise<StoreNode> {
    return project(this.entry(id), fields);
  }

  async lookup(
    parentId: string,
    name: string,
    fields: readonly NodeField[],
    opts?: LookupOptions,
  ): Promise<StoreNode[]> {
    const trashed = opts?.trashed ?? false;
    return [...this.entries.values()]
      .filter((e) => e.parents.includes(parentId) && e.name === name && e.trashed === trashed)
      .map((e) => project(e, fields));
  }

  async list(parentId: string, fields: readonly NodeField[]): Promise<StoreNode[]> {
    return [...this.entries.values()]
      .filter((e) => e.parents.includes(parentId) && !e.trashed)
      .map((e) => project(e, fields));
  }

  async listTrashed(fields: readonly NodeField[]): Promise<StoreNode[]> {
    return [...this.entries.values()]
      .filter((e) => e.trashed)
      .map((e) => project(e, fields));
  }

  // ── Mutations ──────────────────────────────────────────────

  async create(
    parentId: string,
    name: string,
    kind: NodeKind,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    return project(this.insert(parentId, name, kind, Buffer.alloc(0)), fields);
  }

  async update(
    id: string,
    patch: NodePatch,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    const entry = this.entry(id);
    // Nothing changes unless every added parent exists.
    for (const parentId of patch.addParents ?? []) {
      this.entry(parentId);
    }

    const removed = new Set(patch.removeParents ?? []);
    const parents = entry.parents.filter((p) => !removed.has(p));
    for (const parentId of patch.addParents ?? []) {
      if (!parents.includes(parentId)) parents.push(parentId);
    }

    entry.parents = parents;
    if (patch.name !== undefined) entry.name = patch.name;
    if (patch.trashed !== undefined) entry.trashed = patch.trashed;
    entry.modifiedAt = new Date();
    return project(entry, fields);
  }

  async delete(id: string): Promise<void> {
    this.entry(id);
    const doomed = new Set([id]);
    let grew = true;
    while (grew) {
      grew = false;
      for (const e of this.entries.values()) {
        if (!doomed.has(e.id) && e.parents.some((p) => doomed.has(p))) {
          doomed.add(e.id);
          grew = true;
        }
      }
    }
    for (const doomedId of doomed) {
      this.entries.delete(doomedId);
    }
  }

  // ── Content ────────────────────────────────────────────────

  async download(id: string): Promise<Readable> {
    const entry = this.entry(id);
    if (entry.kind === "directory") {
      throw new Error(`Cannot download a directory: ${id}`);
    }
    return Readable.from([Buffer.from(entry.content)]);
  }

  async upload(
    parentId: string,
    name: string,
    content: Readable,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    this.entry(parentId);
    const data = await buffer(content);
    return project(this.insert(parentId, name, "file", data), fields);
  }

  async replaceContent(
    id: string,
    content: Readable,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    const entry = this.entry(id);
    if (entry.kind === "directory") {
      throw new Error(`Cannot upload content to a directory: ${id}`);
    }
    entry.content = await buffer(content);
    entry.modifiedAt = new Date();
    return project(entry, fields);
  }
}
