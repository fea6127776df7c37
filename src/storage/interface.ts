import type { Readable } from "node:stream";

export type NodeKind = "file" | "directory";

/**
 * A node record as returned by the store.
 * Only `id` is always present; other fields appear when requested.
 */
export interface StoreNode {
  id: string;
  name?: string;
  kind?: NodeKind;
  size?: number;
  /** RFC 3339 timestamp. */
  createdTime?: string;
  /** RFC 3339 timestamp. */
  modifiedTime?: string;
  parents?: string[];
  /** Lowercase hex digest of the content, files only. */
  md5Checksum?: string;
  trashed?: boolean;
}

export type NodeField = keyof StoreNode;

/** Partial update applied by a single store call. */
export interface NodePatch {
  name?: string;
  trashed?: boolean;
  addParents?: string[];
  removeParents?: string[];
}

export interface LookupOptions {
  /** Search trashed children instead of live ones. */
  trashed?: boolean;
}

/**
 * Backing object store: a flat set of nodes joined by multi-parent links.
 *
 * The drive depends only on this interface, never on a concrete backend.
 * Names are not unique within a parent and nothing is deduplicated.
 */
export interface ObjectStore {
  // ── Lifecycle ──────────────────────────────────────────────

  /** Gracefully close connections. */
  close(): Promise<void>;

  // ── Queries ────────────────────────────────────────────────

  /** The store's own top-level directory. */
  getRoot(fields: readonly NodeField[]): Promise<StoreNode>;

  /** Get a node by id. Rejects if the id is unknown. */
  get(id: string, fields: readonly NodeField[]): Promise<StoreNode>;

  /** Children of `parentId` whose name is exactly `name`. */
  lookup(
    parentId: string,
    name: string,
    fields: readonly NodeField[],
    opts?: LookupOptions,
  ): Promise<StoreNode[]>;

  /** Non-trashed direct children of a node. */
  list(parentId: string, fields: readonly NodeField[]): Promise<StoreNode[]>;

  /** Every explicitly trashed node, regardless of where it lives. */
  listTrashed(fields: readonly NodeField[]): Promise<StoreNode[]>;

  // ── Mutations ──────────────────────────────────────────────

  /** Create an empty node. Never checks for an existing sibling of that name. */
  create(
    parentId: string,
    name: string,
    kind: NodeKind,
    fields: readonly NodeField[],
  ): Promise<StoreNode>;

  /** Apply a patch atomically. */
  update(
    id: string,
    patch: NodePatch,
    fields: readonly NodeField[],
  ): Promise<StoreNode>;

  /** Delete a node and all of its descendants. */
  delete(id: string): Promise<void>;

  // ── Content ────────────────────────────────────────────────

  download(id: string): Promise<Readable>;

  /** Create a new file node from a stream. A store may buffer the whole stream first. */
  upload(
    parentId: string,
    name: string,
    content: Readable,
    fields: readonly NodeField[],
  ): Promise<StoreNode>;

  /** Replace the content of an existing file node. May buffer like `upload`. */
  replaceContent(
    id: string,
    content: Readable,
    fields: readonly NodeField[],
  ): Promise<StoreNode>;
}
