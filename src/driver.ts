import { Readable } from "node:stream";
import type { ObjectStore } from "./storage/index.js";
import { DriveError, NotFoundError } from "./errors.js";
import { ReadHandle, WriteHandle, type FileHandle, type OpenMode } from "./file.js";
import { TreeMutator, type PutOptions, type VisitFn } from "./mutator.js";
import { DriveNode, NODE_FIELDS } from "./node.js";
import { PathError, joinPath, validatePath } from "./paths.js";
import { PathResolver } from "./resolver.js";

export const HASH_METHODS = ["md5"] as const;
export type HashMethod = (typeof HASH_METHODS)[number];

export type FileContent = Readable | Uint8Array | string;

export interface DriverOptions {
  /** Directory all paths are resolved against. Defaults to the store's root. */
  rootDirectory?: string;
}

export interface GetResult {
  node: DriveNode;
  content: Readable;
}

export interface HashResult {
  node: DriveNode;
  hash: Buffer;
}

function isHashMethod(method: string): method is HashMethod {
  return HASH_METHODS.some((m) => m === method);
}

function toReadable(content: FileContent): Readable {
  if (content instanceof Readable) return content;
  const data = typeof content === "string" ? Buffer.from(content) : Buffer.from(content);
  return Readable.from([data]);
}

/**
 * Folder/file paths over a flat, multi-parent object store.
 *
 * Holds one piece of state, the root node, which `setRootDirectory`
 * replaces wholesale. Each operation reads it once when it starts.
 */
export class Driver {
  private readonly resolver: PathResolver;
  private readonly mutator: TreeMutator;

  private constructor(
    private readonly store: ObjectStore,
    private rootNode: DriveNode,
  ) {
    this.resolver = new PathResolver(store);
    this.mutator = new TreeMutator(store, this.resolver);
  }

  static async create(store: ObjectStore, opts: DriverOptions = {}): Promise<Driver> {
    const driver = new Driver(store, DriveNode.root(await store.getRoot(NODE_FIELDS)));
    if (opts.rootDirectory) {
      await driver.setRootDirectory(opts.rootDirectory);
    }
    return driver;
  }

  get root(): DriveNode {
    return this.rootNode;
  }

  private parts(path: string): string[] {
    try {
      return validatePath(path);
    } catch (e) {
      if (e instanceof PathError) throw new DriveError("EINVAL", e.message);
      throw e;
    }
  }

  // ── Operations ─────────────────────────────────────────────

  /** Change the working root. `path` is absolute from the store's own root. */
  async setRootDirectory(path: string): Promise<DriveNode> {
    const parts = this.parts(path);
    const top = DriveNode.root(await this.store.getRoot(NODE_FIELDS));
    const node = await this.resolver.resolve(top, parts, NODE_FIELDS);
    if (!node.isDirectory()) {
      throw new DriveError("ENOTDIR", `\`${joinPath(...parts)}' is not a directory`);
    }
    this.rootNode = node.asRoot();
    return this.rootNode;
  }

  async stat(path: string): Promise<DriveNode> {
    return this.resolver.resolve(this.rootNode, this.parts(path), NODE_FIELDS);
  }

  async list(path: string, visit: VisitFn): Promise<void> {
    await this.mutator.list(this.rootNode, this.parts(path), visit);
  }

  /** Like `mkdir -p`: missing directories are created, existing ones reused. */
  async makeDirectory(path: string): Promise<DriveNode> {
    return this.mutator.makeDirectoryByParts(this.rootNode, this.parts(path));
  }

  async delete(path: string): Promise<void> {
    await this.mutator.delete(this.rootNode, this.parts(path));
  }

  async deleteDirectory(path: string): Promise<void> {
    await this.mutator.deleteDirectory(this.rootNode, this.parts(path));
  }

  async get(path: string): Promise<GetResult> {
    const parts = this.parts(path);
    const node = await this.resolver.resolve(this.rootNode, parts, NODE_FIELDS);
    if (node.isDirectory()) {
      throw new DriveError("EISDIR", `\`${joinPath(...parts)}' is a directory`);
    }
    const content = await this.store.download(node.id);
    return { node, content };
  }

  async getHash(path: string, method: string): Promise<HashResult> {
    if (!isHashMethod(method)) {
      throw new DriveError("EINVAL", `unsupported hash method: ${method}`);
    }
    const parts = this.parts(path);
    const node = await this.resolver.resolve(this.rootNode, parts, [
      ...NODE_FIELDS,
      "md5Checksum",
    ]);
    if (node.isDirectory()) {
      throw new DriveError("EISDIR", `\`${joinPath(...parts)}' is a directory`);
    }
    return { node, hash: Buffer.from(node.md5Checksum ?? "", "hex") };
  }

  async put(path: string, content: FileContent, opts?: PutOptions): Promise<DriveNode> {
    return this.mutator.putFile(this.rootNode, this.parts(path), toReadable(content), opts);
  }

  async rename(path: string, newName: string): Promise<DriveNode> {
    return this.mutator.rename(this.rootNode, this.parts(path), newName);
  }

  async move(oldPath: string, newPath: string): Promise<DriveNode> {
    return this.mutator.move(this.rootNode, this.parts(oldPath), this.parts(newPath));
  }

  async trash(path: string): Promise<void> {
    await this.mutator.trash(this.rootNode, this.parts(path));
  }

  async restore(path: string): Promise<DriveNode> {
    return this.mutator.restore(this.rootNode, this.parts(path));
  }

  async listTrash(scopePath: string, visit: VisitFn): Promise<void> {
    await this.mutator.listTrash(this.rootNode, this.parts(scopePath), visit);
  }

  /**
   * Open a file for streaming. Nothing is transferred until the first
   * read or write; a write handle's `close` reports the upload result.
   */
  async open(path: string, mode: OpenMode): Promise<FileHandle> {
    const parts = this.parts(path);
    const root = this.rootNode;

    let node: DriveNode | null;
    try {
      node = await this.resolver.resolve(root, parts, NODE_FIELDS);
    } catch (e) {
      if (mode !== "create" || !(e instanceof NotFoundError)) throw e;
      node = null;
    }

    if (!node) {
      return new WriteHandle(null, (content) => this.mutator.putFile(root, parts, content));
    }
    if (node.isDirectory()) {
      throw new DriveError("EISDIR", `\`${joinPath(...parts)}' is a directory`);
    }

    const target = node;
    if (mode === "read") {
      return new ReadHandle(target, () => this.store.download(target.id));
    }
    return new WriteHandle(target, (content) => this.mutator.replaceContent(target, content));
  }
}
