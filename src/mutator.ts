import type { Readable } from "node:stream";
import type { ObjectStore } from "./storage/index.js";
import { CallbackError, DriveError, NotFoundError } from "./errors.js";
import { DriveNode, ID_FIELDS, NODE_FIELDS, TRASH_FIELDS } from "./node.js";
import { joinNames, joinPath, sanitizeName, splitPath } from "./paths.js";
import { PathResolver, single } from "./resolver.js";

/** Called once per listed node. A throw aborts the listing. */
export type VisitFn = (node: DriveNode) => void | Promise<void>;

export interface PutOptions {
  /** Replace the content of an existing file leaf instead of adding a sibling. */
  overwrite?: boolean;
}

async function visitOrWrap(visit: VisitFn, node: DriveNode): Promise<void> {
  try {
    await visit(node);
  } catch (err) {
    throw new CallbackError(err);
  }
}

/**
 * Tree operations on top of the resolver. Every method takes the root it
 * runs against, so one operation never sees two roots.
 */
export class TreeMutator {
  constructor(
    private store: ObjectStore,
    private resolver: PathResolver,
  ) {}

  /** Resolve each segment, creating directories for the missing ones. */
  async makeDirectoryByParts(root: DriveNode, parts: readonly string[]): Promise<DriveNode> {
    let current = root;
    for (let i = 0; i < parts.length; i++) {
      const parentPath = joinNames(parts.slice(0, i));
      const name = sanitizeName(parts[i]);
      const matches = await this.store.lookup(current.id, name, NODE_FIELDS);
      const match = single(matches, joinPath(...parts.slice(0, i + 1)));

      if (match) {
        current = DriveNode.of(match, parentPath);
        continue;
      }
      if (!current.isDirectory()) {
        throw new DriveError(
          "ENOTDIR",
          `unable to create directory in \`${parentPath}': \`${current.name}' is not a directory`,
        );
      }
      const created = await this.store.create(current.id, name, "directory", NODE_FIELDS);
      current = DriveNode.of(created, parentPath);
    }
    return current;
  }

  /** The directory that will hold `parts`' leaf, created on demand. */
  private async parentFor(
    root: DriveNode,
    parts: readonly string[],
  ): Promise<DriveNode> {
    const dirParts = parts.slice(0, -1);
    if (dirParts.length === 0) return root;

    const dir = await this.makeDirectoryByParts(root, dirParts);
    if (!dir.isDirectory()) {
      throw new DriveError(
        "ENOTDIR",
        `unable to create file in \`${joinPath(...dirParts)}': \`${dir.name}' is not a directory`,
      );
    }
    return dir;
  }

  /**
   * Upload a file. Without `overwrite` an existing leaf of the same name is
   * left alone and a sibling is created next to it.
   */
  async putFile(
    root: DriveNode,
    parts: readonly string[],
    content: Readable,
    opts: PutOptions = {},
  ): Promise<DriveNode> {
    if (parts.length === 0) {
      throw new DriveError("EINVAL", "path cannot be empty");
    }
    const parent = await this.parentFor(root, parts);
    const parentPath = joinNames(parts.slice(0, -1));
    const name = sanitizeName(parts[parts.length - 1]);

    if (opts.overwrite) {
      const existing = single(
        await this.store.lookup(parent.id, name, NODE_FIELDS),
        joinPath(...parts),
      );
      if (existing) {
        const node = DriveNode.of(existing, parentPath);
        if (node.isDirectory()) {
          throw new DriveError("EISDIR", `\`${node.path}' is a directory`);
        }
        return this.replaceContent(node, content);
      }
    }

    const uploaded = await this.store.upload(parent.id, name, content, NODE_FIELDS);
    return DriveNode.of(uploaded, parentPath);
  }

  async replaceContent(node: DriveNode, content: Readable): Promise<DriveNode> {
    const updated = await this.store.replaceContent(node.id, content, NODE_FIELDS);
    return DriveNode.of(updated, node.parentPath);
  }

  /** Delete a file or a directory with everything below it. */
  async delete(root: DriveNode, parts: readonly string[]): Promise<void> {
    const node = await this.resolver.resolve(root, parts, ID_FIELDS);
    if (node.id === root.id) {
      throw new DriveError("EINVAL", "root cannot be deleted");
    }
    await this.store.delete(node.id);
  }

  async deleteDirectory(root: DriveNode, parts: readonly string[]): Promise<void> {
    const node = await this.resolver.resolve(root, parts, ["id", "kind"]);
    if (!node.isDirectory()) {
      throw new DriveError("ENOTDIR", `\`${joinPath(...parts)}' is not a directory`);
    }
    if (node.id === root.id) {
      throw new DriveError("EINVAL", "root cannot be deleted");
    }
    await this.store.delete(node.id);
  }

  /** Change the name of a node, keeping its parent. */
  async rename(
    root: DriveNode,
    parts: readonly string[],
    newName: string,
  ): Promise<DriveNode> {
    const nameParts = splitPath(newName);
    if (nameParts.length === 0) {
      throw new DriveError("EINVAL", "new name cannot be empty");
    }
    if (nameParts.length > 1) {
      throw new DriveError("EINVAL", `new name must be a single path segment: \`${newName}'`);
    }

    const node = await this.resolver.resolve(root, parts, ID_FIELDS);
    if (node.id === root.id) {
      throw new DriveError("EINVAL", "root cannot be renamed");
    }

    const renamed = await this.store.update(
      node.id,
      { name: sanitizeName(nameParts[0]) },
      NODE_FIELDS,
    );
    return DriveNode.of(renamed, node.parentPath);
  }

  /**
   * Move a node to `newParts`, creating missing directories and renaming
   * it to the last segment. The parent swap and rename are one store call.
   */
  async move(
    root: DriveNode,
    oldParts: readonly string[],
    newParts: readonly string[],
  ): Promise<DriveNode> {
    if (newParts.length === 0) {
      throw new DriveError("EINVAL", "new path cannot be empty");
    }

    const node = await this.resolver.resolve(root, oldParts, ["id", "parents", "kind"]);
    if (node.id === root.id) {
      throw new DriveError("EINVAL", "root cannot be moved");
    }
    if (node.isDirectory() && joinNames(newParts).startsWith(joinNames(oldParts) + "/")) {
      throw new DriveError("EINVAL", "cannot move a directory into itself");
    }

    const parent = await this.parentFor(root, newParts);
    const moved = await this.store.update(
      node.id,
      {
        name: sanitizeName(newParts[newParts.length - 1]),
        addParents: [parent.id],
        removeParents: [...node.parents],
      },
      NODE_FIELDS,
    );
    return DriveNode.of(moved, joinNames(newParts.slice(0, -1)));
  }

  /** Flag a node as trashed. Nothing is deleted. */
  async trash(root: DriveNode, parts: readonly string[]): Promise<void> {
    const node = await this.resolver.resolve(root, parts, ID_FIELDS);
    if (node.id === root.id) {
      throw new DriveError("EINVAL", "root cannot be trashed");
    }
    await this.store.update(node.id, { trashed: true }, ID_FIELDS);
  }

  /** Bring a trashed node back under its (live) parent directory. */
  async restore(root: DriveNode, parts: readonly string[]): Promise<DriveNode> {
    if (parts.length === 0) {
      throw new DriveError("EINVAL", "root cannot be restored");
    }
    const dirParts = parts.slice(0, -1);
    const path = joinPath(...parts);
    const parent = await this.resolver.resolve(root, dirParts, ID_FIELDS);
    const trashed = single(
      await this.store.lookup(
        parent.id,
        sanitizeName(parts[parts.length - 1]),
        ID_FIELDS,
        { trashed: true },
      ),
      path,
    );
    if (!trashed) {
      throw new NotFoundError(path);
    }
    const restored = await this.store.update(trashed.id, { trashed: false }, NODE_FIELDS);
    return DriveNode.of(restored, joinNames(dirParts));
  }

  /**
   * Visit the trashed nodes that descend from `scopeParts`. The store's trash
   * is global, so each entry's ancestry is walked back to the scope.
   */
  async listTrash(
    root: DriveNode,
    scopeParts: readonly string[],
    visit: VisitFn,
  ): Promise<void> {
    const scope = await this.resolver.resolve(root, scopeParts, ["id", "name"]);
    const trashed = await this.store.listTrashed(TRASH_FIELDS);

    for (const entry of trashed) {
      const { inRoot, parentPath } = await this.resolver.isInRoot(scope.id, entry);
      if (!inRoot) continue;
      await visitOrWrap(visit, DriveNode.of(entry, joinPath(scope.path, parentPath)));
    }
  }

  /** Visit the direct children of a directory. */
  async list(root: DriveNode, parts: readonly string[], visit: VisitFn): Promise<void> {
    const dir = await this.resolver.resolve(root, parts, ["id", "name", "kind"]);
    if (!dir.isDirectory()) {
      throw new DriveError("ENOTDIR", `\`${joinPath(...parts)}' is not a directory`);
    }

    const children = await this.store.list(dir.id, NODE_FIELDS);
    for (const child of children) {
      await visitOrWrap(visit, DriveNode.of(child, dir.path));
    }
  }
}
