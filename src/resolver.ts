import type { NodeField, ObjectStore, StoreNode } from "./storage/index.js";
import { DriveError, NotFoundError } from "./errors.js";
import { ANCESTOR_FIELDS, DriveNode, ID_FIELDS } from "./node.js";
import { joinNames, joinPath, sanitizeName } from "./paths.js";

export interface AncestryResult {
  inRoot: boolean;
  /** Path from the scope node down to the node's immediate parent. */
  parentPath: string;
}

/** Exactly one match, or the error naming `path`. */
export function single(matches: StoreNode[], path: string): StoreNode | null {
  if (matches.length > 1) {
    throw new DriveError("EAMBIGUOUS", `multiple entries found for \`${path}'`);
  }
  return matches[0] ?? null;
}

/**
 * Walks slash paths one segment at a time, one store lookup per segment.
 * Intermediate segments fetch ids only; the last fetches `fields`.
 */
export class PathResolver {
  constructor(private store: ObjectStore) {}

  async resolve(
    root: DriveNode,
    parts: readonly string[],
    fields: readonly NodeField[] = ID_FIELDS,
  ): Promise<DriveNode> {
    if (parts.length === 0) return root;

    const last = parts.length - 1;
    let current: StoreNode = { id: root.id };

    for (let i = 0; i < parts.length; i++) {
      const prefix = joinPath(...parts.slice(0, i + 1));
      const matches = await this.store.lookup(
        current.id,
        sanitizeName(parts[i]),
        i === last ? fields : ID_FIELDS,
      );
      const match = single(matches, prefix);
      if (!match) {
        throw new NotFoundError(prefix);
      }
      current = match;
    }

    return DriveNode.of(current, joinNames(parts.slice(0, last)));
  }

  /**
   * Decide whether `node` descends from `scopeId` by walking its parents
   * upward. The first parent chain that reaches the scope wins.
   */
  async isInRoot(
    scopeId: string,
    node: StoreNode,
    basePath = "",
    visited: Set<string> = new Set(),
  ): Promise<AncestryResult> {
    for (const parentId of node.parents ?? []) {
      if (parentId === scopeId) {
        return { inRoot: true, parentPath: basePath };
      }
      if (visited.has(parentId)) continue;
      visited.add(parentId);

      const parent = await this.store.get(parentId, ANCESTOR_FIELDS);
      const result = await this.isInRoot(
        scopeId,
        parent,
        joinPath(sanitizeName(parent.name ?? ""), basePath),
        visited,
      );
      if (result.inRoot) return result;
    }
    return { inRoot: false, parentPath: "" };
  }
}
