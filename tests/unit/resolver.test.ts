import { describe, it, expect, beforeEach, vi } from "vitest";
import { DriveError, NotFoundError } from "../../src/errors.js";
import { DriveNode, ID_FIELDS, NODE_FIELDS } from "../../src/node.js";
import { PathResolver } from "../../src/resolver.js";
import { MemoryStore } from "../../src/storage/memory.js";

let store: MemoryStore;
let resolver: PathResolver;
let root: DriveNode;

beforeEach(async () => {
  store = new MemoryStore();
  resolver = new PathResolver(store);
  root = DriveNode.root(await store.getRoot(NODE_FIELDS));
});

describe("resolve", () => {
  it("returns the root for no segments without a store call", async () => {
    const lookup = vi.spyOn(store, "lookup");
    const node = await resolver.resolve(root, [], NODE_FIELDS);
    expect(node).toBe(root);
    expect(lookup).not.toHaveBeenCalled();
  });

  it("issues one lookup per segment, full fields only for the last", async () => {
    const a = await store.create(root.id, "a", "directory", ID_FIELDS);
    const b = await store.create(a.id, "b", "directory", ID_FIELDS);
    const c = await store.create(b.id, "c", "file", ID_FIELDS);

    const lookup = vi.spyOn(store, "lookup");
    const node = await resolver.resolve(root, ["a", "b", "c"], NODE_FIELDS);

    expect(node.id).toBe(c.id);
    expect(node.path).toBe("a/b/c");
    expect(node.parentPath).toBe("a/b");
    expect(lookup).toHaveBeenCalledTimes(3);
    expect(lookup.mock.calls[0]).toEqual([root.id, "a", ID_FIELDS]);
    expect(lookup.mock.calls[1]).toEqual([a.id, "b", ID_FIELDS]);
    expect(lookup.mock.calls[2]).toEqual([b.id, "c", NODE_FIELDS]);
  });

  it("sanitizes each segment before looking it up", async () => {
    await store.create(root.id, "it-s", "directory", ID_FIELDS);
    const lookup = vi.spyOn(store, "lookup");

    await resolver.resolve(root, ["it's"], NODE_FIELDS);
    expect(lookup.mock.calls[0][1]).toBe("it-s");
  });

  it("builds the parent path from sanitized segments", async () => {
    const dir = await store.create(root.id, "it-s", "directory", ID_FIELDS);
    await store.create(dir.id, "f", "file", ID_FIELDS);

    const node = await resolver.resolve(root, ["it's", "f"], NODE_FIELDS);
    expect(node.parentPath).toBe("it-s");
    expect(node.path).toBe("it-s/f");
  });

  it("reports the prefix up to the missing segment", async () => {
    await store.create(root.id, "a", "directory", ID_FIELDS);

    const err = await resolver.resolve(root, ["a", "b", "c"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect((err as NotFoundError).path).toBe("a/b");
    expect((err as NotFoundError).code).toBe("ENOENT");
    expect((err as NotFoundError).message).toBe("`a/b' does not exist");
  });

  it("refuses to pick between same-name siblings", async () => {
    const a = await store.create(root.id, "a", "directory", ID_FIELDS);
    await store.create(a.id, "dup", "file", ID_FIELDS);
    await store.create(a.id, "dup", "file", ID_FIELDS);

    const err = await resolver.resolve(root, ["a", "dup"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DriveError);
    expect((err as DriveError).code).toBe("EAMBIGUOUS");
    expect((err as DriveError).message).toBe("multiple entries found for `a/dup'");
  });

  it("does not see trashed children", async () => {
    const a = await store.create(root.id, "a", "directory", ID_FIELDS);
    await store.update(a.id, { trashed: true }, ID_FIELDS);

    await expect(resolver.resolve(root, ["a"])).rejects.toThrow(NotFoundError);
  });
});

describe("isInRoot", () => {
  it("finds the path between the scope and the parent", async () => {
    const a = await store.create(root.id, "a", "directory", ID_FIELDS);
    const b = await store.create(a.id, "b", "directory", ID_FIELDS);
    const file = await store.create(b.id, "f", "file", ["id", "parents"]);

    expect(await resolver.isInRoot(root.id, file)).toEqual({
      inRoot: true,
      parentPath: "a/b",
    });
    expect(await resolver.isInRoot(a.id, file)).toEqual({
      inRoot: true,
      parentPath: "b",
    });
  });

  it("returns an empty parent path for a direct child", async () => {
    const file = await store.create(root.id, "f", "file", ["id", "parents"]);
    expect(await resolver.isInRoot(root.id, file)).toEqual({ inRoot: true, parentPath: "" });
  });

  it("rejects nodes outside the scope", async () => {
    const a = await store.create(root.id, "a", "directory", ID_FIELDS);
    const other = await store.create(root.id, "other", "directory", ID_FIELDS);
    const file = await store.create(a.id, "f", "file", ["id", "parents"]);

    expect(await resolver.isInRoot(other.id, file)).toEqual({
      inRoot: false,
      parentPath: "",
    });
  });

  it("follows a second parent when the first does not lead to the scope", async () => {
    const a = await store.create(root.id, "a", "directory", ID_FIELDS);
    const b = await store.create(root.id, "b", "directory", ID_FIELDS);
    const file = await store.create(a.id, "f", "file", ID_FIELDS);
    const linked = await store.update(file.id, { addParents: [b.id] }, ["id", "parents"]);

    expect(await resolver.isInRoot(b.id, linked)).toEqual({ inRoot: true, parentPath: "" });
  });

  it("stops on a parent cycle", async () => {
    const a = await store.create(root.id, "a", "directory", ID_FIELDS);
    const b = await store.create(a.id, "b", "directory", ID_FIELDS);
    await store.update(a.id, { addParents: [b.id], removeParents: [root.id] }, ID_FIELDS);
    const file = await store.create(b.id, "f", "file", ["id", "parents"]);

    expect(await resolver.isInRoot(root.id, file)).toEqual({
      inRoot: false,
      parentPath: "",
    });
  });
});
