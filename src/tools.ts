import { buffer } from "node:stream/consumers";
import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { HASH_METHODS, type Driver } from "./driver.js";
import { DriveError } from "./errors.js";
import type { DriveNode, NodeJson } from "./node.js";

function ok(data: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(data) }] };
}

function err(text: string) {
  return { content: [{ type: "text" as const, text }], isError: true as const };
}

/** Turn DriveErrors into tool errors; anything else is a server fault. */
async function run<T>(fn: () => Promise<T>) {
  try {
    return ok(await fn());
  } catch (e) {
    if (e instanceof DriveError) return err(`${e.code}: ${e.message}`);
    throw e;
  }
}

async function collect(
  each: (visit: (node: DriveNode) => void) => Promise<void>,
): Promise<NodeJson[]> {
  const nodes: NodeJson[] = [];
  await each((node) => {
    nodes.push(node.toJSON());
  });
  return nodes.sort((a, b) => a.path.localeCompare(b.path));
}

const pathParam = (what: string) =>
  z.string().describe(`${what}, relative to the drive root (e.g. Folder1/File1)`);

/** Register all drive tools on the MCP server. */
export function registerTools(server: McpServer, driver: Driver): void {
  // ── stat ────────────────────────────────────────────────────

  server.tool(
    "stat",
    "Get metadata for a file or directory: id, name, path, type, size and timestamps. " +
      "Errors: ENOENT if a path segment does not exist, EAMBIGUOUS if two siblings share a name.",
    { path: pathParam("Path to inspect") },
    { readOnlyHint: true },
    async ({ path }) => run(async () => (await driver.stat(path)).toJSON()),
  );

  // ── ls ──────────────────────────────────────────────────────

  server.tool(
    "ls",
    "List the direct children of a directory, sorted by path. " +
      "Errors: ENOENT if the directory does not exist, ENOTDIR if the path is a file.",
    { path: pathParam("Directory to list (empty string for the root)") },
    { readOnlyHint: true },
    async ({ path }) =>
      run(async () => {
        const entries = await collect((visit) => driver.list(path, visit));
        return { entries };
      }),
  );

  // ── mkdir ───────────────────────────────────────────────────

  server.tool(
    "mkdir",
    "Create a directory and any missing parent directories (mkdir -p behavior). " +
      "Idempotent: existing directories are reused. " +
      "Errors: ENOTDIR if an ancestor is a file.",
    { path: pathParam("Directory to create") },
    { idempotentHint: true },
    async ({ path }) => run(async () => (await driver.makeDirectory(path)).toJSON()),
  );

  // ── read ────────────────────────────────────────────────────

  server.tool(
    "read",
    "Read a file as UTF-8 text. " +
      "Errors: ENOENT if the file does not exist, EISDIR if the path is a directory.",
    { path: pathParam("File to read") },
    { readOnlyHint: true },
    async ({ path }) =>
      run(async () => {
        const { node, content } = await driver.get(path);
        const data = await buffer(content);
        return { ...node.toJSON(), content: data.toString("utf8") };
      }),
  );

  // ── write ───────────────────────────────────────────────────

  server.tool(
    "write",
    "Upload a file, creating missing parent directories. " +
      "Without overwrite an existing file of the same name is kept and a sibling is added. " +
      "Errors: EINVAL for an empty path, ENOTDIR if an ancestor is a file, " +
      "EISDIR when overwriting a directory.",
    {
      path: pathParam("File to write"),
      content: z.string().describe("Full UTF-8 content of the file"),
      overwrite: z
        .boolean()
        .optional()
        .describe("Replace the content of an existing file at this path"),
    },
    async ({ path, content, overwrite }) =>
      run(async () => (await driver.put(path, content, { overwrite })).toJSON()),
  );

  // ── hash ────────────────────────────────────────────────────

  server.tool(
    "hash",
    "Get the checksum of a file as lowercase hex. " +
      "Errors: EINVAL for an unsupported method, EISDIR if the path is a directory.",
    {
      path: pathParam("File to hash"),
      method: z.enum(HASH_METHODS).default("md5").describe("Hash method"),
    },
    { readOnlyHint: true },
    async ({ path, method }) =>
      run(async () => {
        const { node, hash } = await driver.getHash(path, method);
        return { path: node.path, method, hash: hash.toString("hex") };
      }),
  );

  // ── rm ──────────────────────────────────────────────────────

  server.tool(
    "rm",
    "Permanently delete a file or directory with everything below it. " +
      "Errors: ENOENT if the path does not exist, EINVAL for the root.",
    { path: pathParam("Path to delete") },
    { destructiveHint: true },
    async ({ path }) =>
      run(async () => {
        await driver.delete(path);
        return { path, deleted: true };
      }),
  );

  // ── rmdir ───────────────────────────────────────────────────

  server.tool(
    "rmdir",
    "Permanently delete a directory with everything below it. Refuses files. " +
      "Errors: ENOTDIR if the path is a file, EINVAL for the root.",
    { path: pathParam("Directory to delete") },
    { destructiveHint: true },
    async ({ path }) =>
      run(async () => {
        await driver.deleteDirectory(path);
        return { path, deleted: true };
      }),
  );

  // ── rename ──────────────────────────────────────────────────

  server.tool(
    "rename",
    "Rename a file or directory in place. " +
      "Errors: EINVAL for an empty or multi-segment name, or for the root.",
    {
      path: pathParam("Path to rename"),
      name: z.string().describe("New name (a single path segment)"),
    },
    async ({ path, name }) => run(async () => (await driver.rename(path, name)).toJSON()),
  );

  // ── move ────────────────────────────────────────────────────

  server.tool(
    "move",
    "Move a file or directory, renaming it to the destination's last segment. " +
      "Parent directories at the destination are created automatically. " +
      "Errors: EINVAL for an empty destination or the root, ENOTDIR if a destination ancestor is a file.",
    {
      source: pathParam("Path to move"),
      destination: pathParam("New path"),
    },
    async ({ source, destination }) =>
      run(async () => (await driver.move(source, destination)).toJSON()),
  );

  // ── trash ───────────────────────────────────────────────────

  server.tool(
    "trash",
    "Move a file or directory to the trash. It can be listed with list_trash and restored. " +
      "Errors: ENOENT if the path does not exist, EINVAL for the root.",
    { path: pathParam("Path to trash") },
    async ({ path }) =>
      run(async () => {
        await driver.trash(path);
        return { path, trashed: true };
      }),
  );

  // ── restore ─────────────────────────────────────────────────

  server.tool(
    "restore",
    "Restore a trashed file or directory to its original path. " +
      "Errors: ENOENT if no trashed entry has that path.",
    { path: pathParam("Original path of the trashed entry") },
    async ({ path }) => run(async () => (await driver.restore(path)).toJSON()),
  );

  // ── list_trash ──────────────────────────────────────────────

  server.tool(
    "list_trash",
    "List trashed entries below a directory, with their original paths.",
    { path: pathParam("Directory to scope the listing to (empty string for the root)") },
    { readOnlyHint: true },
    async ({ path }) =>
      run(async () => {
        const entries = await collect((visit) => driver.listTrash(path, visit));
        return { entries, count: entries.length };
      }),
  );

  // ── set_root ────────────────────────────────────────────────

  server.tool(
    "set_root",
    "Change the directory all other paths are resolved against. " +
      "The path is absolute from the top of the drive. " +
      "Errors: ENOENT if it does not exist, ENOTDIR if it is a file.",
    { path: z.string().describe("Absolute directory path (empty string for the top of the drive)") },
    async ({ path }) =>
      run(async () => {
        const root = await driver.setRootDirectory(path);
        return { id: root.id, path };
      }),
  );
}
