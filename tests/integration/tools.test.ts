import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { Driver } from "../../src/driver.js";
import type { NodeJson } from "../../src/node.js";
import { MemoryStore } from "../../src/storage/memory.js";
import { registerTools } from "../../src/tools.js";

let store: MemoryStore;
let client: Client;
let mcpServer: McpServer;

beforeAll(async () => {
  store = new MemoryStore();
  const driver = await Driver.create(store);

  mcpServer = new McpServer({ name: "test-drive", version: "0.0.1" });
  registerTools(mcpServer, driver);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "0.0.1" });

  await mcpServer.connect(serverTransport);
  await client.connect(clientTransport);
});

afterAll(async () => {
  await client.close();
  await mcpServer.close();
  await store.close();
});

/** Helper to call a tool and parse the JSON response. */
async function callTool(name: string, args: Record<string, unknown> = {}): Promise<{ data: unknown; isError?: boolean }> {
  const result = await client.callTool({ name, arguments: args });
  const content = result.content as Array<{ type: string; text: string }>;
  const text = content[0].text;

  // Error responses are plain text, not JSON
  if (result.isError) {
    return { data: text, isError: true };
  }

  return { data: JSON.parse(text), isError: false };
}

describe("MCP tools via in-memory transport", () => {
  it("lists all 14 tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "hash",
      "list_trash",
      "ls",
      "mkdir",
      "move",
      "read",
      "rename",
      "restore",
      "rm",
      "rmdir",
      "set_root",
      "stat",
      "trash",
      "write",
    ]);
  });

  it("mkdir returns the directory", async () => {
    const result = await callTool("mkdir", { path: "/project" });
    expect(result.isError).toBe(false);
    expect(result.data).toMatchObject({
      name: "project",
      path: "project",
      type: "directory",
      size: 0,
    });
  });

  it("write + read round-trips content", async () => {
    const writeResult = await callTool("write", { path: "project/hello.txt", content: "hello" });
    expect(writeResult.data).toMatchObject({ path: "project/hello.txt", type: "file", size: 5 });

    const readResult = await callTool("read", { path: "project/hello.txt" });
    expect(readResult.data).toMatchObject({ path: "project/hello.txt", size: 5, content: "hello" });
  });

  it("hash defaults to md5 hex", async () => {
    const result = await callTool("hash", { path: "project/hello.txt" });
    expect(result.data).toEqual({
      path: "project/hello.txt",
      method: "md5",
      hash: "5d41402abc4b2a76b9719d911017c592",
    });
  });

  it("write with overwrite keeps the file id", async () => {
    const before = (await callTool("stat", { path: "project/hello.txt" })).data as NodeJson;
    const after = (await callTool("write", {
      path: "project/hello.txt",
      content: "hello again",
      overwrite: true,
    })).data as NodeJson;

    expect(after.id).toBe(before.id);
    expect(after.size).toBe(11);
  });

  it("write without overwrite adds a sibling that makes the name ambiguous", async () => {
    await callTool("write", { path: "project/dup.txt", content: "one" });
    await callTool("write", { path: "project/dup.txt", content: "two" });

    const result = await callTool("stat", { path: "project/dup.txt" });
    expect(result.isError).toBe(true);
    expect(result.data).toBe("EAMBIGUOUS: multiple entries found for `project/dup.txt'");
  });

  it("stat reports the first missing segment", async () => {
    const result = await callTool("stat", { path: "/nope/path" });
    expect(result.isError).toBe(true);
    expect(result.data).toBe("ENOENT: `nope' does not exist");
  });

  it("ls returns children sorted by path", async () => {
    await callTool("mkdir", { path: "listing/b" });
    await callTool("write", { path: "listing/a.txt", content: "x" });

    const result = await callTool("ls", { path: "listing" });
    const data = result.data as { entries: NodeJson[] };
    expect(data.entries.map((e) => [e.path, e.type])).toEqual([
      ["listing/a.txt", "file"],
      ["listing/b", "directory"],
    ]);
  });

  it("ls on an empty directory returns an empty entries array", async () => {
    await callTool("mkdir", { path: "/empty" });
    const result = await callTool("ls", { path: "/empty" });
    expect(result.data).toEqual({ entries: [] });
  });

  it("ls refuses a file", async () => {
    const result = await callTool("ls", { path: "project/hello.txt" });
    expect(result.data).toBe("ENOTDIR: `project/hello.txt' is not a directory");
  });

  it("rename keeps the parent", async () => {
    const result = await callTool("rename", { path: "project/hello.txt", name: "greeting.txt" });
    expect(result.data).toMatchObject({ name: "greeting.txt", path: "project/greeting.txt" });
  });

  it("rename refuses a name with separators", async () => {
    const result = await callTool("rename", { path: "project/greeting.txt", name: "a/b" });
    expect(result.data).toBe("EINVAL: new name must be a single path segment: `a/b'");
  });

  it("move creates destination directories", async () => {
    const moveResult = await callTool("move", {
      source: "project/greeting.txt",
      destination: "archive/2024/greeting.txt",
    });
    expect(moveResult.data).toMatchObject({ path: "archive/2024/greeting.txt" });

    const readResult = await callTool("read", { path: "archive/2024/greeting.txt" });
    expect((readResult.data as { content: string }).content).toBe("hello again");

    const oldResult = await callTool("read", { path: "project/greeting.txt" });
    expect(oldResult.data).toBe("ENOENT: `project/greeting.txt' does not exist");
  });

  it("trash, list_trash and restore", async () => {
    await callTool("write", { path: "project/old.txt", content: "x" });

    const trashResult = await callTool("trash", { path: "project/old.txt" });
    expect(trashResult.data).toEqual({ path: "project/old.txt", trashed: true });
    expect((await callTool("stat", { path: "project/old.txt" })).isError).toBe(true);

    const listResult = await callTool("list_trash", { path: "" });
    const listed = listResult.data as { entries: NodeJson[]; count: number };
    expect(listed.count).toBe(1);
    expect(listed.entries[0].path).toBe("project/old.txt");

    const restoreResult = await callTool("restore", { path: "project/old.txt" });
    expect(restoreResult.data).toMatchObject({ path: "project/old.txt" });
    const readResult = await callTool("read", { path: "project/old.txt" });
    expect((readResult.data as { content: string }).content).toBe("x");
  });

  it("rmdir refuses a file", async () => {
    const result = await callTool("rmdir", { path: "project/old.txt" });
    expect(result.data).toBe("ENOTDIR: `project/old.txt' is not a directory");
  });

  it("rm removes a directory tree", async () => {
    const result = await callTool("rm", { path: "archive" });
    expect(result.data).toEqual({ path: "archive", deleted: true });

    const lsResult = await callTool("ls", { path: "archive/2024" });
    expect(lsResult.data).toBe("ENOENT: `archive' does not exist");
  });

  it("rejects paths with control characters", async () => {
    const result = await callTool("stat", { path: "bad\u0000path" });
    expect(result.isError).toBe(true);
    expect(result.data).toMatch(/^EINVAL: /);
  });

  it("set_root scopes later calls", async () => {
    const result = await callTool("set_root", { path: "project" });
    expect(result.data).toMatchObject({ path: "project" });

    const stat = await callTool("stat", { path: "old.txt" });
    expect(stat.data).toMatchObject({ path: "old.txt" });
  });

  it("set_root refuses a file", async () => {
    const result = await callTool("set_root", { path: "project/old.txt" });
    expect(result.data).toBe("ENOTDIR: `project/old.txt' is not a directory");
  });
});
