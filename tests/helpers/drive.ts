import type { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import { Driver } from "../../src/driver.js";
import type { DriveNode } from "../../src/node.js";
import { MemoryStore } from "../../src/storage/memory.js";

export interface TestDrive {
  store: MemoryStore;
  driver: Driver;
}

/**
 * A driver rooted at a fresh directory of an in-memory store, so every
 * path in a test is relative to something other than the store's top.
 */
export async function createTestDrive(rootDirectory = "DriveTest"): Promise<TestDrive> {
  const store = new MemoryStore();
  const top = await Driver.create(store);
  await top.makeDirectory(rootDirectory);
  const driver = await Driver.create(store, { rootDirectory });
  return { store, driver };
}

export async function readText(content: Readable): Promise<string> {
  return (await buffer(content)).toString("utf8");
}

/** Get a file and return its content as text. */
export async function getText(driver: Driver, path: string): Promise<string> {
  const { content } = await driver.get(path);
  return readText(content);
}

/** Collect every node a listing visits, sorted by path. */
export async function collectPaths(
  each: (visit: (node: DriveNode) => void) => Promise<void>,
): Promise<string[]> {
  const paths: string[] = [];
  await each((node) => {
    paths.push(node.path);
  });
  return paths.sort();
}
