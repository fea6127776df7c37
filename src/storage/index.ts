import type { ObjectStore } from "./interface.js";
import { MemoryStore } from "./memory.js";
import { PostgresStore } from "./postgres.js";

export type {
  ObjectStore,
  StoreNode,
  NodeField,
  NodeKind,
  NodePatch,
  LookupOptions,
} from "./interface.js";

/** Create a backing store based on environment configuration. */
export function createBackend(): ObjectStore {
  const type = process.env.DRIVE_STORAGE_BACKEND ?? "postgres";

  switch (type) {
    case "postgres": {
      const connectionString = process.env.DATABASE_URL;
      if (!connectionString) {
        throw new Error("DATABASE_URL environment variable is required");
      }
      return new PostgresStore({ connectionString });
    }
    case "memory":
      return new MemoryStore();
    default:
      throw new Error(`Unknown storage backend: ${type}`);
  }
}
