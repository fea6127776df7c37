import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import pg from "pg";
import type {
  LookupOptions,
  NodeField,
  NodeKind,
  NodePatch,
  ObjectStore,
  StoreNode,
} from "./interface.js";
import { ROOT_NODE_ID, SCHEMA_SQL } from "./schema.js";

const { Pool } = pg;

export interface PostgresStoreOptions {
  connectionString: string;
}

interface NodeRow {
  id: string;
  name?: string;
  kind?: NodeKind;
  size?: number | null;
  createdTime?: Date;
  modifiedTime?: Date;
  parents?: string[];
  md5Checksum?: string | null;
  trashed?: boolean;
}

/** Select expression per field, aliased to the StoreNode key. */
const COLUMNS: Record<NodeField, string> = {
  id: `n.id AS "id"`,
  name: `n.name AS "name"`,
  kind: `n.kind AS "kind"`,
  size: `CASE WHEN n.kind = 'file' THEN octet_length(COALESCE(n.content, ''::bytea)) END AS "size"`,
  createdTime: `n.created_at AS "createdTime"`,
  modifiedTime: `n.modified_at AS "modifiedTime"`,
  parents: `ARRAY(SELECT l.parent_id FROM drive_node_parents l WHERE l.node_id = n.id ORDER BY l.seq) AS "parents"`,
  md5Checksum: `CASE WHEN n.kind = 'file' THEN md5(COALESCE(n.content, ''::bytea)) END AS "md5Checksum"`,
  trashed: `n.trashed AS "trashed"`,
};

function selectList(fields: readonly NodeField[]): string {
  const unique = new Set<NodeField>(["id", ...fields]);
  return [...unique].map((f) => COLUMNS[f]).join(", ");
}

function toStoreNode(row: NodeRow): StoreNode {
  const node: StoreNode = { id: row.id };
  if (row.name !== undefined) node.name = row.name;
  if (row.kind !== undefined) node.kind = row.kind;
  if (row.size !== undefined && row.size !== null) node.size = row.size;
  if (row.createdTime !== undefined) node.createdTime = row.createdTime.toISOString();
  if (row.modifiedTime !== undefined) node.modifiedTime = row.modifiedTime.toISOString();
  if (row.parents !== undefined) node.parents = row.parents;
  if (row.md5Checksum !== undefined && row.md5Checksum !== null) {
    node.md5Checksum = row.md5Checksum;
  }
  if (row.trashed !== undefined) node.trashed = row.trashed;
  return node;
}

export class PostgresStore implements ObjectStore {
  private pool: pg.Pool;

  constructor(opts: PostgresStoreOptions) {
    this.pool = new Pool({ connectionString: opts.connectionString });
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /** Auto-initialize database schema. Runs CREATE IF NOT EXISTS, so it can run on every start. */
  async initSchema(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // ── Internal: query helpers ────────────────────────────────

  private async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[],
    client?: pg.PoolClient,
  ): Promise<pg.QueryResult<T>> {
    if (client) {
      return client.query<T>(text, params);
    }
    return this.pool.query<T>(text, params);
  }

  /** Run `fn` inside BEGIN/COMMIT, rolling back on any error. */
  private async transaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  private async selectNodes(
    where: string,
    params: unknown[],
    fields: readonly NodeField[],
    client?: pg.PoolClient,
  ): Promise<StoreNode[]> {
    const { rows } = await this.query<NodeRow>(
      `SELECT ${selectList(fields)}
       FROM drive_nodes n
       ${where}
       ORDER BY n.created_at, n.id`,
      params,
      client,
    );
    return rows.map(toStoreNode);
  }

  private async selectNode(
    id: string,
    fields: readonly NodeField[],
    client?: pg.PoolClient,
  ): Promise<StoreNode> {
    const [node] = await this.selectNodes(`WHERE n.id = $1`, [id], fields, client);
    if (!node) {
      throw new Error(`File not found: ${id}`);
    }
    return node;
  }

  private async insertNode(
    client: pg.PoolClient,
    parentId: string,
    name: string,
    kind: NodeKind,
    content: Buffer | null,
  ): Promise<string> {
    const { rows } = await client.query<{ id: string }>(
      `INSERT INTO drive_nodes (name, kind, content) VALUES ($1, $2, $3) RETURNING id`,
      [name, kind, content],
    );
    const id = rows[0].id;
    await client.query(
      `INSERT INTO drive_node_parents (node_id, parent_id) VALUES ($1, $2)`,
      [id, parentId],
    );
    return id;
  }

  // ── Queries ────────────────────────────────────────────────

  async getRoot(fields: readonly NodeField[]): Promise<StoreNode> {
    return this.selectNode(ROOT_NODE_ID, fields);
  }

  async get(id: string, fields: readonly NodeField[]): Promise<StoreNode> {
    return this.selectNode(id, fields);
  }

  async lookup(
    parentId: string,
    name: string,
    fields: readonly NodeField[],
    opts?: LookupOptions,
  ): Promise<StoreNode[]> {
    return this.selectNodes(
      `JOIN drive_node_parents p ON p.node_id = n.id
       WHERE p.parent_id = $1 AND n.name = $2 AND n.trashed = $3`,
      [parentId, name, opts?.trashed ?? false],
      fields,
    );
  }

  async list(parentId: string, fields: readonly NodeField[]): Promise<StoreNode[]> {
    return this.selectNodes(
      `JOIN drive_node_parents p ON p.node_id = n.id
       WHERE p.parent_id = $1 AND n.trashed = false`,
      [parentId],
      fields,
    );
  }

  async listTrashed(fields: readonly NodeField[]): Promise<StoreNode[]> {
    return this.selectNodes(`WHERE n.trashed = true`, [], fields);
  }

  // ── Mutations ──────────────────────────────────────────────

  async create(
    parentId: string,
    name: string,
    kind: NodeKind,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    return this.transaction(async (client) => {
      const id = await this.insertNode(client, parentId, name, kind, null);
      return this.selectNode(id, fields, client);
    });
  }

  async update(
    id: string,
    patch: NodePatch,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    // Parent swap, rename and trash flag land together or not at all.
    return this.transaction(async (client) => {
      const { rowCount } = await client.query(
        `UPDATE drive_nodes
         SET name = COALESCE($2, name),
             trashed = COALESCE($3, trashed),
             modified_at = now()
         WHERE id = $1`,
        [id, patch.name ?? null, patch.trashed ?? null],
      );
      if (!rowCount) {
        throw new Error(`File not found: ${id}`);
      }
      if (patch.removeParents?.length) {
        await client.query(
          `DELETE FROM drive_node_parents WHERE node_id = $1 AND parent_id = ANY($2::text[])`,
          [id, patch.removeParents],
        );
      }
      for (const parentId of patch.addParents ?? []) {
        await client.query(
          `INSERT INTO drive_node_parents (node_id, parent_id) VALUES ($1, $2)
           ON CONFLICT (node_id, parent_id) DO NOTHING`,
          [id, parentId],
        );
      }
      return this.selectNode(id, fields, client);
    });
  }

  async delete(id: string): Promise<void> {
    // Descendants go with the node; UNION stops on parent cycles.
    const { rowCount } = await this.query(
      `WITH RECURSIVE tree AS (
         SELECT $1::text AS id
         UNION
         SELECT l.node_id FROM drive_node_parents l JOIN tree t ON l.parent_id = t.id
       )
       DELETE FROM drive_nodes WHERE id IN (SELECT id FROM tree)`,
      [id],
    );
    if (!rowCount) {
      throw new Error(`File not found: ${id}`);
    }
  }

  // ── Content ────────────────────────────────────────────────

  async download(id: string): Promise<Readable> {
    const { rows } = await this.query<{ kind: NodeKind; content: Buffer | null }>(
      `SELECT kind, content FROM drive_nodes WHERE id = $1`,
      [id],
    );
    if (rows.length === 0) {
      throw new Error(`File not found: ${id}`);
    }
    const r = rows[0];
    if (r.kind === "directory") {
      throw new Error(`Cannot download a directory: ${id}`);
    }
    return Readable.from([r.content ?? Buffer.alloc(0)]);
  }

  async upload(
    parentId: string,
    name: string,
    content: Readable,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    const data = await buffer(content);
    return this.transaction(async (client) => {
      const id = await this.insertNode(client, parentId, name, "file", data);
      return this.selectNode(id, fields, client);
    });
  }

  async replaceContent(
    id: string,
    content: Readable,
    fields: readonly NodeField[],
  ): Promise<StoreNode> {
    const data = await buffer(content);
    const { rowCount } = await this.query(
      `UPDATE drive_nodes SET content = $2, modified_at = now()
       WHERE id = $1 AND kind = 'file'`,
      [id, data],
    );
    if (!rowCount) {
      throw new Error(`File not found: ${id}`);
    }
    return this.selectNode(id, fields);
  }
}
