/**
 * Embedded SQL schema for auto-initialization.
 */

export const ROOT_NODE_ID = "root";

export const SCHEMA_SQL = `
-- Nodes: files and directories, no path column
CREATE TABLE IF NOT EXISTS drive_nodes (
    id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
    name TEXT NOT NULL,
    kind TEXT NOT NULL CHECK (kind IN ('file', 'directory')),
    content BYTEA,
    trashed BOOLEAN NOT NULL DEFAULT false,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    modified_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

-- Parent links: a node may have any number of parents
CREATE TABLE IF NOT EXISTS drive_node_parents (
    seq BIGINT GENERATED ALWAYS AS IDENTITY,
    node_id TEXT NOT NULL REFERENCES drive_nodes(id) ON DELETE CASCADE,
    parent_id TEXT NOT NULL REFERENCES drive_nodes(id) ON DELETE CASCADE,
    PRIMARY KEY (node_id, parent_id)
);

-- Child lookup by parent + name
CREATE INDEX IF NOT EXISTS idx_drive_node_parents_parent
    ON drive_node_parents (parent_id);
CREATE INDEX IF NOT EXISTS idx_drive_nodes_name
    ON drive_nodes (name);

-- Trash listing
CREATE INDEX IF NOT EXISTS idx_drive_nodes_trashed
    ON drive_nodes (trashed) WHERE trashed;

INSERT INTO drive_nodes (id, name, kind)
VALUES ('${ROOT_NODE_ID}', 'My Drive', 'directory')
ON CONFLICT (id) DO NOTHING;
`;
