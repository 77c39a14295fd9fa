export const CHUNKS_TABLE = 'kb_chunks';
export const META_TABLE = 'kb_meta';
export const VECTOR_INDEX = 'kb_chunks_embedding_idx';

export const DROP_VECTOR_INDEX = `DROP INDEX IF EXISTS ${VECTOR_INDEX}`;
export const DROP_CHUNKS_TABLE = `DROP TABLE IF EXISTS ${CHUNKS_TABLE}`;
export const DROP_META_TABLE = `DROP TABLE IF EXISTS ${META_TABLE}`;

// The vector column is sized per build, from the embedding dimension.
export function createChunksTable(dimensions: number): string {
  if (!Number.isInteger(dimensions) || dimensions < 1) {
    throw new RangeError(`Embedding dimension must be a positive integer, got ${dimensions}`);
  }
  return `
CREATE TABLE ${CHUNKS_TABLE} (
  id TEXT PRIMARY KEY,
  text TEXT NOT NULL,
  source TEXT NOT NULL,
  ticket_key TEXT,
  chunk_index INTEGER NOT NULL DEFAULT 0,
  embedding F32_BLOB(${dimensions}) NOT NULL
)`;
}

export const CREATE_CHUNKS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_kb_chunks_ticket ON ${CHUNKS_TABLE}(ticket_key);
CREATE INDEX IF NOT EXISTS idx_kb_chunks_source ON ${CHUNKS_TABLE}(source)`;

export const CREATE_VECTOR_INDEX = `
CREATE INDEX IF NOT EXISTS ${VECTOR_INDEX} ON ${CHUNKS_TABLE}(libsql_vector_idx(embedding))`;

export const CREATE_META_TABLE = `
CREATE TABLE ${META_TABLE} (
  generation TEXT PRIMARY KEY,
  root_key TEXT NOT NULL,
  ticket_keys TEXT NOT NULL,
  chunk_count INTEGER NOT NULL,
  dimensions INTEGER NOT NULL,
  ann_index INTEGER NOT NULL DEFAULT 0,
  built_at TEXT NOT NULL
)`;
