export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
PRAGMA cache_size = -64000;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS collections (
  name TEXT PRIMARY KEY,
  vec_table TEXT NOT NULL UNIQUE,
  dimension INTEGER NOT NULL,
  generation INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  session_json TEXT
);

CREATE TABLE IF NOT EXISTS parent_chunks (
  collection TEXT NOT NULL,
  parent_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  page_start INTEGER NOT NULL,
  page_end INTEGER NOT NULL,
  page_spans_json TEXT NOT NULL,
  language TEXT NOT NULL,
  ocr_processed INTEGER NOT NULL CHECK(ocr_processed IN (0, 1)),
  child_ids_json TEXT NOT NULL,
  PRIMARY KEY (collection, parent_id),
  FOREIGN KEY(collection) REFERENCES collections(name) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS vector_records (
  record_rowid INTEGER PRIMARY KEY,
  collection TEXT NOT NULL,
  record_id TEXT NOT NULL,
  parent_id TEXT NOT NULL,
  payload_json TEXT NOT NULL,
  UNIQUE (collection, record_id),
  FOREIGN KEY(collection) REFERENCES collections(name) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_parent_chunks_index ON parent_chunks(collection, chunk_index);
CREATE INDEX IF NOT EXISTS idx_vector_records_parent ON vector_records(collection, parent_id);
`;

export const SCHEMA_VERSION = '1';

/**
 * 每個 collection 一張 vec0 虛擬表，需在 extension 載入後才能建立
 * dimension 由 embedding 設定決定
 */
export function vecTableSQL(tableName: string, dimension: number): string {
  return `CREATE VIRTUAL TABLE IF NOT EXISTS ${tableName} USING vec0(embedding float[${dimension}]);`;
}
