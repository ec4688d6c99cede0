export const SQLITE_SCHEMA_VERSION = 1 as const;

export const SQLITE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS memory_units (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  narrative TEXT NOT NULL,
  atomic_facts TEXT NOT NULL,
  foresights TEXT NOT NULL,
  created_at TEXT NOT NULL,
  cluster_id TEXT,
  embedding TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_memory_units_user ON memory_units(user_id);

CREATE TABLE IF NOT EXISTS clusters (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  user_id TEXT NOT NULL,
  theme_label TEXT NOT NULL,
  summary TEXT NOT NULL,
  member_ids TEXT NOT NULL,
  centroid TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_clusters_user ON clusters(user_id);

CREATE TABLE IF NOT EXISTS profiles (
  user_id TEXT PRIMARY KEY,
  explicit_attributes TEXT NOT NULL,
  implicit_traits TEXT NOT NULL,
  source_cluster_ids TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS conflict_records (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  user_id TEXT NOT NULL,
  attribute_name TEXT NOT NULL,
  old_value TEXT NOT NULL,
  new_value TEXT NOT NULL,
  old_timestamp TEXT NOT NULL,
  new_timestamp TEXT NOT NULL,
  old_source_unit_id TEXT NOT NULL,
  new_source_unit_id TEXT NOT NULL,
  resolution_strategy TEXT NOT NULL,
  outcome TEXT NOT NULL,
  detected_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_conflict_records_user ON conflict_records(user_id);

CREATE TABLE IF NOT EXISTS unit_vectors (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  cluster_id TEXT,
  created_at TEXT NOT NULL,
  vector TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_unit_vectors_user ON unit_vectors(user_id);
`;
