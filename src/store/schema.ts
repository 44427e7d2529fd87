export const SCHEMA_VERSION = 1 as const;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sessions (
  session_id TEXT PRIMARY KEY,
  project_name TEXT NOT NULL,
  started_at TEXT NOT NULL,
  recording_enabled INTEGER NOT NULL,
  off_the_record INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS exchanges (
  exchange_id TEXT PRIMARY KEY,
  session_id TEXT NOT NULL REFERENCES sessions(session_id),
  project_name TEXT NOT NULL,
  response_text TEXT NOT NULL,
  user_note TEXT NOT NULL DEFAULT '',
  capture_method TEXT NOT NULL CHECK (capture_method IN ('manual', 'automatic')),
  recording_enabled INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  index_state TEXT NOT NULL DEFAULT 'pending' CHECK (index_state IN ('pending', 'indexed')),
  link_state TEXT NOT NULL DEFAULT 'link-pending' CHECK (link_state IN ('linked', 'link-pending'))
);

CREATE INDEX IF NOT EXISTS idx_exchanges_session_created
  ON exchanges(session_id, created_at);

CREATE VIRTUAL TABLE IF NOT EXISTS exchanges_fts USING fts5(
  exchange_id UNINDEXED,
  response_text,
  user_note,
  tokenize='porter unicode61'
);

CREATE TABLE IF NOT EXISTS exchange_links (
  exchange_id TEXT NOT NULL REFERENCES exchanges(exchange_id),
  target_id TEXT NOT NULL,
  position INTEGER NOT NULL,
  PRIMARY KEY (exchange_id, target_id)
);

CREATE TABLE IF NOT EXISTS discussions (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL CHECK (kind IN ('discussion', 'decision')),
  text TEXT NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_discussions_created ON discussions(created_at);

CREATE VIRTUAL TABLE IF NOT EXISTS discussions_fts USING fts5(
  discussion_id UNINDEXED,
  text,
  tags,
  tokenize='porter unicode61'
);
`;

// Discussions are written by import tooling as well, so their index entries
// follow the rows through triggers. Tags are indexed space separated.
export const DISCUSSION_TRIGGERS_SQL = `
CREATE TRIGGER IF NOT EXISTS discussions_ai AFTER INSERT ON discussions BEGIN
  INSERT INTO discussions_fts(discussion_id, text, tags)
  VALUES (new.id, new.text, (SELECT group_concat(value, ' ') FROM json_each(new.tags)));
END;

CREATE TRIGGER IF NOT EXISTS discussions_ad AFTER DELETE ON discussions BEGIN
  DELETE FROM discussions_fts WHERE discussion_id = old.id;
END;

CREATE TRIGGER IF NOT EXISTS discussions_au AFTER UPDATE ON discussions BEGIN
  DELETE FROM discussions_fts WHERE discussion_id = old.id;
  INSERT INTO discussions_fts(discussion_id, text, tags)
  VALUES (new.id, new.text, (SELECT group_concat(value, ' ') FROM json_each(new.tags)));
END;
`;
