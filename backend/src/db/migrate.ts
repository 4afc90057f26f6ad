import type { SqliteClient } from "./index.js";
import { log } from "../middleware/logger.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS turns (
  id TEXT PRIMARY KEY NOT NULL,
  conversation_id TEXT NOT NULL,
  user_content TEXT NOT NULL,
  content TEXT NOT NULL,
  sources TEXT NOT NULL DEFAULT '[]',
  follow_up_questions TEXT NOT NULL DEFAULT '[]',
  model TEXT NOT NULL,
  mode TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);
CREATE INDEX IF NOT EXISTS turns_conversation_created_idx ON turns (conversation_id, created_at);
`;

export function runMigrations(sqlite: SqliteClient): void {
  sqlite.exec(SCHEMA_SQL);
  log.info("Database schema ensured");
}
