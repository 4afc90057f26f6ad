import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

export function createDatabase(path: string) {
  if (path !== ":memory:") {
    // Ensure data directory exists
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Performance pragmas for SQLite
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("synchronous = NORMAL");
  sqlite.pragma("temp_store = MEMORY");

  const db = drizzle(sqlite, { schema });
  return { db, sqlite };
}

export type DB = ReturnType<typeof createDatabase>["db"];
export type SqliteClient = ReturnType<typeof createDatabase>["sqlite"];
