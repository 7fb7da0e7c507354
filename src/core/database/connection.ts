/**
 * Database connection management
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { DB_CONSTANTS } from "../constants/index";
import type { DbHandles } from "../types";
import { initSchema } from "./schema";

/**
 * Opens a database connection and initializes schema
 * @param dbPath - Path to the SQLite database file, or ":memory:"
 */
export function openDb(dbPath: string): DbHandles {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma(`journal_mode = ${DB_CONSTANTS.JOURNAL_MODE}`);
  db.pragma(`synchronous = ${DB_CONSTANTS.SYNCHRONOUS}`);
  db.pragma(`cache_size = ${DB_CONSTANTS.CACHE_SIZE}`);
  initSchema(db);
  return { db };
}

/**
 * Closes a database connection
 */
export function closeDb(h: DbHandles): void {
  h.db.close();
}
