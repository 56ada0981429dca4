/**
 * SQLite database connection
 *
 * Manages database connection lifecycle and configuration.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

let db: Database.Database | null = null;

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 *
 * @param dbPath - SQLite file path (parent directory is created), or ":memory:"
 */
export function openDb(dbPath: string): Database.Database {
  if (db) {
    return db;
  }

  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);

  // Enable foreign keys (SQLite default is OFF)
  db.pragma("foreign_keys = ON");

  return db;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}
