/**
 * Database migration runner
 *
 * Applies SQL migrations from the repository's migrations/ directory in
 * order. The directory is located from this module, not the working
 * directory, so the CLI can run from anywhere.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";

const MIGRATIONS_DIR = join(__dirname, "..", "..", "migrations");

function getMigrationsDir(): string {
  return MIGRATIONS_DIR;
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations from migrations/ directory
 */
function getPendingMigrations(appliedMigrations: Set<string>): string[] {
  const files = readdirSync(getMigrationsDir());
  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(getMigrationsDir(), filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  });

  transaction();
}

/**
 * Run all pending migrations on the given connection
 *
 * @returns Names of the migrations applied
 */
export function runMigrations(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(getAppliedMigrations(db));
  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pending;
}
