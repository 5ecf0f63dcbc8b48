/**
 * Database Connection Module
 *
 * Provides SQLite database connection using better-sqlite3 and Drizzle ORM.
 *
 * Design decisions:
 * - Uses better-sqlite3 for synchronous, fast SQLite access
 * - Lazy initialization pattern for on-demand connection
 * - WAL mode so a hub process and several workers can share one file
 * - Connection cleanup function for graceful shutdown
 */

import fs from "fs";
import os from "os";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export type AgentTasksDatabase = BetterSQLite3Database<typeof schema>;

// Module-level connection state
let sqlite: Database.Database | null = null;
let db: AgentTasksDatabase | null = null;

/**
 * Get or create the database connection
 *
 * @param dbPath - Path to the SQLite database file (defaults to ~/.agent-tasks/results.db)
 * @returns Drizzle database instance with typed schema
 */
export function getDatabase(dbPath?: string): AgentTasksDatabase {
  if (db) {
    return db;
  }

  const resolvedPath = dbPath ?? getDefaultDbPath();

  if (resolvedPath !== ":memory:") {
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  sqlite = new Database(resolvedPath);

  // Enable WAL mode for concurrent readers alongside a writer
  sqlite.pragma("journal_mode = WAL");
  // Wait for a competing writer instead of failing immediately
  sqlite.pragma("busy_timeout = 5000");

  db = drizzle(sqlite, { schema });
  createTables(sqlite);

  return db;
}

/**
 * Get the default database path
 */
export function getDefaultDbPath(): string {
  return path.join(os.homedir(), ".agent-tasks", "results.db");
}

/**
 * Create tables if they don't exist using raw SQL
 *
 * Note: For production, use drizzle-kit migrations instead.
 */
export function createTables(connection: Database.Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS result_payloads (
      storage_key TEXT PRIMARY KEY,
      task_id TEXT NOT NULL,
      payload TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    )
  `);

  connection.exec(`
    CREATE INDEX IF NOT EXISTS idx_result_payloads_expires_at
    ON result_payloads (expires_at)
  `);

  connection.exec(`
    CREATE TABLE IF NOT EXISTS task_claims (
      task_id TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL,
      claimed_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    )
  `);

  connection.exec(`
    CREATE INDEX IF NOT EXISTS idx_task_claims_expires_at
    ON task_claims (expires_at)
  `);
}

/**
 * Close the database connection
 * Should be called during graceful shutdown
 */
export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
  }
}

// Re-export schema for convenience
export { schema };
export type { ResultPayload, NewResultPayload, TaskClaim } from "./schema";
