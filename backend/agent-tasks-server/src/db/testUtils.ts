/**
 * Database Test Utilities
 *
 * Provides isolated in-memory databases for testing.
 * Each call returns a fresh database instance.
 */

import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";
import { AgentTasksDatabase, createTables } from "./connection";

export interface TestDatabase {
  db: AgentTasksDatabase;
  close: () => void;
}

/**
 * Create an isolated in-memory database with all tables in place
 */
export function createTestDatabase(): TestDatabase {
  const sqlite = new Database(":memory:");
  createTables(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
