/**
 * Drizzle ORM Schema Definitions
 * Database schema for overflow result payloads
 */

import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";

/**
 * Result payloads table - bulk task results that were too large to travel
 * inline on the notification channel
 *
 * Design decisions:
 * - storageKey is the reference handed out to subscribers
 *   ("agents:results:data:{taskId}")
 * - payload is the JSON-serialized TaskResult, stored as text
 * - expiresAt is checked on every read; purgeExpired() reclaims space
 * - timestamps stored as integer (Unix epoch ms) for SQLite compatibility
 */
export const resultPayloads = sqliteTable(
  "result_payloads",
  {
    storageKey: text("storage_key").primaryKey(),
    taskId: text("task_id").notNull(),
    payload: text("payload").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    expiresAt: integer("expires_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    expiresAtIdx: index("idx_result_payloads_expires_at").on(table.expiresAt),
  })
);

/**
 * Task claims table - the first worker to insert a task ID runs the task
 *
 * Every worker on the hub receives every submitted request; the primary key
 * on taskId lets exactly one of them through. Rows expire like payloads and
 * are reclaimed by purgeExpired().
 */
export const taskClaims = sqliteTable(
  "task_claims",
  {
    taskId: text("task_id").primaryKey(),
    ownerId: text("owner_id").notNull(),
    claimedAt: integer("claimed_at", { mode: "timestamp_ms" }).notNull(),
    expiresAt: integer("expires_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    expiresAtIdx: index("idx_task_claims_expires_at").on(table.expiresAt),
  })
);

// Type exports for use in stores
export type ResultPayload = typeof resultPayloads.$inferSelect;
export type NewResultPayload = typeof resultPayloads.$inferInsert;
export type TaskClaim = typeof taskClaims.$inferSelect;
