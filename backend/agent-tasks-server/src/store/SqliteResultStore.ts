/**
 * SqliteResultStore
 *
 * ResultStore backed by the result_payloads table. Several processes may
 * share the same database file; writes are upserts (last writer wins), which
 * is safe because each task ID is written at most once. Claims are plain
 * inserts that lose on conflict.
 */

import { and, eq, gt, lte } from "drizzle-orm";
import { ResultStoreError } from "../errors";
import { AgentTasksDatabase } from "../db/connection";
import { resultPayloads, taskClaims } from "../db/schema";
import { ResultStore, resultStorageKey } from "./ResultStore";

export interface SqliteResultStoreOptions {
  /** Time source for expiry checks (default: () => new Date()) */
  clock?: () => Date;
}

export class SqliteResultStore implements ResultStore {
  private readonly db: AgentTasksDatabase;
  private readonly clock: () => Date;

  constructor(db: AgentTasksDatabase, options: SqliteResultStoreOptions = {}) {
    this.db = db;
    this.clock = options.clock ?? (() => new Date());
  }

  async put(taskId: string, payload: string, ttlMs: number): Promise<string> {
    const storageKey = resultStorageKey(taskId);
    const createdAt = this.clock();
    const expiresAt = new Date(createdAt.getTime() + ttlMs);

    try {
      this.db
        .insert(resultPayloads)
        .values({ storageKey, taskId, payload, createdAt, expiresAt })
        .onConflictDoUpdate({
          target: resultPayloads.storageKey,
          set: { taskId, payload, createdAt, expiresAt },
        })
        .run();
    } catch (error) {
      throw new ResultStoreError(`Failed to store result for task ${taskId}`, { cause: error });
    }

    return storageKey;
  }

  async get(reference: string): Promise<string | null> {
    const rows = this.db
      .select({ payload: resultPayloads.payload })
      .from(resultPayloads)
      .where(and(eq(resultPayloads.storageKey, reference), gt(resultPayloads.expiresAt, this.clock())))
      .all();

    return rows[0]?.payload ?? null;
  }

  async delete(reference: string): Promise<boolean> {
    const result = this.db.delete(resultPayloads).where(eq(resultPayloads.storageKey, reference)).run();
    return result.changes > 0;
  }

  async claim(taskId: string, ownerId: string, ttlMs: number): Promise<boolean> {
    const claimedAt = this.clock();
    const expiresAt = new Date(claimedAt.getTime() + ttlMs);

    try {
      // An expired claim no longer blocks the task
      this.db
        .delete(taskClaims)
        .where(and(eq(taskClaims.taskId, taskId), lte(taskClaims.expiresAt, claimedAt)))
        .run();

      const result = this.db
        .insert(taskClaims)
        .values({ taskId, ownerId, claimedAt, expiresAt })
        .onConflictDoNothing({ target: taskClaims.taskId })
        .run();

      return result.changes > 0;
    } catch (error) {
      throw new ResultStoreError(`Failed to claim task ${taskId}`, { cause: error });
    }
  }

  async purgeExpired(): Promise<number> {
    const now = this.clock();
    const payloads = this.db.delete(resultPayloads).where(lte(resultPayloads.expiresAt, now)).run();
    const claims = this.db.delete(taskClaims).where(lte(taskClaims.expiresAt, now)).run();
    return payloads.changes + claims.changes;
  }
}
