/**
 * ResultStore
 *
 * Durable key/value storage for result payloads that are too large for the
 * notification channel. Entries expire after their TTL; a miss (null) is an
 * ordinary outcome, not an error.
 *
 * The same storage holds task claims, which every worker sharing it consults
 * before running a task.
 */

export const RESULT_KEY_PREFIX = "agents:results:data:";

/**
 * The reference handed out by put(). Derived from the task ID, so each task
 * maps to exactly one entry.
 */
export function resultStorageKey(taskId: string): string {
  return `${RESULT_KEY_PREFIX}${taskId}`;
}

export interface ResultStore {
  /**
   * Store a payload, replacing any previous entry for the same task.
   *
   * @returns The reference to pass to get()
   * @throws ResultStoreError when the payload cannot be written
   */
  put(taskId: string, payload: string, ttlMs: number): Promise<string>;

  /**
   * Look up a payload by reference.
   *
   * @returns The payload, or null if it never existed or has expired
   */
  get(reference: string): Promise<string | null>;

  /**
   * @returns true if an entry was removed
   */
  delete(reference: string): Promise<boolean>;

  /**
   * Record that `ownerId` runs a task. Only the first claim for a task ID
   * succeeds until it expires.
   *
   * @returns true if this call took the claim
   * @throws ResultStoreError when the claim cannot be recorded
   */
  claim(taskId: string, ownerId: string, ttlMs: number): Promise<boolean>;

  /**
   * Drop expired payloads and claims.
   *
   * @returns Number of entries removed
   */
  purgeExpired(): Promise<number>;
}
