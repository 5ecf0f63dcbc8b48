/**
 * MemoryResultStore
 *
 * Process-local ResultStore for single-process deployments and tests.
 */

import { ResultStore, resultStorageKey } from "./ResultStore";

interface StoredPayload {
  payload: string;
  expiresAt: number;
}

export class MemoryResultStore implements ResultStore {
  private readonly entries: Map<string, StoredPayload> = new Map();
  /** Task ID → claim expiry (epoch ms) */
  private readonly claims: Map<string, number> = new Map();
  private readonly clock: () => Date;

  constructor(options: { clock?: () => Date } = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  async put(taskId: string, payload: string, ttlMs: number): Promise<string> {
    const storageKey = resultStorageKey(taskId);
    this.entries.set(storageKey, { payload, expiresAt: this.clock().getTime() + ttlMs });
    return storageKey;
  }

  async get(reference: string): Promise<string | null> {
    const entry = this.entries.get(reference);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.clock().getTime()) {
      this.entries.delete(reference);
      return null;
    }
    return entry.payload;
  }

  async delete(reference: string): Promise<boolean> {
    return this.entries.delete(reference);
  }

  async claim(taskId: string, _ownerId: string, ttlMs: number): Promise<boolean> {
    const now = this.clock().getTime();
    const expiresAt = this.claims.get(taskId);
    if (expiresAt !== undefined && expiresAt > now) {
      return false;
    }
    this.claims.set(taskId, now + ttlMs);
    return true;
  }

  async purgeExpired(): Promise<number> {
    const now = this.clock().getTime();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    for (const [taskId, expiresAt] of this.claims) {
      if (expiresAt <= now) {
        this.claims.delete(taskId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
