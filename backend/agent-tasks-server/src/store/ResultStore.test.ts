/**
 * ResultStore Tests
 *
 * The same contract is checked against the SQLite and in-memory stores.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { createTestDatabase, TestDatabase } from "../db/testUtils";
import { ResultStore, RESULT_KEY_PREFIX, resultStorageKey } from "./ResultStore";
import { SqliteResultStore } from "./SqliteResultStore";
import { MemoryResultStore } from "./MemoryResultStore";

const HOUR_MS = 60 * 60 * 1000;

interface StoreFixture {
  store: ResultStore;
  advance(ms: number): void;
  close(): void;
}

function fixedClock(): { clock: () => Date; advance(ms: number): void } {
  let now = Date.parse("2026-01-15T10:00:00.000Z");
  return {
    clock: () => new Date(now),
    advance: (ms) => {
      now += ms;
    },
  };
}

const implementations: Array<[string, () => StoreFixture]> = [
  [
    "SqliteResultStore",
    () => {
      const testDb: TestDatabase = createTestDatabase();
      const time = fixedClock();
      return {
        store: new SqliteResultStore(testDb.db, { clock: time.clock }),
        advance: time.advance,
        close: testDb.close,
      };
    },
  ],
  [
    "MemoryResultStore",
    () => {
      const time = fixedClock();
      return {
        store: new MemoryResultStore({ clock: time.clock }),
        advance: time.advance,
        close: () => undefined,
      };
    },
  ],
];

describe("resultStorageKey", () => {
  it("prefixes the task ID", () => {
    assert.equal(RESULT_KEY_PREFIX, "agents:results:data:");
    assert.equal(resultStorageKey("abc123"), "agents:results:data:abc123");
  });
});

for (const [name, createFixture] of implementations) {
  describe(name, () => {
    let fixture: StoreFixture;

    beforeEach(() => {
      fixture = createFixture();
    });

    afterEach(() => {
      fixture.close();
    });

    it("returns the storage key as the reference and reads the payload back", async () => {
      const reference = await fixture.store.put("task-1", '{"big":true}', HOUR_MS);

      assert.equal(reference, "agents:results:data:task-1");
      assert.equal(await fixture.store.get(reference), '{"big":true}');
    });

    it("returns null for an unknown reference", async () => {
      assert.equal(await fixture.store.get("agents:results:data:missing"), null);
    });

    it("never returns a payload after its TTL", async () => {
      const reference = await fixture.store.put("task-2", "payload", HOUR_MS);

      fixture.advance(HOUR_MS - 1);
      assert.equal(await fixture.store.get(reference), "payload");

      fixture.advance(1);
      assert.equal(await fixture.store.get(reference), null);
    });

    it("overwrites an existing entry (last writer wins)", async () => {
      await fixture.store.put("task-3", "first", HOUR_MS);
      const reference = await fixture.store.put("task-3", "second", HOUR_MS);

      assert.equal(await fixture.store.get(reference), "second");
    });

    it("deletes an entry", async () => {
      const reference = await fixture.store.put("task-4", "payload", HOUR_MS);

      assert.equal(await fixture.store.delete(reference), true);
      assert.equal(await fixture.store.delete(reference), false);
      assert.equal(await fixture.store.get(reference), null);
    });

    it("purges only expired entries", async () => {
      await fixture.store.put("short", "a", 1000);
      await fixture.store.put("long", "b", HOUR_MS);

      fixture.advance(5000);

      assert.equal(await fixture.store.purgeExpired(), 1);
      assert.equal(await fixture.store.get(resultStorageKey("long")), "b");
      assert.equal(await fixture.store.purgeExpired(), 0);
    });

    it("lets only the first claim on a task ID through until it expires", async () => {
      assert.equal(await fixture.store.claim("task-5", "worker-a", HOUR_MS), true);
      assert.equal(await fixture.store.claim("task-5", "worker-b", HOUR_MS), false);
      assert.equal(await fixture.store.claim("task-5", "worker-a", HOUR_MS), false);
      assert.equal(await fixture.store.claim("task-6", "worker-b", HOUR_MS), true);

      fixture.advance(HOUR_MS);
      assert.equal(await fixture.store.claim("task-5", "worker-b", HOUR_MS), true);
    });

    it("grants exactly one of many concurrent claims", async () => {
      const outcomes = await Promise.all(
        Array.from({ length: 5 }, (_, i) => fixture.store.claim("task-7", `worker-${i}`, HOUR_MS))
      );

      assert.equal(outcomes.filter(Boolean).length, 1);
    });

    it("purges expired claims along with payloads", async () => {
      await fixture.store.put("short", "a", 1000);
      await fixture.store.claim("short", "worker-a", 1000);
      await fixture.store.claim("long", "worker-a", HOUR_MS);

      fixture.advance(5000);

      assert.equal(await fixture.store.purgeExpired(), 2);
      assert.equal(await fixture.store.claim("long", "worker-b", HOUR_MS), false);
    });

    it("handles concurrent writes for different tasks", async () => {
      const references = await Promise.all(
        Array.from({ length: 20 }, (_, i) => fixture.store.put(`task-${i}`, `payload-${i}`, HOUR_MS))
      );
      const payloads = await Promise.all(references.map((reference) => fixture.store.get(reference)));

      assert.deepEqual(
        payloads,
        Array.from({ length: 20 }, (_, i) => `payload-${i}`)
      );
    });
  });
}
