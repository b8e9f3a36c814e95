/**
 * Session history store tests.
 *
 * Run: node --import tsx --test src/history/store.test.ts
 *
 * Tests cover:
 *   1. Persist - live sessions, idempotence, open records, retry after failure
 *   2. Reads - get, listByOwner (restartable), querySessions filters and sorts
 *   3. Archive wiring and the JSON-file store
 */

import { describe, it, after } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  CorruptRecordError,
  SessionNotFoundError,
  SessionStillActiveError,
  StoreUnavailableError,
} from "../errors.js";
import { ArchiveSearch } from "../archive/search.js";
import { ExplorationSession } from "../session/session.js";
import type { EndedSessionRecord } from "../session/record.js";
import type { SuggestionProvider } from "../suggestions/provider.js";
import {
  FilePersistenceStore,
  MemoryPersistenceStore,
  type PersistenceStore,
} from "./persistence.js";
import { SessionHistoryStore } from "./store.js";
import type { SessionMetadata } from "./metadata.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

const NOW = Date.UTC(2025, 5, 30, 12, 0, 0);
const HOUR = 3_600_000;
const DAY = 24 * HOUR;

function offering(...topics: string[]): SuggestionProvider {
  return { suggest: async () => topics.map((t) => ({ candidateTopic: t })) };
}

interface RecordSpec {
  id: string;
  owner?: string;
  root: string;
  startedAt: number;
  children?: string[];
  dwellMs?: number;
  tags?: string[];
}

async function liveSession(spec: RecordSpec): Promise<ExplorationSession> {
  const session = ExplorationSession.start({
    sessionId: spec.id,
    ownerRef: spec.owner ?? "user-1",
    rootTopic: spec.root,
    provider: offering(...(spec.children ?? [])),
    tags: spec.tags ?? [],
    clock: () => spec.startedAt,
  });
  if ((spec.children ?? []).length > 0) {
    await session.expand("n1");
  }
  session.focus("n1", spec.startedAt);
  return session;
}

async function endedRecord(spec: RecordSpec): Promise<EndedSessionRecord> {
  const session = await liveSession(spec);
  return session.end(spec.startedAt + (spec.dwellMs ?? 0));
}

/**
 * Memory store that fails writes to keys with a given prefix, a set
 * number of times, and counts successful writes per key.
 */
class FlakyStore implements PersistenceStore {
  readonly inner = new MemoryPersistenceStore();
  readonly writes = new Map<string, number>();

  constructor(
    private readonly failPrefix: string,
    private failuresLeft: number
  ) {}

  read(key: string) {
    return this.inner.read(key);
  }

  async write(key: string, value: unknown) {
    if (key.startsWith(this.failPrefix) && this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new StoreUnavailableError(key, { cause: new Error("disk full") });
    }
    this.writes.set(key, (this.writes.get(key) ?? 0) + 1);
    await this.inner.write(key, value);
  }

  delete(key: string) {
    return this.inner.delete(key);
  }

  keys(prefix: string) {
    return this.inner.keys(prefix);
  }
}

async function collect(iterable: AsyncIterable<SessionMetadata>): Promise<string[]> {
  const ids: string[] = [];
  for await (const row of iterable) {
    ids.push(row.sessionId);
  }
  return ids;
}

const ML: RecordSpec = {
  id: "s-ml",
  root: "Machine Learning",
  startedAt: NOW - HOUR,
  children: ["Neural Networks", "Decision Trees"],
  dwellMs: 90_000,
  tags: ["AI"],
};

// ═══════════════════════════════════════════════════════════════════════════
// PERSIST
// ═══════════════════════════════════════════════════════════════════════════

describe("persist", () => {
  it("ends a live session and returns its archive entry", async () => {
    const history = new SessionHistoryStore(new MemoryPersistenceStore());
    const session = await liveSession(ML);

    const entry = await history.persist(session);

    assert.equal(session.ended, true);
    assert.deepEqual(entry, {
      sessionId: "s-ml",
      ownerRef: "user-1",
      rootTopic: "Machine Learning",
      indexedTerms: ["decision", "learning", "machine", "networks", "neural", "trees"],
      tags: ["ai"],
      startedAt: "2025-06-30T11:00:00.000Z",
    });
    assert.deepEqual(await history.get("s-ml"), session.end());
  });

  it("returns the stored entry when persisted again", async () => {
    const store = new FlakyStore("none:", 0);
    const history = new SessionHistoryStore(store);
    const record = await endedRecord(ML);

    const first = await history.persist(record);
    const second = await history.persist(record);

    assert.deepEqual(second, first);
    assert.equal(store.writes.get("session:s-ml"), 1);
    assert.equal(store.writes.get("archive:s-ml"), 1);
    assert.equal(store.writes.get("owner:user-1"), 1);
  });

  it("refuses a record that has not ended", async () => {
    const history = new SessionHistoryStore(new MemoryPersistenceStore());
    const session = await liveSession(ML);
    await assert.rejects(history.persist(session.toRecord()), SessionStillActiveError);
    assert.equal(await history.has("s-ml"), false);
  });

  it("rebuilds a missing entry on retry after a store failure", async () => {
    const store = new FlakyStore("archive:", 1);
    const history = new SessionHistoryStore(store);
    const record = await endedRecord(ML);

    await assert.rejects(history.persist(record), (err: unknown) => {
      assert.ok(err instanceof StoreUnavailableError);
      assert.equal(err.retryable, true);
      return true;
    });
    assert.equal(await history.has("s-ml"), true);
    assert.deepEqual(await store.keys("archive:"), []);

    const entry = await history.persist(record);
    assert.equal(entry.sessionId, "s-ml");
    assert.deepEqual(await store.keys(""), ["archive:s-ml", "owner:user-1", "session:s-ml"]);
    assert.equal(store.writes.get("session:s-ml"), 1);
  });

  it("indexes into a connected archive", async () => {
    const archive = new ArchiveSearch();
    const history = new SessionHistoryStore(new MemoryPersistenceStore(), { archive });
    await history.persist(await endedRecord(ML));
    assert.deepEqual(archive.search("neural"), ["s-ml"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// READS
// ═══════════════════════════════════════════════════════════════════════════

describe("get", () => {
  it("throws SessionNotFoundError for an unknown id", async () => {
    const history = new SessionHistoryStore(new MemoryPersistenceStore());
    await assert.rejects(history.get("s-nope"), SessionNotFoundError);
  });

  it("returns frozen records", async () => {
    const history = new SessionHistoryStore(new MemoryPersistenceStore());
    await history.persist(await endedRecord(ML));
    const record = await history.get("s-ml");
    assert.ok(Object.isFrozen(record));
    assert.ok(Object.isFrozen(record.tags));
  });

  it("reports a corrupt stored record", async () => {
    const store = new MemoryPersistenceStore();
    await store.write("session:s-bad", { sessionId: "s-bad" });
    const history = new SessionHistoryStore(store);
    await assert.rejects(history.get("s-bad"), CorruptRecordError);
  });
});

describe("listByOwner", () => {
  it("lists most recent first and can be walked again", async () => {
    const history = new SessionHistoryStore(new MemoryPersistenceStore());
    await history.persist(await endedRecord({ id: "s-b", root: "Rivers", startedAt: NOW - 2 * DAY }));
    await history.persist(await endedRecord({ id: "s-a", root: "Glaciers", startedAt: NOW - DAY }));
    await history.persist(
      await endedRecord({ id: "s-x", owner: "user-2", root: "Deserts", startedAt: NOW })
    );

    const listing = history.listByOwner("user-1");
    assert.deepEqual(await collect(listing), ["s-a", "s-b"]);
    assert.deepEqual(await collect(listing), ["s-a", "s-b"]);

    await history.persist(await endedRecord({ id: "s-c", root: "Oceans", startedAt: NOW - 3 * DAY }));
    assert.deepEqual(await collect(listing), ["s-a", "s-b", "s-c"]);
    assert.deepEqual(await collect(history.listByOwner("nobody")), []);
  });

  it("describes each session", async () => {
    const history = new SessionHistoryStore(new MemoryPersistenceStore());
    await history.persist(await endedRecord(ML));
    const rows: SessionMetadata[] = [];
    for await (const row of history.listByOwner("user-1")) {
      rows.push(row);
    }
    assert.deepEqual(rows, [
      {
        sessionId: "s-ml",
        ownerRef: "user-1",
        rootTopic: "Machine Learning",
        startedAt: "2025-06-30T11:00:00.000Z",
        endedAt: "2025-06-30T11:01:30.000Z",
        nodeCount: 3,
        crossLinkCount: 0,
        totalDwellMs: 90_000,
        tags: ["ai"],
      },
    ]);
  });
});

describe("querySessions", () => {
  async function populated(): Promise<SessionHistoryStore> {
    const history = new SessionHistoryStore(new MemoryPersistenceStore(), { clock: () => NOW });
    const specs: RecordSpec[] = [
      { id: "s-hour", root: "Volcanoes", startedAt: NOW - 2 * HOUR, dwellMs: 1_000 },
      {
        id: "s-days",
        root: "Magma",
        startedAt: NOW - 3 * DAY,
        children: ["Basalt", "Obsidian", "Pumice"],
        dwellMs: 5_000,
      },
      {
        id: "s-weeks",
        root: "Plates",
        startedAt: NOW - 20 * DAY,
        children: ["Rifts"],
        dwellMs: 9_000,
      },
      { id: "s-months", root: "Geysers", startedAt: NOW - 60 * DAY, dwellMs: 3_000 },
    ];
    for (const spec of specs) {
      await history.persist(await endedRecord(spec));
    }
    return history;
  }

  const ids = (rows: SessionMetadata[]) => rows.map((r) => r.sessionId);

  it("filters by rolling period", async () => {
    const history = await populated();
    assert.deepEqual(ids(await history.querySessions("user-1", { period: "today" })), ["s-hour"]);
    assert.deepEqual(ids(await history.querySessions("user-1", { period: "week" })), [
      "s-hour",
      "s-days",
    ]);
    assert.deepEqual(ids(await history.querySessions("user-1", { period: "month" })), [
      "s-hour",
      "s-days",
      "s-weeks",
    ]);
    assert.equal((await history.querySessions("user-1")).length, 4);
  });

  it("sorts and limits", async () => {
    const history = await populated();
    assert.deepEqual(ids(await history.querySessions("user-1", { sortBy: "oldest" })), [
      "s-months",
      "s-weeks",
      "s-days",
      "s-hour",
    ]);
    assert.deepEqual(
      ids(await history.querySessions("user-1", { sortBy: "mostTopics", limit: 2 })),
      ["s-days", "s-weeks"]
    );
    assert.deepEqual(ids(await history.querySessions("user-1", { sortBy: "longestDuration" })), [
      "s-weeks",
      "s-days",
      "s-months",
      "s-hour",
    ]);
  });
});

describe("remove", () => {
  it("deletes the record, entry and index row", async () => {
    const store = new MemoryPersistenceStore();
    const archive = new ArchiveSearch();
    const history = new SessionHistoryStore(store, { archive });
    await history.persist(await endedRecord(ML));

    assert.equal(await history.remove("s-ml"), true);
    assert.equal(await history.remove("s-ml"), false);
    assert.deepEqual(await store.keys("session:"), []);
    assert.deepEqual(await store.keys("archive:"), []);
    assert.deepEqual(await collect(history.listByOwner("user-1")), []);
    assert.equal(archive.size, 0);
  });
});

describe("entries", () => {
  it("re-hydrates an archive from the store", async () => {
    const store = new MemoryPersistenceStore();
    await new SessionHistoryStore(store).persist(await endedRecord(ML));

    const archive = new ArchiveSearch();
    assert.equal(await new SessionHistoryStore(store).rebuildArchive(archive), 1);
    assert.deepEqual(archive.search("machine"), ["s-ml"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// JSON FILE STORE
// ═══════════════════════════════════════════════════════════════════════════

describe("FilePersistenceStore", () => {
  const dir = mkdtempSync(join(tmpdir(), "explorer-store-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  it("round-trips values under any key", async () => {
    const store = new FilePersistenceStore(join(dir, "roundtrip"));
    assert.equal(await store.read("owner:a/b c"), undefined);
    assert.deepEqual(await store.keys("owner:"), []);

    await store.write("owner:a/b c", [{ sessionId: "s-1" }]);
    await store.write("session:s-1", { ok: true });
    assert.deepEqual(await store.read("owner:a/b c"), [{ sessionId: "s-1" }]);
    assert.deepEqual(await store.keys("owner:"), ["owner:a/b c"]);

    await store.delete("owner:a/b c");
    await store.delete("owner:a/b c");
    assert.deepEqual(await store.keys(""), ["session:s-1"]);
  });

  it("reports unreadable files as StoreUnavailableError", async () => {
    const store = new FilePersistenceStore(dir);
    writeFileSync(join(dir, `${encodeURIComponent("session:s-torn")}.json`), "{ not json");
    await assert.rejects(store.read("session:s-torn"), StoreUnavailableError);
  });

  it("backs a history store", async () => {
    const history = new SessionHistoryStore(new FilePersistenceStore(join(dir, "history")));
    const record = await endedRecord(ML);
    await history.persist(record);
    assert.deepEqual(await history.get("s-ml"), record);
  });
});
