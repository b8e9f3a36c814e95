/**
 * Session history store.
 *
 * Persists ended sessions through a PersistenceStore and answers history
 * queries over them.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WRITE ORDER
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   1. session:<id>    the record (the source of truth)
 *   2. archive:<id>    the derived ArchiveEntry
 *   3. owner:<owner>   the owner's index, newest first
 *
 * Steps 2 and 3 are derived from step 1, so a failure after step 1 is
 * repaired by persisting again: an already stored session is never
 * rewritten, but a missing entry or index row is rebuilt from it.
 */

import { z } from "zod";
import {
  CorruptRecordError,
  SessionNotFoundError,
  SessionStillActiveError,
} from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { ArchiveEntrySchema, toArchiveEntry, type ArchiveEntry } from "../archive/entry.js";
import type { ArchiveSearch } from "../archive/search.js";
import type { HistoryPeriod, HistorySort } from "../config/explorer/enums.js";
import type { SessionRecord } from "../session/record.js";
import { ExplorationSession } from "../session/session.js";
import { describeSession, type SessionMetadata } from "./metadata.js";
import type { PersistenceStore } from "./persistence.js";
import { decodeRecord } from "./serialization.js";

const SESSION_PREFIX = "session:";
const ARCHIVE_PREFIX = "archive:";
const OWNER_PREFIX = "owner:";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Window length per period; "all" has none */
const PERIOD_MS: Record<Exclude<HistoryPeriod, "all">, number> = {
  today: DAY_MS,
  week: 7 * DAY_MS,
  month: 30 * DAY_MS,
};

const OwnerIndexSchema = z.array(
  z
    .object({
      sessionId: z.string().min(1),
      startedAt: z.string().datetime(),
    })
    .strict()
);

type OwnerIndex = z.infer<typeof OwnerIndexSchema>;

export interface SessionQuery {
  period?: HistoryPeriod;
  sortBy?: HistorySort;
  limit?: number;
}

export interface SessionHistoryStoreOptions {
  /** Kept in step with every persist */
  archive?: ArchiveSearch;
  clock?: () => number;
  logger?: Logger;
}

export class SessionHistoryStore {
  private readonly archive: ArchiveSearch | undefined;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly store: PersistenceStore,
    options: SessionHistoryStoreOptions = {}
  ) {
    this.archive = options.archive;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  // ============================================================
  // Writes
  // ============================================================

  /**
   * Persist an ended session and return its archive entry.
   * A live session is ended first. Persisting the same session again
   * returns the stored entry without rewriting the record.
   *
   * @throws SessionStillActiveError for a record whose endedAt is null
   * @throws CorruptRecordError when the record or a stored copy is invalid
   * @throws StoreUnavailableError when the store fails (safe to retry)
   */
  async persist(source: ExplorationSession | SessionRecord): Promise<ArchiveEntry> {
    const candidate = source instanceof ExplorationSession ? source.end() : source;
    if (candidate.endedAt === null) {
      throw new SessionStillActiveError(candidate.sessionId);
    }

    const key = sessionKey(candidate.sessionId);
    const stored = await this.store.read(key);

    let record: SessionRecord;
    if (stored === undefined) {
      record = decodeRecord(key, candidate);
      await this.store.write(key, record);
      this.logger.info("Session persisted", {
        sessionId: record.sessionId,
        ownerRef: record.ownerRef,
      });
    } else {
      record = decodeRecord(key, stored);
      this.logger.debug("Session already persisted", { sessionId: record.sessionId });
    }

    const entry = await this.ensureEntry(record);
    await this.ensureOwnerIndex(record);
    this.archive?.index(entry);
    return entry;
  }

  /**
   * Delete a session, its archive entry and its owner index row.
   *
   * @returns false when the session was not stored
   */
  async remove(sessionId: string): Promise<boolean> {
    const key = sessionKey(sessionId);
    const stored = await this.store.read(key);
    if (stored === undefined) {
      return false;
    }
    const record = decodeRecord(key, stored);

    const ownerKey = ownerIndexKey(record.ownerRef);
    const index = await this.readOwnerIndex(record.ownerRef);
    await this.store.write(
      ownerKey,
      index.filter((row) => row.sessionId !== sessionId)
    );
    await this.store.delete(archiveKey(sessionId));
    await this.store.delete(key);
    this.archive?.remove(sessionId);
    this.logger.info("Session removed", { sessionId });
    return true;
  }

  // ============================================================
  // Reads
  // ============================================================

  /**
   * @throws SessionNotFoundError when no such session is stored
   */
  async get(sessionId: string): Promise<Readonly<SessionRecord>> {
    const key = sessionKey(sessionId);
    const stored = await this.store.read(key);
    if (stored === undefined) {
      throw new SessionNotFoundError(sessionId);
    }
    return decodeRecord(key, stored);
  }

  async has(sessionId: string): Promise<boolean> {
    return (await this.store.read(sessionKey(sessionId))) !== undefined;
  }

  /**
   * An owner's sessions, most recent first.
   *
   * Each iteration re-reads the owner index and loads records one at a
   * time, so the iterable can be walked repeatedly and always reflects the
   * store at the moment iteration starts.
   */
  listByOwner(ownerRef: string): AsyncIterable<SessionMetadata> {
    return {
      [Symbol.asyncIterator]: () => this.iterateOwner(ownerRef),
    };
  }

  /**
   * Filter, sort and cap an owner's sessions.
   *
   * Periods are rolling windows ending now: today (24 h), week (7 days),
   * month (30 days). Ties fall back to newest first.
   */
  async querySessions(ownerRef: string, query: SessionQuery = {}): Promise<SessionMetadata[]> {
    const period = query.period ?? "all";
    const sortBy = query.sortBy ?? "newest";
    const now = this.clock();

    const rows: SessionMetadata[] = [];
    for await (const row of this.listByOwner(ownerRef)) {
      if (period === "all" || now - Date.parse(row.startedAt) < PERIOD_MS[period]) {
        rows.push(row);
      }
    }

    rows.sort((a, b) => compareBy(sortBy, a, b) || compareNewest(a, b));
    return query.limit === undefined ? rows : rows.slice(0, query.limit);
  }

  /**
   * Every stored archive entry, for rebuilding an ArchiveSearch.
   */
  async *entries(): AsyncGenerator<ArchiveEntry> {
    for (const key of await this.store.keys(ARCHIVE_PREFIX)) {
      const value = await this.store.read(key);
      if (value === undefined) {
        continue;
      }
      const parsed = ArchiveEntrySchema.safeParse(value);
      if (!parsed.success) {
        throw new CorruptRecordError(key, "invalid archive entry");
      }
      yield parsed.data;
    }
  }

  /**
   * Index every stored entry into an archive.
   *
   * @returns Number of entries indexed
   */
  async rebuildArchive(archive: ArchiveSearch): Promise<number> {
    let count = 0;
    for await (const entry of this.entries()) {
      archive.index(entry);
      count++;
    }
    this.logger.debug("Archive rebuilt", { entries: count });
    return count;
  }

  /** Every owner with at least one stored session */
  async owners(): Promise<string[]> {
    const keys = await this.store.keys(OWNER_PREFIX);
    return keys.map((key) => key.slice(OWNER_PREFIX.length));
  }

  // ============================================================
  // Internals
  // ============================================================

  private async *iterateOwner(ownerRef: string): AsyncGenerator<SessionMetadata> {
    const index = await this.readOwnerIndex(ownerRef);
    for (const row of index) {
      const key = sessionKey(row.sessionId);
      const stored = await this.store.read(key);
      if (stored === undefined) {
        this.logger.warn("Owner index names a missing session", {
          ownerRef,
          sessionId: row.sessionId,
        });
        continue;
      }
      yield describeSession(decodeRecord(key, stored));
    }
  }

  private async ensureEntry(record: SessionRecord): Promise<ArchiveEntry> {
    const key = archiveKey(record.sessionId);
    const stored = ArchiveEntrySchema.safeParse(await this.store.read(key));
    if (stored.success) {
      return stored.data;
    }
    const entry = toArchiveEntry(record);
    await this.store.write(key, entry);
    return entry;
  }

  private async ensureOwnerIndex(record: SessionRecord): Promise<void> {
    const index = await this.readOwnerIndex(record.ownerRef);
    if (index.some((row) => row.sessionId === record.sessionId)) {
      return;
    }
    const next: OwnerIndex = [
      ...index,
      { sessionId: record.sessionId, startedAt: record.startedAt },
    ];
    next.sort(
      (a, b) =>
        Date.parse(b.startedAt) - Date.parse(a.startedAt) ||
        compareStrings(a.sessionId, b.sessionId)
    );
    await this.store.write(ownerIndexKey(record.ownerRef), next);
  }

  private async readOwnerIndex(ownerRef: string): Promise<OwnerIndex> {
    const key = ownerIndexKey(ownerRef);
    const value = await this.store.read(key);
    if (value === undefined) {
      return [];
    }
    const parsed = OwnerIndexSchema.safeParse(value);
    if (!parsed.success) {
      throw new CorruptRecordError(key, "invalid owner index");
    }
    return parsed.data;
  }
}

function sessionKey(sessionId: string): string {
  return `${SESSION_PREFIX}${sessionId}`;
}

function archiveKey(sessionId: string): string {
  return `${ARCHIVE_PREFIX}${sessionId}`;
}

function ownerIndexKey(ownerRef: string): string {
  return `${OWNER_PREFIX}${ownerRef}`;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareNewest(a: SessionMetadata, b: SessionMetadata): number {
  return (
    Date.parse(b.startedAt) - Date.parse(a.startedAt) || compareStrings(a.sessionId, b.sessionId)
  );
}

function compareBy(sortBy: HistorySort, a: SessionMetadata, b: SessionMetadata): number {
  switch (sortBy) {
    case "newest":
      return compareNewest(a, b);
    case "oldest":
      return Date.parse(a.startedAt) - Date.parse(b.startedAt);
    case "mostTopics":
      return b.nodeCount - a.nodeCount;
    case "longestDuration":
      return b.totalDwellMs - a.totalDwellMs;
  }
}
