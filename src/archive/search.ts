/**
 * In-memory archive search over past sessions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * RANKING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   1. Tag filter: an entry must carry EVERY requested tag (normalized).
 *   2. Score: number of distinct query tokens found in the entry's
 *      indexedTerms. With a non-empty query, score-0 entries are dropped;
 *      an empty query keeps every entry that passed the filter (score 0).
 *   3. Order: score desc, then startedAt desc, then sessionId asc.
 *
 * The index holds at most one entry per sessionId; indexing again replaces.
 */

import { silentLogger, type Logger } from "../logging/index.js";
import { normalizeKey, normalizeTag, tokenize } from "../topics/normalizer.js";
import { ArchiveEntrySchema, type ArchiveEntry } from "./entry.js";

export interface SearchOptions {
  /** Only sessions owned by this user */
  ownerRef?: string;
  /** Maximum hits; overrides the index default */
  limit?: number;
}

export interface SearchHit {
  readonly sessionId: string;
  readonly score: number;
  readonly entry: ArchiveEntry;
}

export interface ArchiveSearchOptions {
  /** Hits returned when a search sets no limit; unbounded when omitted */
  defaultLimit?: number;
  logger?: Logger;
}

interface IndexedEntry {
  readonly entry: ArchiveEntry;
  readonly terms: ReadonlySet<string>;
  readonly tags: ReadonlySet<string>;
  readonly startedAtMs: number;
}

export class ArchiveSearch {
  private readonly entries = new Map<string, IndexedEntry>();
  private readonly defaultLimit: number | undefined;
  private readonly logger: Logger;

  constructor(options: ArchiveSearchOptions = {}) {
    this.defaultLimit = options.defaultLimit;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Add an entry, replacing any earlier entry for the same session.
   */
  index(entry: ArchiveEntry): void {
    const parsed = ArchiveEntrySchema.parse(entry);
    Object.freeze(parsed.indexedTerms);
    Object.freeze(parsed.tags);
    this.entries.set(entry.sessionId, {
      entry: Object.freeze(parsed),
      // Normalized the same way as queries and tag filters
      terms: new Set(parsed.indexedTerms.flatMap(tokenize)),
      tags: new Set(parsed.tags.map(normalizeKey).filter((tag) => tag.length > 0)),
      startedAtMs: Date.parse(parsed.startedAt),
    });
    this.logger.debug("Archive entry indexed", {
      sessionId: entry.sessionId,
      terms: parsed.indexedTerms.length,
    });
  }

  /**
   * @returns false when no entry existed
   */
  remove(sessionId: string): boolean {
    return this.entries.delete(sessionId);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Ranked session ids.
   *
   * @throws InvalidTopicError when a tag normalizes to nothing
   */
  search(query: string, tags: readonly string[] = [], options: SearchOptions = {}): string[] {
    return this.searchDetailed(query, tags, options).map((hit) => hit.sessionId);
  }

  /**
   * Ranked hits with their scores.
   */
  searchDetailed(
    query: string,
    tags: readonly string[] = [],
    options: SearchOptions = {}
  ): SearchHit[] {
    const requiredTags = tags.map(normalizeTag);
    const tokens = tokenize(query);

    const ranked: Array<{ hit: SearchHit; startedAtMs: number }> = [];
    for (const indexed of this.entries.values()) {
      if (options.ownerRef !== undefined && indexed.entry.ownerRef !== options.ownerRef) {
        continue;
      }
      if (!requiredTags.every((tag) => indexed.tags.has(tag))) {
        continue;
      }
      const score = tokens.filter((token) => indexed.terms.has(token)).length;
      if (tokens.length > 0 && score === 0) {
        continue;
      }
      ranked.push({
        hit: { sessionId: indexed.entry.sessionId, score, entry: indexed.entry },
        startedAtMs: indexed.startedAtMs,
      });
    }

    ranked.sort(
      (a, b) =>
        b.hit.score - a.hit.score ||
        b.startedAtMs - a.startedAtMs ||
        compareStrings(a.hit.sessionId, b.hit.sessionId)
    );

    const limit = options.limit ?? this.defaultLimit;
    const hits = ranked.map((r) => r.hit);
    return limit === undefined ? hits : hits.slice(0, limit);
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
