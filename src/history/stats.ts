/**
 * Learning statistics over stored sessions.
 *
 *   knowledgeScore = floor(nodes * 10 + connections * 5 + hours * 20)
 *
 * where connections count both ownership edges (nodeCount - 1 per tree)
 * and cross-links. The streak counts consecutive UTC days with at least one
 * session, ending today; a day without sessions today means a streak of 0.
 */

import { formatTopic, normalizeKey } from "../topics/normalizer.js";
import type { SessionMetadata } from "./metadata.js";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;
const FAVORITE_COUNT = 3;

export interface LearningTotals {
  readonly sessions: number;
  readonly nodes: number;
  readonly connections: number;
  readonly learningHours: number;
  readonly knowledgeScore: number;
}

export interface LearningStats extends LearningTotals {
  /** Same measures restricted to sessions started in the last 7 days */
  readonly thisWeek: LearningTotals;
  readonly streakDays: number;
  /** Most frequent root topics, title-cased, most frequent first */
  readonly favoriteTopics: readonly string[];
}

export function computeLearningStats(
  sessions: readonly SessionMetadata[],
  now: number = Date.now()
): LearningStats {
  const recent = sessions.filter((s) => now - Date.parse(s.startedAt) < WEEK_MS);
  return {
    ...computeTotals(sessions),
    thisWeek: computeTotals(recent),
    streakDays: computeStreak(sessions, now),
    favoriteTopics: favoriteTopics(sessions),
  };
}

export function computeTotals(sessions: readonly SessionMetadata[]): LearningTotals {
  let nodes = 0;
  let connections = 0;
  let dwellMs = 0;
  for (const s of sessions) {
    nodes += s.nodeCount;
    connections += Math.max(s.nodeCount - 1, 0) + s.crossLinkCount;
    dwellMs += s.totalDwellMs;
  }
  const learningHours = dwellMs / HOUR_MS;
  return {
    sessions: sessions.length,
    nodes,
    connections,
    learningHours,
    knowledgeScore: Math.floor(nodes * 10 + connections * 5 + learningHours * 20),
  };
}

export function computeStreak(sessions: readonly SessionMetadata[], now: number): number {
  const days = new Set(sessions.map((s) => utcDay(Date.parse(s.startedAt))));
  let streak = 0;
  let day = utcDay(now);
  while (days.has(day)) {
    streak++;
    day -= 1;
  }
  return streak;
}

export function favoriteTopics(sessions: readonly SessionMetadata[]): string[] {
  const counts = new Map<string, { display: string; count: number }>();
  for (const s of sessions) {
    const key = normalizeKey(s.rootTopic);
    const current = counts.get(key);
    if (current) {
      current.count++;
    } else {
      counts.set(key, { display: formatTopic(s.rootTopic), count: 1 });
    }
  }
  return [...counts.values()]
    .sort((a, b) => b.count - a.count || (a.display < b.display ? -1 : a.display > b.display ? 1 : 0))
    .slice(0, FAVORITE_COUNT)
    .map((t) => t.display);
}

/** Days since the epoch, in UTC */
function utcDay(ms: number): number {
  return Math.floor(ms / DAY_MS);
}
