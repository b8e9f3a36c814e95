/**
 * Session metadata: the listing row for one stored session.
 */

import type { SessionRecord } from "../session/record.js";
import { rootTopicOf } from "./serialization.js";

export interface SessionMetadata {
  readonly sessionId: string;
  readonly ownerRef: string;
  /** Display text of the root topic */
  readonly rootTopic: string;
  readonly startedAt: string;
  readonly endedAt: string | null;
  readonly nodeCount: number;
  readonly crossLinkCount: number;
  readonly totalDwellMs: number;
  readonly tags: readonly string[];
}

export function describeSession(record: SessionRecord): SessionMetadata {
  let crossLinkCount = 0;
  for (const node of record.tree.nodes) {
    crossLinkCount += node.crossLinks.length;
  }
  let totalDwellMs = 0;
  for (const ms of Object.values(record.perNodeDwell)) {
    totalDwellMs += ms;
  }
  return {
    sessionId: record.sessionId,
    ownerRef: record.ownerRef,
    rootTopic: rootTopicOf(record),
    startedAt: record.startedAt,
    endedAt: record.endedAt,
    nodeCount: record.tree.nodes.length,
    crossLinkCount,
    totalDwellMs,
    tags: [...record.tags],
  };
}
