/**
 * Archive entry: the searchable projection of a session record.
 */

import { z } from "zod";
import { tokenize } from "../topics/normalizer.js";
import type { SessionRecord } from "../session/record.js";
import { rootTopicOf } from "../history/serialization.js";

export const ArchiveEntrySchema = z
  .object({
    sessionId: z.string().min(1),
    ownerRef: z.string().min(1),
    /** Display text of the root topic */
    rootTopic: z.string(),
    /** Sorted, unique search tokens of every topic and explanation in the tree */
    indexedTerms: z.array(z.string().min(1)),
    /** Normalized session tags */
    tags: z.array(z.string().min(1)),
    startedAt: z.string().datetime(),
  })
  .strict();

export type ArchiveEntry = z.infer<typeof ArchiveEntrySchema>;

/**
 * Derive the archive entry for a record.
 */
export function toArchiveEntry(record: SessionRecord): ArchiveEntry {
  const terms = new Set<string>();
  for (const node of record.tree.nodes) {
    for (const token of tokenize(node.topic.key)) {
      terms.add(token);
    }
    for (const token of tokenize(node.explanation ?? "")) {
      terms.add(token);
    }
  }
  return {
    sessionId: record.sessionId,
    ownerRef: record.ownerRef,
    rootTopic: rootTopicOf(record),
    indexedTerms: [...terms].sort(),
    tags: [...record.tags],
    startedAt: record.startedAt,
  };
}
