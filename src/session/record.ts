/**
 * Session record schema.
 *
 * A SessionRecord is the persisted form of an ExplorationSession: the tree
 * snapshot plus everything measured while the user explored it. Records are
 * written once, validated on every read, and handed out deep-frozen.
 */

import { z } from "zod";
import { TreeSnapshotSchema } from "../tree/snapshot.js";

/**
 * Bump the major version when a change breaks existing records.
 */
export const RECORD_VERSION = "1.0.0";

export const SuggestionLogEntrySchema = z
  .object({
    nodeId: z.string().min(1),
    /** ISO time the provider was asked */
    requestedAt: z.string().datetime(),
    /** Candidate strings exactly as offered, in rank order */
    offered: z.array(z.string()),
    /** Node ids created by this expansion */
    accepted: z.array(z.string().min(1)),
    /** Existing node ids cross-linked by this expansion */
    linked: z.array(z.string().min(1)),
  })
  .strict();

export type SuggestionLogEntry = z.infer<typeof SuggestionLogEntrySchema>;

export const SessionRecordSchema = z
  .object({
    recordVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
    sessionId: z.string().min(1),
    ownerRef: z.string().min(1),
    startedAt: z.string().datetime(),
    /** null while the session is still open */
    endedAt: z.string().datetime().nullable(),
    tree: TreeSnapshotSchema,
    /** node id -> milliseconds focused; may name nodes no longer in the tree */
    perNodeDwell: z.record(z.string(), z.number().nonnegative()),
    /** Normalized, unique, in insertion order */
    tags: z.array(z.string().min(1)),
    suggestionsLog: z.array(SuggestionLogEntrySchema),
  })
  .strict();

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

/**
 * A record whose session has ended.
 */
export type EndedSessionRecord = SessionRecord & { readonly endedAt: string };

export function isEnded(record: SessionRecord): record is EndedSessionRecord {
  return record.endedAt !== null;
}
