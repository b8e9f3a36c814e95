/**
 * Enumerations shared by the explorer configuration and the engine.
 */

import { z } from "zod";

/**
 * What the merger does with a suggested topic that already exists
 * elsewhere in the tree.
 *
 *   skip        - drop it (reported as a "duplicate" rejection)
 *   cross-link  - link the expanded node to the existing one
 */
export const DuplicatePolicy = z.enum(["skip", "cross-link"]);
export type DuplicatePolicy = z.infer<typeof DuplicatePolicy>;

/**
 * How long an offered suggestion keeps filtering repeats for a node.
 *
 *   permanent - for the life of the session
 *   expire    - until `ttlMs` has passed since it was last offered
 */
export const SeenPolicyMode = z.enum(["permanent", "expire"]);
export type SeenPolicyMode = z.infer<typeof SeenPolicyMode>;

/** Time windows for the session history listing */
export const HistoryPeriod = z.enum(["all", "today", "week", "month"]);
export type HistoryPeriod = z.infer<typeof HistoryPeriod>;

/** Orderings for the session history listing */
export const HistorySort = z.enum(["newest", "oldest", "mostTopics", "longestDuration"]);
export type HistorySort = z.infer<typeof HistorySort>;
