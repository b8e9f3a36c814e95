/**
 * Topic value object.
 *
 * A topic pairs the text the user (or the suggestion provider) wrote with
 * its normalized key. Identity is the key alone: two topics with equal keys
 * are the same concept no matter how they were spelled.
 *
 *   { key: "calvin cycle", display: "Calvin  Cycle!" }   (display is trimmed)
 */

import { z } from "zod";

export const TopicSchema = z
  .object({
    /** Normalized identity used for deduplication and cycle checks */
    key: z.string().min(1),
    /** Original text, trimmed and whitespace-collapsed */
    display: z.string().min(1),
  })
  .strict();

export type Topic = Readonly<z.infer<typeof TopicSchema>>;

/**
 * Compare two topics by normalized key.
 */
export function topicsEqual(a: Topic, b: Topic): boolean {
  return a.key === b.key;
}
