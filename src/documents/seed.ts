/**
 * Grow a tree from document seeds.
 */

import { CycleError, InvalidTopicError } from "../errors.js";
import type { KnowledgeTree } from "../tree/knowledge-tree.js";
import type { AttachedTopic } from "../suggestions/merger.js";

export interface SeedRejection {
  readonly seed: string;
  readonly reason: "invalid" | "ancestor";
}

export interface SeedResult {
  /** Root of the tree after seeding; null when the tree is still empty */
  readonly rootId: string | null;
  /** True when the first seed became the root */
  readonly rootCreated: boolean;
  readonly created: readonly AttachedTopic[];
  readonly linked: readonly AttachedTopic[];
  readonly rejected: readonly SeedRejection[];
}

/**
 * Attach seeds under the tree's root. On an empty tree the first usable
 * seed becomes the root. Seeds that exist elsewhere in the tree are linked
 * rather than duplicated.
 */
export function seedTree(tree: KnowledgeTree, seeds: Iterable<string>): SeedResult {
  const created: AttachedTopic[] = [];
  const linked: AttachedTopic[] = [];
  const rejected: SeedRejection[] = [];
  let rootCreated = false;

  for (const seed of seeds) {
    try {
      const rootId = tree.rootId;
      if (rootId === null) {
        tree.createRoot(seed);
        rootCreated = true;
        continue;
      }
      const result = tree.attachChild(rootId, seed);
      const entry = { nodeId: result.nodeId, topic: result.topic };
      if (result.kind === "created") {
        created.push(entry);
      } else {
        linked.push(entry);
      }
    } catch (err) {
      if (err instanceof InvalidTopicError) {
        rejected.push({ seed, reason: "invalid" });
      } else if (err instanceof CycleError) {
        rejected.push({ seed, reason: "ancestor" });
      } else {
        throw err;
      }
    }
  }

  return { rootId: tree.rootId, rootCreated, created, linked, rejected };
}
