/**
 * Tree snapshot formats.
 *
 * Two shapes leave a KnowledgeTree:
 *
 * 1. RENDER SNAPSHOT: the read-only structure a renderer draws
 *    (`{ nodes: [{ id, topic, parentId, childIds, crossLinks }] }`).
 *    No timing or suggestion bookkeeping.
 *
 * 2. TREE SNAPSHOT: the lossless form stored inside a session record.
 *    Validated with zod on the way back in, then checked structurally by
 *    `checkTreeSnapshot` before KnowledgeTree.restore() trusts it.
 *
 * Nodes are listed in depth-first pre-order starting at the root.
 */

import { z } from "zod";
import { TopicSchema, type Topic } from "../topics/schema.js";

export const NodeSnapshotSchema = z
  .object({
    id: z.string().min(1),
    topic: TopicSchema,
    parentId: z.string().min(1).nullable(),
    childIds: z.array(z.string().min(1)),
    crossLinks: z.array(z.string().min(1)),
    createdAt: z.string().datetime(),
    cumulativeDwellMs: z.number().nonnegative(),
    /** normalized key -> epoch ms of the latest offer */
    suggestionsSeen: z.record(z.string(), z.number()),
    rationale: z.string().optional(),
    explanation: z.string().optional(),
  })
  .strict();

export type NodeSnapshot = z.infer<typeof NodeSnapshotSchema>;

export const TreeSnapshotSchema = z
  .object({
    rootId: z.string().min(1).nullable(),
    /** Next value of the node id counter; ids are never reused */
    nextSeq: z.number().int().positive(),
    nodes: z.array(NodeSnapshotSchema),
  })
  .strict();

export type TreeSnapshot = z.infer<typeof TreeSnapshotSchema>;

export interface RenderNode {
  readonly id: string;
  readonly topic: Topic;
  readonly parentId: string | null;
  readonly childIds: readonly string[];
  readonly crossLinks: readonly string[];
}

export interface RenderSnapshot {
  readonly nodes: readonly RenderNode[];
}

/**
 * Check the structural invariants of a schema-valid snapshot.
 *
 * @returns A list of problems; empty when the snapshot is sound
 */
export function checkTreeSnapshot(snapshot: TreeSnapshot): string[] {
  const problems: string[] = [];
  const byId = new Map<string, NodeSnapshot>();

  for (const node of snapshot.nodes) {
    if (byId.has(node.id)) {
      problems.push(`duplicate node id ${node.id}`);
    }
    byId.set(node.id, node);
  }

  if (snapshot.rootId === null) {
    if (snapshot.nodes.length > 0) {
      problems.push("nodes present without a root");
    }
    return problems;
  }

  const root = byId.get(snapshot.rootId);
  if (!root) {
    problems.push(`root ${snapshot.rootId} is not among the nodes`);
    return problems;
  }
  if (root.parentId !== null) {
    problems.push(`root ${root.id} has a parent`);
  }

  const keys = new Map<string, string>();
  for (const node of snapshot.nodes) {
    const owner = keys.get(node.topic.key);
    if (owner !== undefined) {
      problems.push(`topic "${node.topic.key}" owned by both ${owner} and ${node.id}`);
    }
    keys.set(node.topic.key, node.id);

    if (node.id !== root.id && node.parentId === null) {
      problems.push(`node ${node.id} has no parent`);
    }

    for (const childId of node.childIds) {
      const child = byId.get(childId);
      if (!child) {
        problems.push(`node ${node.id} lists missing child ${childId}`);
      } else if (child.parentId !== node.id) {
        problems.push(`child ${childId} does not point back to ${node.id}`);
      }
    }

    for (const linkId of node.crossLinks) {
      if (!byId.has(linkId)) {
        problems.push(`node ${node.id} cross-links missing node ${linkId}`);
      }
    }
  }

  // Everything must hang off the root exactly once
  const visited = new Set<string>();
  const stack = [root.id];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (visited.has(id)) {
      problems.push(`node ${id} reached twice from the root`);
      continue;
    }
    visited.add(id);
    const node = byId.get(id);
    if (node) {
      stack.push(...node.childIds);
    }
  }
  for (const id of byId.keys()) {
    if (!visited.has(id)) {
      problems.push(`node ${id} is not reachable from the root`);
    }
  }

  return problems;
}
