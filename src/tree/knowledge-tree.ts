/**
 * Knowledge tree with global topic deduplication.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * OWNERSHIP MODEL
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Nodes live in an arena (`nodesById`) and refer to each other by id:
 *
 *   - `children` is the ownership list. Removing a node removes everything
 *     it owns. Each non-root node appears in exactly one `children` list.
 *   - `parentId` is a back-reference used only to rebuild paths and to check
 *     ancestors. It never decides lifetime.
 *   - `crossLinks` are non-owning edges "this concept also relates to X",
 *     recorded when a topic that already exists elsewhere is attached again.
 *
 * `topicIndex` maps each normalized key to its single owning node, which
 * gives O(1) dedup across the whole tree (not just among siblings).
 *
 * Every mutating operation validates first and mutates last, so a thrown
 * error always leaves the tree as it was.
 */

import {
  CycleError,
  NodeNotFoundError,
  ParentNotFoundError,
  RootRemovalError,
  TreeAlreadyInitializedError,
  TreeNotInitializedError,
  CorruptRecordError,
} from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { normalizeTopic, tryNormalizeTopic } from "../topics/normalizer.js";
import type { Topic } from "../topics/schema.js";
import {
  TreeSnapshotSchema,
  checkTreeSnapshot,
  type NodeSnapshot,
  type RenderSnapshot,
  type TreeSnapshot,
} from "./snapshot.js";

/**
 * Read-only view of a tree node.
 */
export interface TreeNode {
  readonly id: string;
  readonly topic: Topic;
  readonly parentId: string | null;
  readonly children: readonly string[];
  readonly crossLinks: readonly string[];
  /** ISO timestamp */
  readonly createdAt: string;
  /** normalized key -> epoch ms when the topic was last offered here */
  readonly suggestionsSeen: ReadonlyMap<string, number>;
  readonly cumulativeDwellMs: number;
  /** Why the suggestion provider related this topic to its parent */
  readonly rationale?: string;
  /** Longer explanation of the topic, fetched on request */
  readonly explanation?: string;
}

interface MutableNode {
  id: string;
  topic: Topic;
  parentId: string | null;
  children: string[];
  crossLinks: string[];
  createdAt: string;
  suggestionsSeen: Map<string, number>;
  cumulativeDwellMs: number;
  rationale?: string;
  explanation?: string;
}

/**
 * Outcome of attachChild.
 * "linked" is the reference to an already existing node; no node was created.
 */
export type AttachResult =
  | { readonly kind: "created"; readonly nodeId: string; readonly topic: Topic }
  | { readonly kind: "linked"; readonly nodeId: string; readonly topic: Topic };

export interface AttachOptions {
  rationale?: string;
}

export interface KnowledgeTreeOptions {
  /** Epoch-millisecond clock for createdAt stamps */
  clock?: () => number;
  logger?: Logger;
}

export class KnowledgeTree {
  private readonly nodesById = new Map<string, MutableNode>();
  private readonly topicIndex = new Map<string, string>();
  private _rootId: string | null = null;
  private nextSeq = 1;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(options: KnowledgeTreeOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  // ============================================================
  // Mutations
  // ============================================================

  /**
   * Create the root node.
   *
   * @throws TreeAlreadyInitializedError if a root exists
   * @throws InvalidTopicError if the topic normalizes to nothing
   */
  createRoot(rawTopic: string): string {
    if (this._rootId !== null) {
      throw new TreeAlreadyInitializedError(this._rootId);
    }
    const topic = normalizeTopic(rawTopic);
    const node = this.insertNode(topic, null);
    this._rootId = node.id;
    this.logger.debug("Root created", { nodeId: node.id, topic: topic.key });
    return node.id;
  }

  /**
   * Attach a topic under a parent.
   *
   * If the topic already exists anywhere in the tree, no node is created:
   * the parent gets a cross-link to the existing node (unless that node is
   * already its direct child) and a "linked" result is returned.
   *
   * @throws ParentNotFoundError if parentId is unknown
   * @throws InvalidTopicError if the topic normalizes to nothing
   * @throws CycleError if the topic equals the parent or one of its ancestors
   */
  attachChild(parentId: string, rawTopic: string, options: AttachOptions = {}): AttachResult {
    const parent = this.nodesById.get(parentId);
    if (!parent) {
      throw new ParentNotFoundError(parentId);
    }

    const topic = normalizeTopic(rawTopic);

    const ancestorId = this.ancestorWithTopic(parentId, topic.key);
    if (ancestorId !== undefined) {
      throw new CycleError(topic.key, parentId, ancestorId);
    }

    const existingId = this.topicIndex.get(topic.key);
    if (existingId !== undefined) {
      if (!parent.children.includes(existingId) && !parent.crossLinks.includes(existingId)) {
        parent.crossLinks.push(existingId);
        this.logger.debug("Cross-link recorded", { from: parentId, to: existingId });
      }
      return { kind: "linked", nodeId: existingId, topic };
    }

    const node = this.insertNode(topic, parentId, options.rationale);
    parent.children.push(node.id);
    this.logger.debug("Child attached", { parentId, nodeId: node.id, topic: topic.key });
    return { kind: "created", nodeId: node.id, topic };
  }

  /**
   * Remove a node and every node it owns.
   * Cross-links pointing into the removed subtree are dropped as well.
   *
   * @returns Removed node ids in pre-order
   * @throws RootRemovalError for the root
   * @throws NodeNotFoundError for an unknown id
   */
  removeSubtree(nodeId: string): string[] {
    const node = this.nodesById.get(nodeId);
    if (!node) {
      throw new NodeNotFoundError(nodeId);
    }
    if (node.parentId === null) {
      throw new RootRemovalError(nodeId);
    }

    const removed = [...this.walkFrom(nodeId)].map((n) => n.id);
    const removedSet = new Set(removed);

    for (const id of removed) {
      const victim = this.nodesById.get(id);
      if (victim) {
        this.topicIndex.delete(victim.topic.key);
        this.nodesById.delete(id);
      }
    }

    const parent = this.nodesById.get(node.parentId);
    if (parent) {
      parent.children = parent.children.filter((id) => id !== nodeId);
    }

    for (const remaining of this.nodesById.values()) {
      if (remaining.crossLinks.some((id) => removedSet.has(id))) {
        remaining.crossLinks = remaining.crossLinks.filter((id) => !removedSet.has(id));
      }
    }

    this.logger.debug("Subtree removed", { nodeId, removed: removed.length });
    return removed;
  }

  /**
   * Discard the whole tree and start again from a new root.
   * The id counter keeps running so stale ids never alias new nodes.
   *
   * @throws InvalidTopicError if the topic normalizes to nothing (tree untouched)
   */
  reset(rawTopic: string): string {
    normalizeTopic(rawTopic);
    this.nodesById.clear();
    this.topicIndex.clear();
    this._rootId = null;
    return this.createRoot(rawTopic);
  }

  /**
   * Remember that a topic was offered for a node, stamped with the time of
   * the latest offer.
   */
  recordSeen(nodeId: string, key: string, at: number): void {
    this.requireMutable(nodeId).suggestionsSeen.set(key, at);
  }

  /**
   * Store an explanation on a node, replacing any earlier one.
   */
  setExplanation(nodeId: string, text: string): void {
    this.requireMutable(nodeId).explanation = text;
  }

  /**
   * Credit dwell time to a node.
   *
   * @returns false when the node no longer exists
   */
  addDwell(nodeId: string, ms: number): boolean {
    const node = this.nodesById.get(nodeId);
    if (!node) {
      return false;
    }
    node.cumulativeDwellMs += ms;
    return true;
  }

  // ============================================================
  // Queries
  // ============================================================

  get rootId(): string | null {
    return this._rootId;
  }

  get size(): number {
    return this.nodesById.size;
  }

  has(nodeId: string): boolean {
    return this.nodesById.has(nodeId);
  }

  getNode(nodeId: string): TreeNode | undefined {
    return this.nodesById.get(nodeId);
  }

  /**
   * @throws NodeNotFoundError for an unknown id
   */
  requireNode(nodeId: string): TreeNode {
    return this.requireMutable(nodeId);
  }

  /**
   * @throws TreeNotInitializedError when there is no root
   */
  requireRoot(): TreeNode {
    if (this._rootId === null) {
      throw new TreeNotInitializedError();
    }
    return this.requireMutable(this._rootId);
  }

  /**
   * Find the node owning a topic, by any spelling of it.
   */
  findByTopic(rawTopic: string): TreeNode | undefined {
    const topic = tryNormalizeTopic(rawTopic);
    if (!topic) {
      return undefined;
    }
    const id = this.topicIndex.get(topic.key);
    return id === undefined ? undefined : this.nodesById.get(id);
  }

  /**
   * Topics from the root down to the node (inclusive).
   *
   * @throws NodeNotFoundError for an unknown id
   */
  pathTo(nodeId: string): Topic[] {
    const node = this.requireMutable(nodeId);
    const path = [node.topic];
    for (const ancestorId of this.ancestorsOf(nodeId)) {
      path.push(this.requireMutable(ancestorId).topic);
    }
    return path.reverse();
  }

  /**
   * Ancestor ids, nearest first (parent, grandparent, ..., root).
   *
   * @throws NodeNotFoundError for an unknown id
   */
  ancestorsOf(nodeId: string): string[] {
    const ancestors: string[] = [];
    let current = this.requireMutable(nodeId).parentId;
    while (current !== null) {
      ancestors.push(current);
      current = this.requireMutable(current).parentId;
    }
    return ancestors;
  }

  /**
   * Level of a node; the root is at depth 1, so depthOf(id) === pathTo(id).length.
   */
  depthOf(nodeId: string): number {
    return this.ancestorsOf(nodeId).length + 1;
  }

  /**
   * The id of the node itself or of the nearest ancestor whose topic has
   * the given key. Bounded by tree depth.
   */
  ancestorWithTopic(nodeId: string, key: string): string | undefined {
    let current: string | null = nodeId;
    while (current !== null) {
      const node = this.requireMutable(current);
      if (node.topic.key === key) {
        return node.id;
      }
      current = node.parentId;
    }
    return undefined;
  }

  /**
   * Whether a topic key was already offered for a node.
   *
   * @param notBefore - Ignore sightings older than this epoch ms
   */
  hasSeen(nodeId: string, key: string, notBefore?: number): boolean {
    const seenAt = this.requireMutable(nodeId).suggestionsSeen.get(key);
    if (seenAt === undefined) {
      return false;
    }
    return notBefore === undefined || seenAt >= notBefore;
  }

  hasTopicKey(key: string): boolean {
    return this.topicIndex.has(key);
  }

  /**
   * Depth-first pre-order traversal from the root (children in insertion order).
   */
  *walk(): Generator<TreeNode> {
    if (this._rootId !== null) {
      yield* this.walkFrom(this._rootId);
    }
  }

  countCrossLinks(): number {
    let total = 0;
    for (const node of this.nodesById.values()) {
      total += node.crossLinks.length;
    }
    return total;
  }

  // ============================================================
  // Snapshots
  // ============================================================

  toRenderSnapshot(): RenderSnapshot {
    const nodes = [...this.walk()].map((node) => ({
      id: node.id,
      topic: node.topic,
      parentId: node.parentId,
      childIds: [...node.children],
      crossLinks: [...node.crossLinks],
    }));
    return { nodes };
  }

  toSnapshot(): TreeSnapshot {
    const nodes: NodeSnapshot[] = [...this.walk()].map((node) => {
      const snapshot: NodeSnapshot = {
        id: node.id,
        topic: { key: node.topic.key, display: node.topic.display },
        parentId: node.parentId,
        childIds: [...node.children],
        crossLinks: [...node.crossLinks],
        createdAt: node.createdAt,
        cumulativeDwellMs: node.cumulativeDwellMs,
        suggestionsSeen: Object.fromEntries(node.suggestionsSeen),
      };
      if (node.rationale !== undefined) {
        snapshot.rationale = node.rationale;
      }
      if (node.explanation !== undefined) {
        snapshot.explanation = node.explanation;
      }
      return snapshot;
    });
    return { rootId: this._rootId, nextSeq: this.nextSeq, nodes };
  }

  /**
   * Rebuild a tree from a snapshot.
   *
   * @throws CorruptRecordError when the snapshot fails schema or structural checks
   */
  static restore(input: unknown, options: KnowledgeTreeOptions = {}): KnowledgeTree {
    const parsed = TreeSnapshotSchema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new CorruptRecordError("tree", detail);
    }

    const snapshot = parsed.data;
    const problems = checkTreeSnapshot(snapshot);
    if (problems.length > 0) {
      throw new CorruptRecordError("tree", problems.join("; "));
    }

    const tree = new KnowledgeTree(options);
    let maxSeq = 0;
    for (const node of snapshot.nodes) {
      const restored: MutableNode = {
        id: node.id,
        topic: Object.freeze({ ...node.topic }),
        parentId: node.parentId,
        children: [...node.childIds],
        crossLinks: [...node.crossLinks],
        createdAt: node.createdAt,
        suggestionsSeen: new Map(Object.entries(node.suggestionsSeen)),
        cumulativeDwellMs: node.cumulativeDwellMs,
      };
      if (node.rationale !== undefined) {
        restored.rationale = node.rationale;
      }
      if (node.explanation !== undefined) {
        restored.explanation = node.explanation;
      }
      tree.nodesById.set(node.id, restored);
      tree.topicIndex.set(node.topic.key, node.id);

      const seq = /^n(\d+)$/.exec(node.id);
      if (seq?.[1] !== undefined) {
        maxSeq = Math.max(maxSeq, Number(seq[1]));
      }
    }
    tree._rootId = snapshot.rootId;
    tree.nextSeq = Math.max(snapshot.nextSeq, maxSeq + 1);
    return tree;
  }

  // ============================================================
  // Internals
  // ============================================================

  private insertNode(topic: Topic, parentId: string | null, rationale?: string): MutableNode {
    const node: MutableNode = {
      id: `n${this.nextSeq++}`,
      topic,
      parentId,
      children: [],
      crossLinks: [],
      createdAt: new Date(this.clock()).toISOString(),
      suggestionsSeen: new Map(),
      cumulativeDwellMs: 0,
    };
    if (rationale !== undefined) {
      node.rationale = rationale;
    }
    this.nodesById.set(node.id, node);
    this.topicIndex.set(topic.key, node.id);
    return node;
  }

  private requireMutable(nodeId: string): MutableNode {
    const node = this.nodesById.get(nodeId);
    if (!node) {
      throw new NodeNotFoundError(nodeId);
    }
    return node;
  }

  private *walkFrom(startId: string): Generator<MutableNode> {
    const stack = [startId];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.nodesById.get(id);
      if (!node) continue;
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        const childId = node.children[i];
        if (childId !== undefined) {
          stack.push(childId);
        }
      }
    }
  }
}
