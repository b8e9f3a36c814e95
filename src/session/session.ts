/**
 * Exploration session.
 *
 * Binds together the pieces a user interacts with while exploring one
 * subject: the knowledge tree, the suggestion merger that grows it, the
 * focus timer, the session's tags and a log of every expansion. Ending the
 * session produces the immutable SessionRecord the history store persists.
 */

import { SessionEndedError } from "../errors.js";
import { generateSessionId, silentLogger, type Logger } from "../logging/index.js";
import { normalizeTag } from "../topics/normalizer.js";
import type { Topic } from "../topics/schema.js";
import { KnowledgeTree } from "../tree/knowledge-tree.js";
import type { RenderSnapshot } from "../tree/snapshot.js";
import { DEFAULT_EXPLORER_CONFIG } from "../config/explorer/defaults.js";
import type { SuggestionSettings } from "../config/explorer/schema.js";
import {
  SuggestionMerger,
  type ExpandOptions,
  type ExpansionResult,
} from "../suggestions/merger.js";
import type { SuggestionProvider } from "../suggestions/provider.js";
import { deepFreeze } from "../utils/freeze.js";
import { SessionTimer, type TimerState } from "./timer.js";
import {
  RECORD_VERSION,
  type EndedSessionRecord,
  type SessionRecord,
  type SuggestionLogEntry,
} from "./record.js";

export interface ExplorationSessionOptions {
  ownerRef: string;
  provider: SuggestionProvider;
  /** Generated when omitted */
  sessionId?: string;
  settings?: SuggestionSettings;
  tags?: readonly string[];
  clock?: () => number;
  logger?: Logger;
}

export interface StartSessionOptions extends ExplorationSessionOptions {
  rootTopic: string;
}

export class ExplorationSession {
  readonly sessionId: string;
  readonly ownerRef: string;
  /** Epoch ms */
  readonly startedAt: number;
  readonly tree: KnowledgeTree;

  private readonly timer: SessionTimer;
  private readonly merger: SuggestionMerger;
  private readonly tagList: string[] = [];
  private readonly suggestionsLog: SuggestionLogEntry[] = [];
  private readonly clock: () => number;
  private readonly logger: Logger;
  private endRecord: EndedSessionRecord | null = null;

  private constructor(tree: KnowledgeTree, options: ExplorationSessionOptions) {
    this.clock = options.clock ?? Date.now;
    this.startedAt = this.clock();
    this.sessionId = options.sessionId ?? generateSessionId(new Date(this.startedAt));
    this.ownerRef = options.ownerRef;
    this.logger = (options.logger ?? silentLogger).child({ sessionId: this.sessionId });
    this.tree = tree;

    const settings = options.settings ?? DEFAULT_EXPLORER_CONFIG.suggestions;
    this.merger = new SuggestionMerger(tree, options.provider, {
      ...settings,
      clock: this.clock,
      logger: this.logger,
      // end() may run while the provider is still working
      beforeApply: () => this.assertOpen(),
    });
    this.timer = new SessionTimer(tree, {
      sessionId: this.sessionId,
      clock: this.clock,
      startedAt: this.startedAt,
      logger: this.logger,
    });

    for (const tag of options.tags ?? []) {
      this.addTag(tag);
    }
  }

  /**
   * Start a session on a new root topic.
   *
   * @throws InvalidTopicError when the root topic normalizes to nothing
   */
  static start(options: StartSessionOptions): ExplorationSession {
    const tree = new KnowledgeTree({ clock: options.clock, logger: options.logger });
    tree.createRoot(options.rootTopic);
    const session = new ExplorationSession(tree, options);
    session.logger.info("Session started", {
      ownerRef: session.ownerRef,
      rootTopic: options.rootTopic,
    });
    return session;
  }

  /**
   * Start a new session that picks up the tree of an earlier one.
   * Tags carry over unless the options give their own.
   *
   * @throws CorruptRecordError when the stored tree fails validation
   */
  static continueFrom(
    record: SessionRecord,
    options: ExplorationSessionOptions
  ): ExplorationSession {
    const tree = KnowledgeTree.restore(record.tree, {
      clock: options.clock,
      logger: options.logger,
    });
    const session = new ExplorationSession(tree, {
      ...options,
      tags: options.tags ?? record.tags,
    });
    session.logger.info("Session continued", { from: record.sessionId, nodes: tree.size });
    return session;
  }

  get ended(): boolean {
    return this.endRecord !== null;
  }

  get tags(): readonly string[] {
    return [...this.tagList];
  }

  /**
   * Expand a node; see SuggestionMerger.expand.
   *
   * @throws SessionEndedError after end(), including an end() that lands
   *   while the provider is still answering (the tree is left untouched)
   */
  async expand(nodeId: string, options: ExpandOptions = {}): Promise<Topic[]> {
    const result = await this.expandDetailed(nodeId, options);
    return result.accepted.map((a) => a.topic);
  }

  async expandDetailed(nodeId: string, options: ExpandOptions = {}): Promise<ExpansionResult> {
    this.assertOpen();
    const result = await this.merger.expandDetailed(nodeId, options);
    this.suggestionsLog.push({
      nodeId: result.nodeId,
      requestedAt: new Date(result.requestedAt).toISOString(),
      offered: [...result.offered],
      accepted: result.accepted.map((a) => a.nodeId),
      linked: result.linked.map((l) => l.nodeId),
    });
    return result;
  }

  /**
   * Fetch and store a detailed explanation of a node's topic.
   *
   * @throws SessionEndedError after end()
   * @throws SuggestionProviderError when the provider has no explanations to give
   */
  async explain(nodeId: string, options: ExpandOptions = {}): Promise<string> {
    this.assertOpen();
    return this.merger.explain(nodeId, options);
  }

  focus(nodeId: string, at?: number): void {
    this.assertOpen();
    this.timer.focus(nodeId, at);
  }

  blur(at?: number): void {
    this.assertOpen();
    this.timer.blur(at);
  }

  /**
   * Prune a branch the user no longer wants.
   *
   * @returns Removed node ids
   */
  removeNode(nodeId: string): string[] {
    this.assertOpen();
    return this.tree.removeSubtree(nodeId);
  }

  /**
   * @returns false when the tag was already present
   * @throws InvalidTopicError for an empty tag
   */
  addTag(raw: string): boolean {
    this.assertOpen();
    const tag = normalizeTag(raw);
    if (this.tagList.includes(tag)) {
      return false;
    }
    this.tagList.push(tag);
    return true;
  }

  removeTag(raw: string): boolean {
    this.assertOpen();
    const index = this.tagList.indexOf(normalizeTag(raw));
    if (index === -1) {
      return false;
    }
    this.tagList.splice(index, 1);
    return true;
  }

  currentFocus(): TimerState {
    return this.timer.current();
  }

  perNodeDwell(): ReadonlyMap<string, number> {
    return this.timer.perNodeDwell();
  }

  totalDwellMs(): number {
    return this.timer.totalDwellMs();
  }

  renderSnapshot(): RenderSnapshot {
    return this.tree.toRenderSnapshot();
  }

  /**
   * End the session and return its frozen record.
   * Calling end() again returns the same record.
   */
  end(at?: number): EndedSessionRecord {
    if (this.endRecord) {
      return this.endRecord;
    }
    const endedAt = this.timer.endSession(at);
    const record: EndedSessionRecord = {
      ...this.toRecord(),
      endedAt: new Date(endedAt).toISOString(),
    };
    this.endRecord = deepFreeze(record);
    this.logger.info("Session ended", {
      nodes: this.tree.size,
      totalDwellMs: this.timer.totalDwellMs(),
    });
    return this.endRecord;
  }

  /**
   * Current state as a record. `endedAt` is null until the session ends.
   */
  toRecord(): SessionRecord {
    if (this.endRecord) {
      return this.endRecord;
    }
    return {
      recordVersion: RECORD_VERSION,
      sessionId: this.sessionId,
      ownerRef: this.ownerRef,
      startedAt: new Date(this.startedAt).toISOString(),
      endedAt: null,
      tree: this.tree.toSnapshot(),
      perNodeDwell: Object.fromEntries(this.timer.perNodeDwell()),
      tags: [...this.tagList],
      suggestionsLog: this.suggestionsLog.map((entry) => ({
        ...entry,
        offered: [...entry.offered],
        accepted: [...entry.accepted],
        linked: [...entry.linked],
      })),
    };
  }

  private assertOpen(): void {
    if (this.endRecord) {
      throw new SessionEndedError(this.sessionId);
    }
  }
}
