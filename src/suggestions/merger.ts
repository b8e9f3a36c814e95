/**
 * Suggestion merger.
 *
 * Expands one node of a KnowledgeTree with topics from a SuggestionProvider.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ALL-OR-NOTHING EXPANSION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * An expansion runs in three phases:
 *
 *   1. FETCH     - ask the provider, bounded by a timeout. Any failure or
 *                  malformed response becomes SuggestionProviderError.
 *   2. PLAN      - validate the whole batch against the tree and decide, per
 *                  candidate, attach / link / reject. Nothing is mutated.
 *   3. APPLY     - attach the planned candidates in rank order and record
 *                  every returned candidate, attached or not, in
 *                  suggestionsSeen.
 *
 * Only phase 3 touches the tree, and by then every attachment is known to
 * succeed, so a failed expansion leaves the tree exactly as it was.
 *
 * One expansion may be outstanding per merger (one merger per session);
 * a concurrent call fails with ExpansionInProgressError.
 */

import {
  ExpansionInProgressError,
  NodeNotFoundError,
  SuggestionProviderError,
} from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { tryNormalizeTopic } from "../topics/normalizer.js";
import type { Topic } from "../topics/schema.js";
import type { KnowledgeTree } from "../tree/knowledge-tree.js";
import { DEFAULT_EXPLORER_CONFIG } from "../config/explorer/defaults.js";
import type { DuplicatePolicy } from "../config/explorer/enums.js";
import type { SeenPolicy } from "../config/explorer/schema.js";
import {
  SuggestionResponseSchema,
  type ExplanationRequest,
  type SuggestionCandidate,
  type SuggestionProvider,
  type SuggestionRequest,
} from "./provider.js";

export type RejectionReason =
  /** Already offered for this node (see seenPolicy) */
  | "seen"
  /** Repeats a topic earlier in the batch, or exists in the tree under policy "skip" */
  | "duplicate"
  /** Equals the node itself or one of its ancestors */
  | "ancestor"
  /** Empty after normalization */
  | "invalid"
  /** Ranked beyond maxResults */
  | "overflow";

export interface AttachedTopic {
  readonly nodeId: string;
  readonly topic: Topic;
}

export interface RejectedCandidate {
  readonly candidate: string;
  readonly reason: RejectionReason;
}

export interface ExpansionResult {
  readonly nodeId: string;
  /** Epoch ms when the provider was asked */
  readonly requestedAt: number;
  /** Candidate strings as returned, in rank order */
  readonly offered: readonly string[];
  /** Newly created children, in rank order */
  readonly accepted: readonly AttachedTopic[];
  /** Existing nodes cross-linked from the expanded node (policy "cross-link") */
  readonly linked: readonly AttachedTopic[];
  readonly rejected: readonly RejectedCandidate[];
}

export interface SuggestionMergerOptions {
  maxResults?: number;
  duplicatePolicy?: DuplicatePolicy;
  seenPolicy?: SeenPolicy;
  /** Default timeout for each provider call */
  timeoutMs?: number;
  clock?: () => number;
  logger?: Logger;
  /** Runs after the provider answers, before the tree is touched; a throw abandons the expansion */
  beforeApply?: () => void;
}

export interface ExpandOptions {
  /** Overrides the merger's default timeout for this call */
  timeoutMs?: number;
}

interface PlannedAttachment {
  readonly raw: string;
  readonly topic: Topic;
  readonly rationale?: string;
}

export class SuggestionMerger {
  private readonly maxResults: number;
  private readonly duplicatePolicy: DuplicatePolicy;
  private readonly seenPolicy: SeenPolicy;
  private readonly timeoutMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly beforeApply: () => void;

  /** Node whose expansion is outstanding, if any */
  private inFlight: string | null = null;

  constructor(
    private readonly tree: KnowledgeTree,
    private readonly provider: SuggestionProvider,
    options: SuggestionMergerOptions = {}
  ) {
    const defaults = DEFAULT_EXPLORER_CONFIG.suggestions;
    this.maxResults = options.maxResults ?? defaults.maxResults;
    this.duplicatePolicy = options.duplicatePolicy ?? defaults.duplicatePolicy;
    this.seenPolicy = options.seenPolicy ?? defaults.seenPolicy;
    this.timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.beforeApply = options.beforeApply ?? (() => undefined);
  }

  /** Whether an expansion is currently outstanding */
  get busy(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Expand a node and return the newly accepted topics in rank order.
   *
   * @throws NodeNotFoundError
   * @throws ExpansionInProgressError
   * @throws SuggestionProviderError (tree unchanged)
   */
  async expand(nodeId: string, options: ExpandOptions = {}): Promise<Topic[]> {
    const result = await this.expandDetailed(nodeId, options);
    return result.accepted.map((a) => a.topic);
  }

  /**
   * Expand a node and report what happened to every candidate.
   */
  async expandDetailed(nodeId: string, options: ExpandOptions = {}): Promise<ExpansionResult> {
    if (this.inFlight !== null) {
      throw new ExpansionInProgressError(nodeId, this.inFlight);
    }
    const node = this.tree.requireNode(nodeId);

    this.inFlight = nodeId;
    try {
      const requestedAt = this.clock();
      const request: SuggestionRequest = {
        topic: node.topic.display,
        contextPath: this.tree.pathTo(nodeId).map((t) => t.display),
        maxResults: this.maxResults,
      };

      this.logger.debug("Requesting suggestions", { nodeId, topic: request.topic });
      const candidates = await this.fetch(request, options.timeoutMs ?? this.timeoutMs);

      // The node may have been removed while the provider was working
      if (!this.tree.has(nodeId)) {
        throw new NodeNotFoundError(nodeId);
      }
      this.beforeApply();

      const { planned, rejected, considered } = this.plan(nodeId, candidates, requestedAt);
      const result = this.apply(nodeId, planned, considered, requestedAt);

      this.logger.info("Expansion complete", {
        nodeId,
        offered: candidates.length,
        accepted: result.accepted.length,
        linked: result.linked.length,
        rejected: rejected.length,
      });

      return {
        nodeId,
        requestedAt,
        offered: candidates.map((c) => c.candidateTopic),
        accepted: result.accepted,
        linked: result.linked,
        rejected,
      };
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Fetch an explanation for a node and store it on the node.
   * Runs beside expansions; it never changes the tree's structure.
   *
   * @throws NodeNotFoundError
   * @throws SuggestionProviderError (node unchanged)
   */
  async explain(nodeId: string, options: ExpandOptions = {}): Promise<string> {
    const node = this.tree.requireNode(nodeId);
    const explain = this.provider.explain?.bind(this.provider);
    if (!explain) {
      throw new SuggestionProviderError("Suggestion provider cannot explain topics");
    }
    const request: ExplanationRequest = {
      topic: node.topic.display,
      contextPath: this.tree.pathTo(nodeId).map((t) => t.display),
    };

    this.logger.debug("Requesting explanation", { nodeId, topic: request.topic });
    const raw = await this.withTimeout(
      (signal) => explain(request, { signal }),
      options.timeoutMs ?? this.timeoutMs
    );
    const text = typeof raw === "string" ? raw.trim() : "";
    if (text.length === 0) {
      throw new SuggestionProviderError("Suggestion provider returned an empty explanation");
    }

    if (!this.tree.has(nodeId)) {
      throw new NodeNotFoundError(nodeId);
    }
    this.beforeApply();
    this.tree.setExplanation(nodeId, text);
    this.logger.info("Explanation stored", { nodeId, length: text.length });
    return text;
  }

  /**
   * Call the provider with a timeout and validate the response shape.
   */
  private async fetch(
    request: SuggestionRequest,
    timeoutMs: number
  ): Promise<SuggestionCandidate[]> {
    const raw = await this.withTimeout(
      (signal) => this.provider.suggest(request, { signal }),
      timeoutMs
    );

    const parsed = SuggestionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      this.logger.warn("Malformed suggestion response", { detail });
      throw new SuggestionProviderError(`Malformed suggestion response: ${detail}`);
    }
    return parsed.data;
  }

  /**
   * Race one provider call against a timeout. On expiry the caller gets
   * SuggestionProviderError first, then the call's signal is aborted.
   */
  private async withTimeout(
    call: (signal: AbortSignal) => Promise<unknown>,
    timeoutMs: number
  ): Promise<unknown> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new SuggestionProviderError(`Suggestion provider timed out after ${timeoutMs} ms`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), timeout]);
    } catch (err) {
      if (err instanceof SuggestionProviderError) {
        this.logger.warn("Suggestion provider failed", { message: err.message });
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn("Suggestion provider failed", { message });
      throw new SuggestionProviderError(`Suggestion provider failed: ${message}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Decide the fate of every candidate without touching the tree.
   */
  private plan(
    nodeId: string,
    candidates: SuggestionCandidate[],
    now: number
  ): { planned: PlannedAttachment[]; rejected: RejectedCandidate[]; considered: string[] } {
    const planned: PlannedAttachment[] = [];
    const rejected: RejectedCandidate[] = [];
    const considered: string[] = [];
    const batchKeys = new Set<string>();
    const notBefore =
      this.seenPolicy.mode === "expire" ? now - this.seenPolicy.ttlMs : undefined;

    candidates.forEach((candidate, rank) => {
      const raw = candidate.candidateTopic;
      const reject = (reason: RejectionReason) => rejected.push({ candidate: raw, reason });

      if (rank >= this.maxResults) {
        // Not attached, but still remembered as offered for this node
        const extra = tryNormalizeTopic(raw);
        if (extra && !batchKeys.has(extra.key)) {
          batchKeys.add(extra.key);
          if (!this.tree.hasSeen(nodeId, extra.key, notBefore)) {
            considered.push(extra.key);
          }
        }
        reject("overflow");
        return;
      }

      const topic = tryNormalizeTopic(raw);
      if (!topic) {
        reject("invalid");
        return;
      }
      if (batchKeys.has(topic.key)) {
        reject("duplicate");
        return;
      }
      batchKeys.add(topic.key);

      // Repeats keep their original sighting time
      if (this.tree.hasSeen(nodeId, topic.key, notBefore)) {
        reject("seen");
        return;
      }
      considered.push(topic.key);

      if (this.tree.ancestorWithTopic(nodeId, topic.key) !== undefined) {
        reject("ancestor");
        return;
      }
      if (this.duplicatePolicy === "skip" && this.tree.hasTopicKey(topic.key)) {
        reject("duplicate");
        return;
      }

      const attachment: PlannedAttachment =
        candidate.rationale === undefined
          ? { raw, topic }
          : { raw, topic, rationale: candidate.rationale };
      planned.push(attachment);
    });

    return { planned, rejected, considered };
  }

  private apply(
    nodeId: string,
    planned: PlannedAttachment[],
    considered: string[],
    now: number
  ): { accepted: AttachedTopic[]; linked: AttachedTopic[] } {
    const accepted: AttachedTopic[] = [];
    const linked: AttachedTopic[] = [];

    for (const step of planned) {
      const options = step.rationale === undefined ? {} : { rationale: step.rationale };
      const result = this.tree.attachChild(nodeId, step.raw, options);
      const entry = { nodeId: result.nodeId, topic: result.topic };
      if (result.kind === "created") {
        accepted.push(entry);
      } else {
        linked.push(entry);
      }
    }

    for (const key of considered) {
      this.tree.recordSeen(nodeId, key, now);
    }

    return { accepted, linked };
  }
}
