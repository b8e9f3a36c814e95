/**
 * Focus timer for one exploration session.
 *
 * State machine:
 *
 *   Idle ──focus(n)──▶ Focused(n) ──focus(m)──▶ Focused(m)
 *    ▲                     │
 *    └──────blur()─────────┘
 *
 *   any ──endSession()──▶ Ended   (terminal; endSession again is a no-op)
 *
 * Each transition out of Focused(n) flushes the elapsed time into the
 * timer's own per-node ledger and into the node's cumulativeDwellMs. The
 * ledger outlives the node: dwell spent on a node that was later removed
 * still counts.
 */

import {
  InvalidTimestampError,
  NodeNotFoundError,
  SessionEndedError,
} from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { KnowledgeTree } from "../tree/knowledge-tree.js";

export type TimerState =
  | { readonly status: "idle" }
  | { readonly status: "focused"; readonly nodeId: string; readonly since: number }
  | { readonly status: "ended"; readonly endedAt: number };

export interface SessionTimerOptions {
  /** Used to name the session in SessionEndedError */
  sessionId?: string;
  /** Defaults to Date.now; an explicit `at` on a call wins */
  clock?: () => number;
  /** Time of the first transition boundary; defaults to clock() */
  startedAt?: number;
  logger?: Logger;
}

export class SessionTimer {
  private state: TimerState = { status: "idle" };
  private readonly dwell = new Map<string, number>();
  private lastTransitionAt: number;
  private readonly sessionId: string;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly tree: KnowledgeTree,
    options: SessionTimerOptions = {}
  ) {
    this.sessionId = options.sessionId ?? "(unnamed)";
    this.clock = options.clock ?? Date.now;
    this.lastTransitionAt = options.startedAt ?? this.clock();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Move focus to a node, closing the previous focus interval.
   *
   * @throws SessionEndedError after endSession
   * @throws InvalidTimestampError if `at` precedes the last transition
   * @throws NodeNotFoundError if the node is not in the tree
   */
  focus(nodeId: string, at: number = this.clock()): void {
    this.checkTransition(at);
    if (!this.tree.has(nodeId)) {
      throw new NodeNotFoundError(nodeId);
    }
    this.flush(at);
    this.state = { status: "focused", nodeId, since: at };
    this.lastTransitionAt = at;
  }

  /**
   * Close the current focus interval, if any, and go idle.
   */
  blur(at: number = this.clock()): void {
    this.checkTransition(at);
    this.flush(at);
    this.state = { status: "idle" };
    this.lastTransitionAt = at;
  }

  /**
   * Flush and stop. Returns the end time; later calls return the same time.
   */
  endSession(at: number = this.clock()): number {
    if (this.state.status === "ended") {
      return this.state.endedAt;
    }
    this.checkTransition(at);
    this.flush(at);
    this.state = { status: "ended", endedAt: at };
    this.lastTransitionAt = at;
    this.logger.debug("Timer ended", { sessionId: this.sessionId, totalDwellMs: this.totalDwellMs() });
    return at;
  }

  current(): TimerState {
    return this.state;
  }

  get ended(): boolean {
    return this.state.status === "ended";
  }

  /** Flushed dwell per node id (the open interval is not included) */
  perNodeDwell(): ReadonlyMap<string, number> {
    return new Map(this.dwell);
  }

  totalDwellMs(): number {
    let total = 0;
    for (const ms of this.dwell.values()) {
      total += ms;
    }
    return total;
  }

  private checkTransition(at: number): void {
    if (this.state.status === "ended") {
      throw new SessionEndedError(this.sessionId);
    }
    if (!Number.isFinite(at) || at < this.lastTransitionAt) {
      throw new InvalidTimestampError(at, this.lastTransitionAt);
    }
  }

  private flush(at: number): void {
    if (this.state.status !== "focused") {
      return;
    }
    const { nodeId, since } = this.state;
    const elapsed = at - since;
    this.dwell.set(nodeId, (this.dwell.get(nodeId) ?? 0) + elapsed);
    if (!this.tree.addDwell(nodeId, elapsed)) {
      this.logger.debug("Dwell credited to a removed node", { nodeId, elapsed });
    }
  }
}
