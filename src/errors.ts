/**
 * Error taxonomy for the exploration engine.
 *
 * Every error raised by the engine extends ExplorerError and carries a
 * `kind` so the calling layer can decide presentation and retry behavior
 * without matching on class names:
 *
 *   validation   - caller supplied a bad value; never retried
 *   structural   - misuse of the tree/session API; state left unchanged
 *   transient    - external collaborator failed; retry with backoff
 *   concurrency  - another operation holds the session; wait and retry
 */

export type ExplorerErrorKind = "validation" | "structural" | "transient" | "concurrency";

export abstract class ExplorerError extends Error {
  abstract readonly kind: ExplorerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Transient and concurrency failures are safe to retry. */
  get retryable(): boolean {
    return this.kind === "transient" || this.kind === "concurrency";
  }
}

// ============================================================
// Validation
// ============================================================

export class InvalidTopicError extends ExplorerError {
  readonly kind = "validation";

  constructor(public readonly raw: string) {
    super(`Topic is empty after normalization: ${JSON.stringify(raw)}`);
  }
}

export class InvalidTimestampError extends ExplorerError {
  readonly kind = "validation";

  constructor(
    public readonly at: number,
    public readonly lastTransitionAt: number
  ) {
    super(
      Number.isFinite(at)
        ? `Timestamp ${at} is earlier than the last transition at ${lastTransitionAt}`
        : `Timestamp ${at} is not a finite epoch-ms value`
    );
  }
}

export class UnsupportedDocumentError extends ExplorerError {
  readonly kind = "validation";

  constructor(public readonly mimeType: string) {
    super(`Unsupported document type: ${mimeType}`);
  }
}

export class InvalidDocumentError extends ExplorerError {
  readonly kind = "validation";

  constructor(
    public readonly mimeType: string,
    options?: { cause?: unknown }
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Document could not be read as ${mimeType}${detail}`, options);
  }
}

// ============================================================
// Structural
// ============================================================

export class TreeAlreadyInitializedError extends ExplorerError {
  readonly kind = "structural";

  constructor(public readonly rootId: string) {
    super(`Tree already has a root (${rootId}); use reset() to start over`);
  }
}

export class TreeNotInitializedError extends ExplorerError {
  readonly kind = "structural";

  constructor() {
    super("Tree has no root yet");
  }
}

export class ParentNotFoundError extends ExplorerError {
  readonly kind = "structural";

  constructor(public readonly parentId: string) {
    super(`Parent node not found: ${parentId}`);
  }
}

export class NodeNotFoundError extends ExplorerError {
  readonly kind = "structural";

  constructor(public readonly nodeId: string) {
    super(`Node not found: ${nodeId}`);
  }
}

export class CycleError extends ExplorerError {
  readonly kind = "structural";

  constructor(
    public readonly topicKey: string,
    public readonly parentId: string,
    public readonly ancestorId: string
  ) {
    super(
      `Topic "${topicKey}" under ${parentId} would repeat ancestor ${ancestorId} and create a cycle`
    );
  }
}

export class RootRemovalError extends ExplorerError {
  readonly kind = "structural";

  constructor(public readonly rootId: string) {
    super(`Cannot remove the root node (${rootId}); use reset() instead`);
  }
}

export class SessionEndedError extends ExplorerError {
  readonly kind = "structural";

  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} has already ended`);
  }
}

export class SessionStillActiveError extends ExplorerError {
  readonly kind = "structural";

  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} has not ended and cannot be persisted`);
  }
}

export class SessionNotFoundError extends ExplorerError {
  readonly kind = "structural";

  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class CorruptRecordError extends ExplorerError {
  readonly kind = "structural";

  constructor(
    public readonly key: string,
    detail: string
  ) {
    super(`Stored record ${key} is invalid: ${detail}`);
  }
}

// ============================================================
// Transient
// ============================================================

export class SuggestionProviderError extends ExplorerError {
  readonly kind = "transient";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StoreUnavailableError extends ExplorerError {
  readonly kind = "transient";

  constructor(
    public readonly key: string,
    options?: { cause?: unknown }
  ) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Persistence store unavailable for ${key}${detail}`, options);
  }
}

// ============================================================
// Concurrency
// ============================================================

export class ExpansionInProgressError extends ExplorerError {
  readonly kind = "concurrency";

  constructor(
    public readonly requestedNodeId: string,
    public readonly inFlightNodeId: string
  ) {
    super(
      `Cannot expand ${requestedNodeId}: expansion of ${inFlightNodeId} is still in progress`
    );
  }
}

/**
 * Narrow an unknown caught value to an ExplorerError.
 */
export function isExplorerError(err: unknown): err is ExplorerError {
  return err instanceof ExplorerError;
}
