/**
 * Knowledge tree explorer: public API.
 *
 *   const session = ExplorationSession.start({ ownerRef, rootTopic, provider });
 *   await session.expand(session.tree.requireRoot().id);
 *   const entry = await history.persist(session);
 */

export * from "./errors.js";

export * from "./topics/index.js";

export {
  KnowledgeTree,
  type TreeNode,
  type AttachResult,
  type AttachOptions,
  type KnowledgeTreeOptions,
} from "./tree/knowledge-tree.js";
export {
  TreeSnapshotSchema,
  NodeSnapshotSchema,
  checkTreeSnapshot,
  type TreeSnapshot,
  type NodeSnapshot,
  type RenderNode,
  type RenderSnapshot,
} from "./tree/snapshot.js";

export {
  SuggestionResponseSchema,
  SuggestionCandidateSchema,
  type SuggestionProvider,
  type SuggestionRequest,
  type ExplanationRequest,
  type SuggestionCandidate,
  type SuggestOptions,
} from "./suggestions/provider.js";
export {
  SuggestionMerger,
  type SuggestionMergerOptions,
  type ExpandOptions,
  type ExpansionResult,
  type AttachedTopic,
  type RejectedCandidate,
  type RejectionReason,
} from "./suggestions/merger.js";
export {
  GeminiSuggestionProvider,
  buildSuggestionPrompt,
  buildExplanationPrompt,
  parseSuggestionText,
  type GeminiProviderOptions,
  type GenerateContentClient,
} from "./suggestions/gemini.js";

export { SessionTimer, type TimerState, type SessionTimerOptions } from "./session/timer.js";
export {
  ExplorationSession,
  type ExplorationSessionOptions,
  type StartSessionOptions,
} from "./session/session.js";
export {
  SessionRecordSchema,
  SuggestionLogEntrySchema,
  RECORD_VERSION,
  isEnded,
  type SessionRecord,
  type EndedSessionRecord,
  type SuggestionLogEntry,
} from "./session/record.js";

export {
  MemoryPersistenceStore,
  FilePersistenceStore,
  type PersistenceStore,
} from "./history/persistence.js";
export {
  SessionHistoryStore,
  type SessionHistoryStoreOptions,
  type SessionQuery,
} from "./history/store.js";
export { describeSession, type SessionMetadata } from "./history/metadata.js";
export {
  serializeRecord,
  deserializeRecord,
  decodeRecord,
  summarizeRecord,
  formatDuration,
} from "./history/serialization.js";
export {
  computeLearningStats,
  computeTotals,
  type LearningStats,
  type LearningTotals,
} from "./history/stats.js";

export { ArchiveEntrySchema, toArchiveEntry, type ArchiveEntry } from "./archive/entry.js";
export {
  ArchiveSearch,
  type ArchiveSearchOptions,
  type SearchHit,
  type SearchOptions,
} from "./archive/search.js";

export {
  TextDocumentParser,
  extractSeedTopics,
  MIME_DOCX,
  MIME_MARKDOWN,
  MIME_TEXT,
  type DocumentParser,
  type ParseRequest,
} from "./documents/parser.js";
export { seedTree, type SeedResult, type SeedRejection } from "./documents/seed.js";

export { loadAppConfig, type AppConfig } from "./config/index.js";
export {
  loadExplorerConfig,
  loadExplorerConfigFile,
  validateExplorerConfig,
  ExplorerConfigError,
  DEFAULT_EXPLORER_CONFIG,
  type ExplorerConfig,
} from "./config/explorer/index.js";
export { createLogger, silentLogger, initRunId, getRunId, type Logger } from "./logging/index.js";
