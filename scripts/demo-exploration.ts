#!/usr/bin/env node
/**
 * End-to-end exploration against the Gemini provider.
 *
 * Starts a session on a topic (optionally seeded from a document), expands
 * the root and its first new child, records some focus time, then persists
 * the session to the file store and prints its summary.
 *
 * Usage:
 *   npm run demo -- [topic] [--doc <path>] [--owner <ref>] [--tag <tag>]...
 *
 * Requires GEMINI_API_KEY (see .env.example).
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parseArgs } from "node:util";

import { loadAppConfig, requireGeminiApiKey, DEFAULT_EXPLORER_CONFIG } from "../src/config/index.js";
import { createLogger, initRunId } from "../src/logging/index.js";
import { GeminiSuggestionProvider } from "../src/suggestions/gemini.js";
import { ExplorationSession } from "../src/session/session.js";
import { FilePersistenceStore } from "../src/history/persistence.js";
import { SessionHistoryStore } from "../src/history/store.js";
import { summarizeRecord } from "../src/history/serialization.js";
import { ArchiveSearch } from "../src/archive/search.js";
import { MIME_DOCX, MIME_MARKDOWN, MIME_TEXT, TextDocumentParser } from "../src/documents/parser.js";
import { seedTree } from "../src/documents/seed.js";

const MIME_BY_EXTENSION: Record<string, string> = {
  ".txt": MIME_TEXT,
  ".md": MIME_MARKDOWN,
  ".docx": MIME_DOCX,
};

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      doc: { type: "string" },
      owner: { type: "string", default: "demo-user" },
      tag: { type: "string", multiple: true, default: [] },
    },
  });

  const runId = initRunId();
  const appConfig = loadAppConfig();
  const logger = createLogger({ level: appConfig.logLevel, file: true });
  logger.info("Demo starting", { runId });

  const provider = new GeminiSuggestionProvider({
    apiKey: requireGeminiApiKey(),
    model: appConfig.geminiModel ?? DEFAULT_EXPLORER_CONFIG.provider.modelName,
    logger,
  });

  const session = ExplorationSession.start({
    ownerRef: values.owner,
    rootTopic: positionals[0] ?? "Photosynthesis",
    provider,
    tags: values.tag,
    settings: { ...DEFAULT_EXPLORER_CONFIG.suggestions, timeoutMs: appConfig.suggestionTimeoutMs },
    logger,
  });

  if (values.doc) {
    const mimeType = MIME_BY_EXTENSION[extname(values.doc).toLowerCase()] ?? "application/octet-stream";
    const seeds = await new TextDocumentParser({ logger }).parse({
      document: await readFile(values.doc),
      mimeType,
    });
    const seeded = seedTree(session.tree, seeds);
    logger.info("Document seeded", {
      created: seeded.created.length,
      linked: seeded.linked.length,
      rejected: seeded.rejected.length,
    });
  }

  const root = session.tree.requireRoot();
  session.focus(root.id);
  await session.explain(root.id);
  const first = await session.expandDetailed(root.id);
  const child = first.accepted[0];
  if (child) {
    session.focus(child.nodeId);
    await session.expand(child.nodeId);
  }
  session.blur();

  const archive = new ArchiveSearch({ logger });
  const history = new SessionHistoryStore(new FilePersistenceStore(appConfig.dataDir), {
    archive,
    logger,
  });
  const entry = await history.persist(session);

  console.log(summarizeRecord(await history.get(entry.sessionId)));
  console.log(`\nIndexed terms: ${entry.indexedTerms.join(", ")}`);
}

main().catch((err: unknown) => {
  console.error("Demo failed:", err);
  process.exit(1);
});
