#!/usr/bin/env node
/**
 * CLI for browsing archived exploration sessions in a file store.
 *
 * Usage:
 *   npx tsx src/cli/history.ts <command> [args] [options]
 *   npm run history -- <command> [args] [options]
 *
 * Commands:
 *   list <owner>        Sessions of one owner
 *   search [query]      Ranked archive search across sessions
 *   show <sessionId>    Summary and topic tree of one session
 *   stats <owner>       Learning statistics of one owner
 *
 * Options:
 *   --dir <path>        Session store directory (default: $EXPLORER_DATA_DIR or output/sessions)
 *   --config <path>     Explorer configuration JSON (default: built-in defaults)
 *   --period <p>        list: all | today | week | month (default: all)
 *   --sort <s>          list: newest | oldest | mostTopics | longestDuration (default: newest)
 *   --tag <tag>         search: required tag, repeatable
 *   --owner <owner>     search: only this owner's sessions
 *   --limit <n>         Maximum rows
 *   --json              Output as JSON
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid arguments, configuration or stored data
 */

import { parseArgs } from "node:util";

import {
  ConfigError,
  DEFAULT_EXPLORER_CONFIG,
  ExplorerConfigError,
  HistoryPeriod,
  HistorySort,
  loadAppConfig,
  loadExplorerConfigFile,
  type ExplorerConfig,
} from "../config/index.js";
import { isExplorerError } from "../errors.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { formatTopic } from "../topics/normalizer.js";
import { ArchiveSearch } from "../archive/search.js";
import { FilePersistenceStore } from "../history/persistence.js";
import { SessionHistoryStore } from "../history/store.js";
import { formatDuration, summarizeRecord } from "../history/serialization.js";
import { computeLearningStats } from "../history/stats.js";
import type { SessionMetadata } from "../history/metadata.js";

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: history <command> [args] [options]

Commands:
  list <owner>        Sessions of one owner
  search [query]      Ranked archive search across sessions
  show <sessionId>    Summary and topic tree of one session
  stats <owner>       Learning statistics of one owner

Options:
  --dir <path>        Session store directory
  --config <path>     Explorer configuration JSON
  --period <p>        list: all | today | week | month
  --sort <s>          list: newest | oldest | mostTopics | longestDuration
  --tag <tag>         search: required tag, repeatable
  --owner <owner>     search: only this owner's sessions
  --limit <n>         Maximum rows
  --json              Output as JSON
  -h, --help          Show this help message
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      dir: { type: "string" },
      config: { type: "string" },
      period: { type: "string", default: "all" },
      sort: { type: "string", default: "newest" },
      tag: { type: "string", multiple: true, default: [] },
      owner: { type: "string" },
      limit: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(USAGE);
    process.exit(values.help ? 0 : 1);
  }

  return { values, positionals };
}

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new UsageError(`--limit must be a positive integer, got "${raw}"`);
  }
  return limit;
}

function requirePositional(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined || value === "") {
    throw new UsageError(`Missing <${name}>`);
  }
  return value;
}

// ============================================================
// Output Formatting
// ============================================================

function printSessions(rows: SessionMetadata[]): void {
  if (rows.length === 0) {
    console.log("No sessions found.");
    return;
  }
  for (const row of rows) {
    const tags = row.tags.length > 0 ? `  [${row.tags.join(", ")}]` : "";
    console.log(
      `${row.startedAt.slice(0, 16).replace("T", " ")}  ${row.sessionId}  ` +
        `${formatTopic(row.rootTopic)}  ${row.nodeCount} topics, ` +
        `${formatDuration(row.totalDwellMs)}${tags}`
    );
  }
}

// ============================================================
// Commands
// ============================================================

interface CommandContext {
  history: SessionHistoryStore;
  explorerConfig: Readonly<ExplorerConfig>;
  values: ReturnType<typeof parseCliArgs>["values"];
  positionals: string[];
  logger: Logger;
}

async function runList(ctx: CommandContext): Promise<void> {
  const owner = requirePositional(ctx.positionals, 1, "owner");
  const period = HistoryPeriod.safeParse(ctx.values.period);
  if (!period.success) {
    throw new UsageError(`Unknown --period "${ctx.values.period}"`);
  }
  const sortBy = HistorySort.safeParse(ctx.values.sort);
  if (!sortBy.success) {
    throw new UsageError(`Unknown --sort "${ctx.values.sort}"`);
  }

  const rows = await ctx.history.querySessions(owner, {
    period: period.data,
    sortBy: sortBy.data,
    limit: parseLimit(ctx.values.limit),
  });

  if (ctx.values.json) {
    console.log(JSON.stringify(rows, null, 2));
  } else {
    printSessions(rows);
  }
}

async function runSearch(ctx: CommandContext): Promise<void> {
  const query = ctx.positionals.slice(1).join(" ");
  const archive = new ArchiveSearch({
    defaultLimit: ctx.explorerConfig.archive.defaultLimit,
    logger: ctx.logger,
  });
  const indexed = await ctx.history.rebuildArchive(archive);
  ctx.logger.debug("Archive loaded", { entries: indexed });

  const hits = archive.searchDetailed(query, ctx.values.tag, {
    ownerRef: ctx.values.owner,
    limit: parseLimit(ctx.values.limit),
  });

  if (ctx.values.json) {
    console.log(JSON.stringify(hits, null, 2));
    return;
  }
  if (hits.length === 0) {
    console.log("No matching sessions.");
    return;
  }
  for (const hit of hits) {
    const tags = hit.entry.tags.length > 0 ? `  [${hit.entry.tags.join(", ")}]` : "";
    console.log(
      `${hit.score}  ${hit.sessionId}  ${formatTopic(hit.entry.rootTopic)}  ` +
        `(${hit.entry.ownerRef}, ${hit.entry.startedAt.slice(0, 10)})${tags}`
    );
  }
}

async function runShow(ctx: CommandContext): Promise<void> {
  const sessionId = requirePositional(ctx.positionals, 1, "sessionId");
  const record = await ctx.history.get(sessionId);
  console.log(ctx.values.json ? JSON.stringify(record, null, 2) : summarizeRecord(record));
}

async function runStats(ctx: CommandContext): Promise<void> {
  const owner = requirePositional(ctx.positionals, 1, "owner");
  const rows = await ctx.history.querySessions(owner);
  const stats = computeLearningStats(rows);

  if (ctx.values.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  console.log(`Sessions:         ${stats.sessions}`);
  console.log(`Topics explored:  ${stats.nodes} (+${stats.thisWeek.nodes} this week)`);
  console.log(`Connections:      ${stats.connections} (+${stats.thisWeek.connections} this week)`);
  console.log(
    `Learning hours:   ${stats.learningHours.toFixed(1)}h ` +
      `(+${stats.thisWeek.learningHours.toFixed(1)}h this week)`
  );
  console.log(
    `Knowledge score:  ${stats.knowledgeScore} (+${stats.thisWeek.knowledgeScore} points)`
  );
  console.log(`Streak:           ${stats.streakDays} day(s)`);
  console.log(`Favorite topics:  ${stats.favoriteTopics.join(", ") || "none yet"}`);
}

const COMMANDS = new Map<string, (ctx: CommandContext) => Promise<void>>([
  ["list", runList],
  ["search", runSearch],
  ["show", runShow],
  ["stats", runStats],
]);

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const { values, positionals } = parseCliArgs();
  initRunId();

  const appConfig = loadAppConfig();
  const logger = createLogger({ level: appConfig.logLevel });

  const command = COMMANDS.get(positionals[0] ?? "");
  if (!command) {
    throw new UsageError(`Unknown command "${positionals[0] ?? ""}"`);
  }

  const explorerConfig = values.config
    ? loadExplorerConfigFile(values.config)
    : DEFAULT_EXPLORER_CONFIG;
  const directory = values.dir ?? appConfig.dataDir;
  const history = new SessionHistoryStore(new FilePersistenceStore(directory), { logger });
  logger.debug("History store opened", { directory });

  await command({ history, explorerConfig, values, positionals, logger });
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    console.error(USAGE);
  } else if (err instanceof ExplorerConfigError) {
    console.error(err.format());
  } else if (err instanceof ConfigError || isExplorerError(err)) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Unexpected error:", err);
  }
  process.exit(1);
});
