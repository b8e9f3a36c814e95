/**
 * Logger and run-id tests.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import {
  createLogger,
  formatLogEntry,
  generateRunId,
  generateSessionId,
  getRunId,
  initRunId,
  isLogLevel,
  silentLogger,
  type LogLevel,
} from "./index.js";

const FIXED = new Date("2025-03-04T05:06:07.089Z");

function captureLogger(level: LogLevel = "debug") {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = createLogger({
    level,
    sink: (lvl, line) => lines.push({ level: lvl, line }),
  });
  return { logger, lines };
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

describe("formatLogEntry", () => {
  it("uses a placeholder before a run id exists", () => {
    assert.equal(getRunId(), null);
    assert.equal(
      formatLogEntry("info", "Started", undefined, FIXED),
      "[2025-03-04T05:06:07.089Z] [INFO ] [no-run-id] Started"
    );
  });

  it("appends non-empty context as JSON", () => {
    assert.equal(
      formatLogEntry("warn", "Slow", { ms: 12, node: "n1" }, FIXED),
      '[2025-03-04T05:06:07.089Z] [WARN ] [no-run-id] Slow {"ms":12,"node":"n1"}'
    );
    assert.equal(
      formatLogEntry("error", "Empty", {}, FIXED),
      "[2025-03-04T05:06:07.089Z] [ERROR] [no-run-id] Empty"
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LEVELS & BINDINGS
// ═══════════════════════════════════════════════════════════════════════════

describe("createLogger", () => {
  it("drops entries below the configured level", () => {
    const { logger, lines } = captureLogger("warn");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    assert.deepEqual(
      lines.map((l) => l.level),
      ["warn", "error"]
    );
  });

  it("merges child bindings into every entry", () => {
    const { logger, lines } = captureLogger();
    const child = logger.child({ sessionId: "s-1" }).child({ nodeId: "n2" });
    child.info("Focused", { ms: 5 });
    assert.equal(lines.length, 1);
    assert.ok(
      lines[0]?.line.endsWith('Focused {"sessionId":"s-1","nodeId":"n2","ms":5}'),
      lines[0]?.line
    );
  });

  it("lets entry context override bindings", () => {
    const { logger, lines } = captureLogger();
    logger.child({ nodeId: "n1" }).debug("Moved", { nodeId: "n9" });
    assert.ok(lines[0]?.line.endsWith('Moved {"nodeId":"n9"}'));
  });

  it("silentLogger discards everything", () => {
    silentLogger.error("nothing");
    assert.equal(silentLogger.child({ a: 1 }), silentLogger);
  });

  it("recognizes level names", () => {
    assert.equal(isLogLevel("warn"), true);
    assert.equal(isLogLevel("verbose"), false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RUN & SESSION IDS
// ═══════════════════════════════════════════════════════════════════════════

describe("run ids", () => {
  it("prefixes run ids with the UTC date", () => {
    assert.match(generateRunId(FIXED), /^20250304-[0-9a-f]{6}$/);
  });

  it("builds filename-safe session ids", () => {
    assert.match(generateSessionId(FIXED), /^s-20250304-[0-9a-f]{10}$/);
  });

  it("tags entries with the process run id once initialized", () => {
    const runId = initRunId();
    assert.equal(getRunId(), runId);
    assert.equal(
      formatLogEntry("debug", "x", undefined, FIXED),
      `[2025-03-04T05:06:07.089Z] [DEBUG] [${runId}] x`
    );
  });
});
