/**
 * Session record serialization.
 *
 * Records leave the process as plain JSON and come back through the same
 * gate every time:
 *
 * 1. SCHEMA: the value must match SessionRecordSchema (zod).
 * 2. VERSION: the recordVersion major must equal RECORD_VERSION's major.
 *    Older majors need a migration before they can be read.
 * 3. STRUCTURE: the embedded tree must pass checkTreeSnapshot.
 *
 * A record that fails any step is reported as CorruptRecordError naming the
 * store key it came from. Accepted records are deep-frozen.
 */

import { CorruptRecordError } from "../errors.js";
import { checkTreeSnapshot } from "../tree/snapshot.js";
import { formatTopic } from "../topics/normalizer.js";
import { RECORD_VERSION, SessionRecordSchema, type SessionRecord } from "../session/record.js";
import { deepFreeze } from "../utils/freeze.js";

/**
 * Serialize a record to a JSON string.
 */
export function serializeRecord(record: SessionRecord, pretty = true): string {
  return JSON.stringify(record, null, pretty ? 2 : undefined);
}

/**
 * Validate a stored value as a session record.
 *
 * @param key - Store key or file name, used in error messages
 * @throws CorruptRecordError if the value is not a readable record
 */
export function decodeRecord(key: string, value: unknown): Readonly<SessionRecord> {
  const result = SessionRecordSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new CorruptRecordError(key, `invalid record format: ${errors}`);
  }

  const record = result.data;
  if (!isVersionCompatible(record.recordVersion)) {
    throw new CorruptRecordError(
      key,
      `incompatible record version ${record.recordVersion} (current: ${RECORD_VERSION}). ` +
        "Migration may be required."
    );
  }

  const problems = checkTreeSnapshot(record.tree);
  if (problems.length > 0) {
    throw new CorruptRecordError(key, problems.join("; "));
  }

  return deepFreeze(record);
}

/**
 * Parse and validate a record from a JSON string.
 *
 * @throws CorruptRecordError if parsing or validation fails
 */
export function deserializeRecord(json: string, key = "(json)"): Readonly<SessionRecord> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new CorruptRecordError(
      key,
      `failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return decodeRecord(key, parsed);
}

/**
 * Only an exact major version match is readable.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = RECORD_VERSION.split(".").map(Number);
  return major === currentMajor;
}

/**
 * Display text of the record's root topic, or "(empty)" for a rootless tree.
 */
export function rootTopicOf(record: SessionRecord): string {
  const root = record.tree.nodes.find((n) => n.id === record.tree.rootId);
  return root ? root.topic.display : "(empty)";
}

/**
 * Human-readable summary of a record, for logs and the history CLI.
 */
export function summarizeRecord(record: SessionRecord): string {
  const totalDwellMs = Object.values(record.perNodeDwell).reduce((sum, ms) => sum + ms, 0);
  const lines: string[] = [
    `=== Session ${record.sessionId} ===`,
    `Owner: ${record.ownerRef}`,
    `Root topic: ${formatTopic(rootTopicOf(record))}`,
    `Started: ${record.startedAt}`,
    `Ended: ${record.endedAt ?? "(open)"}`,
    `Tags: ${record.tags.join(", ") || "none"}`,
    "",
    "--- Statistics ---",
    `Topics: ${record.tree.nodes.length}`,
    `Expansions: ${record.suggestionsLog.length}`,
    `Focused time: ${formatDuration(totalDwellMs)}`,
    "",
    "--- Tree ---",
  ];

  const byId = new Map(record.tree.nodes.map((n) => [n.id, n]));
  const depth = new Map<string, number>();
  for (const node of record.tree.nodes) {
    const level = node.parentId === null ? 0 : (depth.get(node.parentId) ?? 0) + 1;
    depth.set(node.id, level);
    const links = node.crossLinks
      .map((id) => byId.get(id)?.topic.display)
      .filter((display): display is string => display !== undefined);
    const suffix = links.length > 0 ? `  (see also: ${links.join(", ")})` : "";
    lines.push(`${"  ".repeat(level)}- ${node.topic.display}${suffix}`);
  }

  return lines.join("\n");
}

/**
 * "1h 02m", "3m 05s", "42s"
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${hours}h ${String(minutes).padStart(2, "0")}m`;
  }
  if (minutes > 0) {
    return `${minutes}m ${String(seconds).padStart(2, "0")}s`;
  }
  return `${seconds}s`;
}
