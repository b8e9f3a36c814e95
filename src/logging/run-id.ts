/**
 * Run ID generation and management.
 * Each process run gets a short ID that tags every log line.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/**
 * Generate a session ID: "s-" + run-style ID + 4 more random hex chars.
 * Session IDs are stored as record keys, so they stay filename-safe.
 */
export function generateSessionId(now: Date = new Date()): string {
  return `s-${generateRunId(now)}${randomBytes(2).toString("hex")}`;
}

/** Current run ID for this process */
let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this process.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
