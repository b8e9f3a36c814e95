/**
 * Default explorer configuration.
 *
 * Five suggestions per expansion keeps a branch readable; duplicates are
 * skipped rather than cross-linked, and suggestion memory lasts for the
 * whole session.
 */

import type { ExplorerConfig } from "./schema.js";

export const DEFAULT_EXPLORER_CONFIG: ExplorerConfig = {
  suggestions: {
    maxResults: 5,
    duplicatePolicy: "skip",
    seenPolicy: { mode: "permanent" },
    timeoutMs: 20_000,
  },

  archive: {
    defaultLimit: 20,
  },

  provider: {
    modelName: "gemini-2.5-flash",
    temperature: 0.3,
  },
};
