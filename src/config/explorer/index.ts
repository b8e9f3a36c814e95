/**
 * Explorer configuration module.
 *
 * Usage:
 *   import { loadExplorerConfig } from "./config/explorer/index.js";
 *
 *   // Defaults
 *   const config = loadExplorerConfig();
 *
 *   // Overrides, layered per section
 *   const linking = loadExplorerConfig({
 *     suggestions: { duplicatePolicy: "cross-link", maxResults: 8 },
 *   });
 */

export { DuplicatePolicy, SeenPolicyMode, HistoryPeriod, HistorySort } from "./enums.js";

export type {
  ExplorerConfig,
  SuggestionSettings,
  ArchiveSettings,
  ProviderSettings,
  SeenPolicy,
} from "./schema.js";

export {
  ExplorerConfigSchema,
  SuggestionSettingsSchema,
  ArchiveSettingsSchema,
  ProviderSettingsSchema,
  SeenPolicySchema,
} from "./schema.js";

export {
  loadExplorerConfig,
  loadExplorerConfigFile,
  validateExplorerConfig,
  ExplorerConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_EXPLORER_CONFIG } from "./defaults.js";
