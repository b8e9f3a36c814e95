/**
 * Explorer configuration loader and validator.
 *
 * Responsible for:
 * - Layering partial overrides over DEFAULT_EXPLORER_CONFIG
 * - Validating against the schema with fail-fast behavior
 * - Producing clear, structured error messages
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { ExplorerConfigSchema, type ExplorerConfig } from "./schema.js";
import { DEFAULT_EXPLORER_CONFIG } from "./defaults.js";
import { deepFreeze } from "../../utils/freeze.js";

/**
 * Structured validation error for explorer configuration.
 */
export class ExplorerConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ExplorerConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Explorer configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "parse" for unreadable files */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Layer overrides onto the defaults, one section deep.
 * Non-object input is passed through so the schema reports it.
 */
function withDefaults(overrides: unknown): unknown {
  if (!isRecord(overrides)) {
    return overrides;
  }
  const merged: Record<string, unknown> = {};
  for (const [section, defaults] of Object.entries(DEFAULT_EXPLORER_CONFIG)) {
    const override = overrides[section];
    merged[section] = isRecord(override) ? { ...defaults, ...override } : override ?? defaults;
  }
  for (const [section, value] of Object.entries(overrides)) {
    if (!(section in merged)) {
      merged[section] = value;
    }
  }
  return merged;
}

/**
 * Validate and load explorer configuration.
 *
 * @param overrides - Partial configuration layered over the defaults
 * @returns Validated and frozen ExplorerConfig
 * @throws ExplorerConfigError if validation fails
 *
 * @example
 *   const config = loadExplorerConfig({
 *     suggestions: { duplicatePolicy: "cross-link" },
 *   });
 */
export function loadExplorerConfig(overrides: unknown = {}): Readonly<ExplorerConfig> {
  const result = ExplorerConfigSchema.safeParse(withDefaults(overrides));

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ExplorerConfigError(
      `Invalid explorer configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load explorer configuration overrides from a JSON file.
 *
 * @throws ExplorerConfigError if the file cannot be read, parsed or validated
 */
export function loadExplorerConfigFile(filePath: string): Readonly<ExplorerConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ExplorerConfigError(`Cannot read explorer configuration ${filePath}`, [
      { path: [], message, code: "parse" },
    ]);
  }
  return loadExplorerConfig(parsed);
}

/**
 * Validate explorer configuration without throwing.
 */
export function validateExplorerConfig(overrides: unknown): {
  success: boolean;
  config?: ExplorerConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = ExplorerConfigSchema.safeParse(withDefaults(overrides));

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
