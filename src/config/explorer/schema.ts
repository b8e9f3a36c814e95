/**
 * Explorer configuration schema.
 *
 * Tuning for the engine: how expansions merge, how long suggestions are
 * remembered, how search results are capped, and which model the Gemini
 * provider asks. The config is validated once, deep-frozen, and handed to
 * components at construction; a session never sees it change.
 */

import { z } from "zod";
import { DuplicatePolicy } from "./enums.js";

export const SeenPolicySchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("permanent") }).strict(),
  z
    .object({
      mode: z.literal("expire"),
      ttlMs: z.number().int().positive().describe("Milliseconds before a repeat is offered again"),
    })
    .strict(),
]);

export type SeenPolicy = z.infer<typeof SeenPolicySchema>;

/**
 * Expansion behavior.
 */
export const SuggestionSettingsSchema = z
  .object({
    /** Candidates requested from the provider per expansion */
    maxResults: z
      .number()
      .int()
      .min(1)
      .max(25)
      .describe("Maximum candidates considered per expansion"),

    duplicatePolicy: DuplicatePolicy.describe(
      "Handling of suggestions that already exist elsewhere in the tree"
    ),

    seenPolicy: SeenPolicySchema.describe("Lifetime of per-node suggestion memory"),

    /** Default provider timeout; callers may override per call */
    timeoutMs: z
      .number()
      .int()
      .positive()
      .describe("Milliseconds before an expansion gives up on the provider"),
  })
  .strict();

export type SuggestionSettings = z.infer<typeof SuggestionSettingsSchema>;

export const ArchiveSettingsSchema = z
  .object({
    defaultLimit: z
      .number()
      .int()
      .positive()
      .describe("Search results returned when the caller sets no limit"),
  })
  .strict();

export type ArchiveSettings = z.infer<typeof ArchiveSettingsSchema>;

export const ProviderSettingsSchema = z
  .object({
    modelName: z.string().min(1).describe("Gemini model identifier"),
    temperature: z.number().min(0).max(2).describe("Sampling temperature"),
  })
  .strict();

export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

export const ExplorerConfigSchema = z
  .object({
    suggestions: SuggestionSettingsSchema,
    archive: ArchiveSettingsSchema,
    provider: ProviderSettingsSchema,
  })
  .strict();

export type ExplorerConfig = z.infer<typeof ExplorerConfigSchema>;
