/**
 * AI suggestion provider contract.
 *
 * A provider turns one topic (plus the path that led to it) into a ranked
 * list of related topics. Transport, auth and prompting are the provider's
 * business; the merger only relies on the response shape below, which it
 * re-validates because providers usually wrap untyped network output.
 */

import { z } from "zod";

export interface SuggestionRequest {
  /** Display text of the node being expanded */
  readonly topic: string;
  /** Display texts from the root down to the node being expanded */
  readonly contextPath: readonly string[];
  /** Upper bound on useful candidates */
  readonly maxResults: number;
}

export const SuggestionCandidateSchema = z.object({
  candidateTopic: z.string(),
  rationale: z.string().optional(),
});

export type SuggestionCandidate = z.infer<typeof SuggestionCandidateSchema>;

/** Ranked, best first */
export const SuggestionResponseSchema = z.array(SuggestionCandidateSchema);

export interface SuggestOptions {
  /** Aborted when the caller's timeout expires */
  readonly signal: AbortSignal;
}

export interface ExplanationRequest {
  readonly topic: string;
  readonly contextPath: readonly string[];
}

export interface SuggestionProvider {
  suggest(
    request: SuggestionRequest,
    options: SuggestOptions
  ): Promise<readonly SuggestionCandidate[]>;

  /** Markdown explanation of one topic; providers without it cannot explain */
  explain?(request: ExplanationRequest, options: SuggestOptions): Promise<string>;
}
