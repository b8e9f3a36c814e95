/**
 * Gemini-backed suggestion provider.
 *
 * Asks the model for related sub-concepts as a JSON array of
 * `{ candidateTopic, rationale }` objects. The raw text is parsed and
 * validated here; anything that fails becomes SuggestionProviderError so the
 * merger can treat it like any other transport failure.
 */

import { GoogleGenAI, Type, type GenerateContentParameters } from "@google/genai";
import { SuggestionProviderError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { DEFAULT_EXPLORER_CONFIG } from "../config/explorer/defaults.js";
import {
  SuggestionResponseSchema,
  type ExplanationRequest,
  type SuggestOptions,
  type SuggestionCandidate,
  type SuggestionProvider,
  type SuggestionRequest,
} from "./provider.js";

/**
 * The slice of the Gemini client this provider uses.
 * GoogleGenAI satisfies it; tests pass a stub.
 */
export interface GenerateContentClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
  };
}

export interface GeminiProviderOptions {
  /** Required unless `client` is given */
  apiKey?: string;
  client?: GenerateContentClient;
  model?: string;
  temperature?: number;
  logger?: Logger;
}

const SYSTEM_INSTRUCTION = `
You are a knowledge-mapping assistant helping a learner explore a subject one concept at a time.
Given a concept and the path of concepts that led to it, suggest closely related sub-concepts
worth exploring next. Prefer specific, distinct concepts over generic ones.
Never repeat a concept from the path. Output valid JSON only.
`.trim();

const EXPLAIN_INSTRUCTION = `
You are a patient tutor. Explain concepts for a curious learner in clear markdown.
`.trim();

const RESPONSE_SCHEMA = {
  type: Type.ARRAY,
  items: {
    type: Type.OBJECT,
    properties: {
      candidateTopic: { type: Type.STRING },
      rationale: { type: Type.STRING },
    },
    required: ["candidateTopic"],
  },
};

const JSON_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Build the user prompt for one expansion.
 */
export function buildSuggestionPrompt(request: SuggestionRequest): string {
  const path = request.contextPath.join(" > ");
  return [
    `Concept: ${request.topic}`,
    `Path so far: ${path}`,
    "",
    `Suggest up to ${request.maxResults} related concepts, most relevant first.`,
    "For each, give a short phrase (max 5 words) as candidateTopic and one sentence",
    "explaining how it relates to the concept as rationale.",
  ].join("\n");
}

/**
 * Build the prompt for a detailed explanation of one topic.
 */
export function buildExplanationPrompt(request: ExplanationRequest): string {
  return [
    `Provide a detailed explanation of the topic "${request.topic}".`,
    `It was reached through: ${request.contextPath.join(" > ")}`,
    "",
    "Include:",
    "- A clear definition or introduction",
    "- Key concepts and principles",
    "- Important applications or examples",
    "- Historical context if relevant",
  ].join("\n");
}

/**
 * Parse model output into candidates. Tolerates a fenced code block.
 *
 * @throws SuggestionProviderError when the text is not a valid candidate list
 */
export function parseSuggestionText(text: string): SuggestionCandidate[] {
  const trimmed = text.trim();
  const body = JSON_FENCE.exec(trimmed)?.[1] ?? trimmed;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new SuggestionProviderError("Suggestion response is not valid JSON", { cause: err });
  }

  const parsed = SuggestionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new SuggestionProviderError(`Suggestion response has the wrong shape: ${detail}`);
  }
  return parsed.data;
}

export class GeminiSuggestionProvider implements SuggestionProvider {
  private readonly client: GenerateContentClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly logger: Logger;

  constructor(options: GeminiProviderOptions) {
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new GoogleGenAI({ apiKey: options.apiKey });
    } else {
      throw new SuggestionProviderError("Gemini provider needs an apiKey or a client");
    }
    this.model = options.model ?? DEFAULT_EXPLORER_CONFIG.provider.modelName;
    this.temperature = options.temperature ?? DEFAULT_EXPLORER_CONFIG.provider.temperature;
    this.logger = options.logger ?? silentLogger;
  }

  async suggest(
    request: SuggestionRequest,
    options: SuggestOptions
  ): Promise<SuggestionCandidate[]> {
    this.logger.debug("Gemini request", { model: this.model, topic: request.topic });

    let text: string;
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: buildSuggestionPrompt(request),
        config: {
          systemInstruction: SYSTEM_INSTRUCTION,
          responseMimeType: "application/json",
          responseSchema: RESPONSE_SCHEMA,
          temperature: this.temperature,
          abortSignal: options.signal,
        },
      });
      text = response.text ?? "";
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error("Gemini request failed", { model: this.model, message });
      throw new SuggestionProviderError(`Gemini request failed: ${message}`, { cause: err });
    }

    const candidates = parseSuggestionText(text);
    this.logger.debug("Gemini response", { candidates: candidates.length });
    return candidates.slice(0, request.maxResults);
  }

  async explain(request: ExplanationRequest, options: SuggestOptions): Promise<string> {
    this.logger.debug("Gemini explanation request", { model: this.model, topic: request.topic });
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: buildExplanationPrompt(request),
        config: {
          systemInstruction: EXPLAIN_INSTRUCTION,
          temperature: this.temperature,
          abortSignal: options.signal,
        },
      });
      return response.text ?? "";
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error("Gemini request failed", { model: this.model, message });
      throw new SuggestionProviderError(`Gemini request failed: ${message}`, { cause: err });
    }
  }
}
