/**
 * Seed-topic extraction from uploaded documents.
 *
 * Line rules (text, Markdown, and the raw text of .docx files):
 *
 *   # Heading / ## Heading        -> heading text
 *   - item / * item / 1. item     -> item text
 *   any other line                -> kept when it has at most 8 words and
 *                                    does not end with a period
 *
 * Candidates are de-duplicated by normalized key (first spelling wins) and
 * returned in document order. Lines that normalize to nothing are skipped.
 */

import mammoth from "mammoth";
import { InvalidDocumentError, UnsupportedDocumentError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { normalizeKey } from "../topics/normalizer.js";

export const MIME_TEXT = "text/plain";
export const MIME_MARKDOWN = "text/markdown";
export const MIME_DOCX =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export interface ParseRequest {
  readonly document: Uint8Array;
  readonly mimeType: string;
}

export interface DocumentParser {
  parse(request: ParseRequest): Promise<Set<string>>;
}

const HEADING = /^#{1,6}\s+(.+?)\s*#*$/;
const LIST_ITEM = /^(?:[-*+]|\d+[.)])\s+(.+)$/;
const CODE_FENCE = /^(```|~~~)/;
const MAX_PLAIN_WORDS = 8;

/**
 * Extract candidate topics from plain or Markdown text.
 */
export function extractSeedTopics(text: string): Set<string> {
  const seeds = new Set<string>();
  const keys = new Set<string>();
  let inCode = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (CODE_FENCE.test(line)) {
      inCode = !inCode;
      continue;
    }
    if (inCode || line.length === 0) {
      continue;
    }

    const candidate = seedFromLine(line);
    if (candidate === undefined) {
      continue;
    }
    const key = normalizeKey(candidate);
    if (key.length === 0 || keys.has(key)) {
      continue;
    }
    keys.add(key);
    seeds.add(candidate);
  }

  return seeds;
}

function seedFromLine(line: string): string | undefined {
  const heading = HEADING.exec(line)?.[1];
  if (heading !== undefined) {
    return stripTrailingColon(heading);
  }
  const item = LIST_ITEM.exec(line)?.[1];
  if (item !== undefined) {
    return stripTrailingColon(item.trim());
  }
  const words = line.split(/\s+/);
  if (words.length <= MAX_PLAIN_WORDS && !line.endsWith(".")) {
    return stripTrailingColon(line);
  }
  return undefined;
}

function stripTrailingColon(text: string): string {
  return text.replace(/:+$/, "").trim();
}

export class TextDocumentParser implements DocumentParser {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws UnsupportedDocumentError for types other than text, Markdown and .docx
   * @throws InvalidDocumentError when a .docx file cannot be read
   */
  async parse(request: ParseRequest): Promise<Set<string>> {
    const mimeType = request.mimeType.split(";")[0]?.trim().toLowerCase() ?? "";
    let text: string;

    switch (mimeType) {
      case MIME_TEXT:
      case MIME_MARKDOWN:
        text = new TextDecoder("utf-8").decode(request.document);
        break;
      case MIME_DOCX:
        text = await this.readDocx(request.document);
        break;
      default:
        throw new UnsupportedDocumentError(request.mimeType);
    }

    const seeds = extractSeedTopics(text);
    this.logger.debug("Document parsed", { mimeType, seeds: seeds.size });
    return seeds;
  }

  private async readDocx(document: Uint8Array): Promise<string> {
    try {
      const result = await mammoth.extractRawText({ buffer: Buffer.from(document) });
      return result.value;
    } catch (err) {
      throw new InvalidDocumentError(MIME_DOCX, { cause: err });
    }
  }
}
