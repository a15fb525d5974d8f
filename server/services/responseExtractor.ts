/**
 * Recover a list of result records from free-text model output.
 *
 * Candidates are tried in order and the first hit wins:
 *   1. a ```json fenced block
 *   2. the first `[ { ... } ]` array of objects
 *   3. the first bare `{ ... }` object
 *   4. the whole text, if it parses as JSON
 * Fence markers are stripped before steps 2-4. Nothing here throws; anything
 * unrecoverable comes back as an empty list.
 */

import { createLogger, errorMessage, type Logger } from "../logger";

const FENCED_JSON_PATTERN = /```json\s*([\s\S]*?)\s*```/;
const FENCE_MARKER_PATTERN = /```(?:json)?\s*|\s*```/g;
const ARRAY_OF_OBJECTS_PATTERN = /\[\s*\{[\s\S]*?\}\s*\]/;
const BARE_OBJECT_PATTERN = /\{[\s\S]*?\}/;

export type CandidateSource = "fenced" | "array" | "object" | "whole" | "none";

export interface ExtractionCandidate {
  source: CandidateSource;
  content: string | null;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function findCandidate(text: string): ExtractionCandidate {
  // Looked up before the fences are stripped, otherwise the tag is gone
  const fenced = FENCED_JSON_PATTERN.exec(text);
  if (fenced) {
    return { source: "fenced", content: fenced[1] };
  }

  const cleaned = text.replace(FENCE_MARKER_PATTERN, "");

  const array = ARRAY_OF_OBJECTS_PATTERN.exec(cleaned);
  if (array) {
    return { source: "array", content: array[0] };
  }

  const object = BARE_OBJECT_PATTERN.exec(cleaned);
  if (object) {
    return { source: "object", content: object[0] };
  }

  if (isJson(cleaned)) {
    return { source: "whole", content: cleaned };
  }

  return { source: "none", content: null };
}

export function normalizeParsed(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (isPlainObject(parsed)) {
    if ("results" in parsed) {
      const results = parsed.results;
      return Array.isArray(results) ? results : [];
    }
    return [parsed];
  }
  return [];
}

export function extractRecords(text: string, logger: Logger = createLogger("ResponseExtractor")): unknown[] {
  const candidate = findCandidate(text);
  if (candidate.content === null) {
    logger.error("Could not find JSON content in the response");
    return [];
  }

  logger.debug(`Using ${candidate.source} candidate`);

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate.content);
  } catch (error) {
    logger.error(`Error parsing JSON: ${errorMessage(error)}`);
    return [];
  }

  const records = normalizeParsed(parsed);
  if (records.length === 0 && !Array.isArray(parsed)) {
    logger.warn(`Unexpected JSON structure: ${parsed === null ? "null" : typeof parsed}`);
  }
  return records;
}
