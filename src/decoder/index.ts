// ============================================================================
// STRUCTURED-RESPONSE DECODER
// ============================================================================
// Recovers a JSON object or array from free-form model output that may be
// wrapped in prose or markdown, contain raw newlines inside strings, or be
// cut off before its closing delimiters. Cheap repairs run before substring
// extraction so a well-formed answer is never replaced by a partial match.

import { DecodeError } from "../engine/errors.js";

export type JsonContainer = Record<string, unknown> | unknown[];

type ParseOutcome = { ok: true; value: JsonContainer } | { ok: false };

const FAILED: ParseOutcome = { ok: false };

// ---- Repairs ----

/**
 * Replaces literal newlines that sit inside a quoted string with a space.
 */
export function sanitizeJsonString(text: string): string {
  let result = "";
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (escaped) {
      result += char;
      escaped = false;
    } else if (char === "\\") {
      result += char;
      escaped = true;
    } else if (char === '"') {
      result += char;
      inString = !inString;
    } else if ((char === "\n" || char === "\r") && inString) {
      result += " ";
    } else {
      result += char;
    }
  }

  return result;
}

/**
 * Appends whatever the text needs to be closed: a quote if it stops inside a
 * string, then the missing `]` and `}` in nesting order. A dangling comma left
 * by the cut is dropped.
 */
export function closeIncompleteJson(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === "\\") {
      escaped = inString;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{") stack.push("}");
    else if (char === "[") stack.push("]");
    else if ((char === "}" || char === "]") && stack[stack.length - 1] === char) stack.pop();
  }

  let closed = text;
  if (inString) closed += '"';
  if (stack.length > 0) closed = closed.replace(/,\s*$/, "");

  return closed + stack.reverse().join("");
}

// ---- Parsing ----

function isContainer(value: unknown): value is JsonContainer {
  return typeof value === "object" && value !== null;
}

function parseContainer(candidate: string): ParseOutcome {
  try {
    const value: unknown = JSON.parse(candidate);
    return isContainer(value) ? { ok: true, value } : FAILED;
  } catch {
    return FAILED;
  }
}

/**
 * Steps 1-4: as-is, sanitized, closed, sanitized and closed.
 */
function tryRepairs(text: string): ParseOutcome {
  const sanitized = sanitizeJsonString(text);
  const candidates = [text, sanitized, closeIncompleteJson(text), closeIncompleteJson(sanitized)];

  for (const candidate of candidates) {
    const outcome = parseContainer(candidate);
    if (outcome.ok) return outcome;
  }
  return FAILED;
}

function fencedBlock(text: string): string | null {
  const closed = text.match(/```(?:json|JSON)?[ \t]*\r?\n?([\s\S]*?)```/);
  if (closed) return closed[1].trim();

  // Fence opened but the response was cut before it closed
  const open = text.match(/```(?:json|JSON)?[ \t]*\r?\n?([\s\S]*)$/);
  return open ? open[1].trim() : null;
}

function delimitedChunk(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  if (start === -1) return null;
  const end = text.lastIndexOf(close);
  return end > start ? text.slice(start, end + 1) : text.slice(start);
}

/**
 * Decode an object or array out of raw model output.
 * @throws DecodeError carrying the original text when every strategy fails
 */
export function decodeStructuredResponse(raw: string): JsonContainer {
  const text = raw.trim();

  const whole = tryRepairs(text);
  if (whole.ok) return whole.value;

  const fenced = fencedBlock(text);
  if (fenced !== null) {
    const outcome = tryRepairs(fenced);
    if (outcome.ok) return outcome.value;
  }

  for (const [open, close] of [["{", "}"], ["[", "]"]] as const) {
    const chunk = delimitedChunk(text, open, close);
    if (chunk === null) continue;
    const outcome = tryRepairs(chunk);
    if (outcome.ok) return outcome.value;
  }

  throw new DecodeError(`No valid JSON found in model response:\n${raw}`, raw);
}
