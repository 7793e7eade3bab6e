import { LIMITS } from './constants.ts';

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Strict parse of the trimmed text. Never throws.
 */
export function parseJsonStrict(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text.trim()) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Apply a user-supplied extraction pattern. `.` matches newlines.
 * Returns group 1 when the pattern has one, else the whole match.
 *
 * @throws Error if the pattern is not a valid regular expression
 */
export function extractWithPattern(text: string, pattern: string): string | undefined {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 's');
  } catch (error) {
    throw new Error(
      `Invalid extract_json_pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const match = regex.exec(text);
  if (!match) return undefined;
  return match[1] ?? match[0];
}

function fencedBlocks(text: string): string[] {
  const blocks: string[] = [];
  let cursor = 0;
  while (true) {
    const open = text.indexOf('```', cursor);
    if (open === -1) break;
    const close = text.indexOf('```', open + 3);
    if (close === -1) break;

    // Drop an optional language tag on the opening fence
    const body = text
      .substring(open + 3, close)
      .replace(/^(?:json)?\s+/, '')
      .trim();
    if (body) blocks.push(body);
    cursor = close + 3;
  }
  return blocks;
}

function balancedSlice(text: string): string | undefined {
  const brace = text.indexOf('{');
  const bracket = text.indexOf('[');
  let start = -1;
  if (brace !== -1 && (bracket === -1 || brace < bracket)) {
    start = brace;
  } else if (bracket !== -1) {
    start = bracket;
  }
  if (start === -1) return undefined;

  const opener = text[start];
  const closer = opener === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === '\\') {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === opener) {
      depth++;
      if (depth > LIMITS.MAX_JSON_BRACE_DEPTH) {
        throw new Error(
          `Failed to extract JSON: structure nested too deeply (max depth ${LIMITS.MAX_JSON_BRACE_DEPTH}).`
        );
      }
    } else if (char === closer) {
      depth--;
      if (depth === 0) return text.substring(start, i + 1);
    }
  }
  return undefined;
}

/**
 * Pull a JSON value out of free-form provider output.
 *
 * Order: fenced code blocks, then the first balanced `{...}` / `[...]`,
 * then the whole trimmed text.
 *
 * @throws Error if no valid JSON can be found
 */
export function extractJson(text: string): unknown {
  if (!text || text.trim().length === 0) {
    throw new Error('Failed to extract valid JSON from empty input.');
  }
  if (text.length > LIMITS.MAX_JSON_PARSE_LENGTH) {
    throw new Error(
      `Failed to extract JSON: input too large (${text.length} bytes, limit is ${LIMITS.MAX_JSON_PARSE_LENGTH}).`
    );
  }

  for (const block of fencedBlocks(text)) {
    const parsed = parseJsonStrict(block);
    if (parsed.ok) return parsed.value;
  }

  const slice = balancedSlice(text);
  if (slice !== undefined) {
    const parsed = parseJsonStrict(slice);
    if (parsed.ok) return parsed.value;
  }

  const whole = parseJsonStrict(text);
  if (whole.ok) return whole.value;

  throw new Error(`Failed to extract valid JSON from response. Content: ${text.substring(0, 100)}...`);
}
