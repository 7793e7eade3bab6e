import { existsSync, readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { toBoolean } from '../../expression/template-evaluator.ts';
import type { RegexFlag, TextProcessStep } from '../../parser/schema.ts';
import { truncate } from '../../utils/constants.ts';
import { parseJsonStrict } from '../../utils/json-parser.ts';
import { validateJsonSchema } from '../../utils/schema-validator.ts';
import { TransformError, errorMessage } from '../errors.ts';
import type { ExecutionContext } from '../workflow-state.ts';
import type { ExecutionEnv, StructuredResult, TextResult } from './types.ts';

type MethodStep<M extends TextProcessStep['method']> = Extract<TextProcessStep, { method: M }>;

/** Evaluates a per-item expression with `item` and `index` in scope */
type ItemEvaluator = (expression: string, item: unknown, index: number) => unknown;

export interface TextChunk {
  content: string;
  index: number;
  start_pos: number;
  end_pos: number;
  char_count: number;
  word_count: number;
}

const REGEX_FLAGS: Record<RegexFlag, string> = {
  IGNORECASE: 'i',
  MULTILINE: 'm',
  DOTALL: 's',
  UNICODE: 'u',
};

function fail(step: TextProcessStep, message: string): never {
  throw new TransformError(`${step.method}: ${message}`, step.method);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** String methods take non-string input as its JSON text */
function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}

function asArray(step: TextProcessStep, value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') {
    const parsed = parseJsonStrict(value);
    if (parsed.ok && Array.isArray(parsed.value)) return parsed.value;
  }
  return fail(step, `input must be an array or a JSON array string, got ${truncate(asText(value), 100)}`);
}

function compileRegex(step: TextProcessStep, pattern: string, flags: RegexFlag[], extra = ''): RegExp {
  const flagString = extra + flags.map((flag) => REGEX_FLAGS[flag]).join('');
  try {
    return new RegExp(pattern, flagString);
  } catch (error) {
    return fail(step, `Invalid regex pattern '${pattern}': ${errorMessage(error)}`);
  }
}

// ===== String methods =====

/** At most `maxSplits` cuts; the remainder stays in the last element */
export function splitText(text: string, separator: string, maxSplits?: number): string[] {
  if (maxSplits === undefined) return text.split(separator);

  const parts: string[] = [];
  let rest = text;
  while (parts.length < maxSplits) {
    const at = rest.indexOf(separator);
    if (at === -1) break;
    parts.push(rest.slice(0, at));
    rest = rest.slice(at + separator.length);
  }
  parts.push(rest);
  return parts;
}

export function extractBetween(
  text: string,
  begin: string,
  end: string,
  all: boolean
): string | string[] {
  const found: string[] = [];
  let cursor = 0;
  while (true) {
    const beginAt = text.indexOf(begin, cursor);
    if (beginAt === -1) break;
    const contentStart = beginAt + begin.length;
    const endAt = text.indexOf(end, contentStart);
    if (endAt === -1) break;
    found.push(text.slice(contentStart, endAt));
    if (!all) break;
    cursor = endAt + end.length;
  }
  return all ? found : (found[0] ?? '');
}

function regexExtract(step: MethodStep<'regex_extract'>, text: string): unknown {
  const regex = compileRegex(step, step.pattern, step.flags, 'g');
  const matches: unknown[] = [];

  for (const match of text.matchAll(regex)) {
    const { group } = step;
    if (typeof group === 'number') {
      if (group >= match.length) fail(step, `Group ${group} not found in pattern '${step.pattern}'`);
      matches.push(match[group] ?? '');
    } else if (typeof group === 'string') {
      if (!match.groups || !(group in match.groups)) {
        fail(step, `Group '${group}' not found in pattern '${step.pattern}'`);
      }
      matches.push(match.groups[group] ?? '');
    } else if (match.groups) {
      const groups: Record<string, string | null> = {};
      for (const [name, value] of Object.entries(match.groups)) {
        groups[name] = value ?? null;
      }
      matches.push(groups);
    } else {
      matches.push(match[0]);
    }
  }

  if (step.output_format === 'array') return matches;
  return matches[0] ?? '';
}

function replaceText(step: MethodStep<'replace'>, text: string): string {
  let result = text;
  for (const rule of step.replacements) {
    if ('pattern' in rule) {
      result = result.replace(compileRegex(step, rule.pattern, rule.flags, 'g'), rule.to);
    } else {
      result = result.split(rule.from).join(rule.to);
    }
  }
  return result;
}

function dataType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function loadSchemaFile(path: string): { schema?: unknown; error?: string } {
  if (!existsSync(path)) return { error: `Schema file not found: ${path}` };
  const parsed = parseJsonStrict(readFileSync(path, 'utf8'));
  if (!parsed.ok) return { error: `Invalid schema file ${path}: ${parsed.error}` };
  return { schema: parsed.value };
}

function parseAsJson(step: MethodStep<'parse_as_json'>, text: string): Record<string, unknown> {
  const parsed = parseJsonStrict(text);
  if (!parsed.ok) {
    fail(step, `Failed to parse JSON: ${parsed.error}`);
  }

  const errors: string[] = [];
  let schemaValid = true;
  let schema: unknown = step.schema;

  if (step.schema_file !== undefined) {
    const loaded = loadSchemaFile(step.schema_file);
    if (loaded.error) {
      schemaValid = false;
      errors.push(loaded.error);
    }
    schema = loaded.schema;
  }

  if (schema !== undefined) {
    try {
      const check = validateJsonSchema(schema, parsed.value);
      if (!check.valid) {
        schemaValid = false;
        errors.push(...check.errors);
      }
    } catch (error) {
      schemaValid = false;
      errors.push(`Invalid schema: ${errorMessage(error)}`);
    }
  }

  if (step.strict_validation && errors.length > 0) {
    fail(step, `JSON schema validation failed: ${errors.join('; ')}`);
  }

  return {
    data: step.format_output ? JSON.stringify(parsed.value, null, 2) : parsed.value,
    validation_result: { valid: schemaValid && errors.length === 0, errors, schema_valid: schemaValid },
    metadata: {
      schema_file: step.schema_file ?? null,
      strict_validation: step.strict_validation,
      format_output: step.format_output,
      data_type: dataType(parsed.value),
      data_size: JSON.stringify(parsed.value).length,
    },
  };
}

function chunk(content: string, index: number, start: number, end: number): TextChunk {
  const trimmed = content.trim();
  return {
    content: trimmed,
    index,
    start_pos: start,
    end_pos: end,
    char_count: trimmed.length,
    word_count: trimmed.split(/\s+/).filter(Boolean).length,
  };
}

/**
 * Character chunks of `size`. With `preserve_boundaries` a chunk may end early
 * at a space, as long as that gives up no more than a tenth of its size.
 */
export function splitByCharacters(
  text: string,
  size: number,
  overlap: number,
  preserveBoundaries: boolean
): TextChunk[] {
  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (preserveBoundaries && end < text.length) {
      const space = text.lastIndexOf(' ', end);
      if (space > start && end - space <= size * 0.1) {
        end = space;
      }
    }

    const content = text.slice(start, end);
    if (content.trim()) {
      chunks.push(chunk(content, chunks.length, start, end));
    }
    if (end >= text.length) break;

    start = Math.max(end - overlap, start + 1);
  }
  return chunks;
}

/** Word chunks; positions are word offsets */
export function splitByTokens(text: string, size: number, overlap: number): TextChunk[] {
  const words = text.split(/\s+/).filter(Boolean);
  const chunks: TextChunk[] = [];
  const stride = size - overlap;

  for (let start = 0; start < words.length; start += stride) {
    const end = Math.min(start + size, words.length);
    chunks.push(chunk(words.slice(start, end).join(' '), chunks.length, start, end));
    if (end >= words.length) break;
  }
  return chunks;
}

// ===== Array methods =====

/** Select input accepts a JSON array string, else a comma-separated list */
function asSelectable(step: TextProcessStep, value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') {
    const parsed = parseJsonStrict(value);
    if (parsed.ok && Array.isArray(parsed.value)) return parsed.value;
    return value.split(',').map((part) => part.trim());
  }
  return fail(step, `input must be an array, a JSON array string or a comma-separated list`);
}

/** `start:end[:step]` with negative indices counted from the end */
export function sliceItems<T>(items: T[], expression: string): T[] {
  const [startPart = '', endPart = '', stepPart = ''] = expression.trim().split(':');
  const parse = (part: string) => (part === '' ? undefined : Number.parseInt(part, 10));
  const start = parse(startPart);
  const end = parse(endPart);
  const step = parse(stepPart) ?? 1;
  if (step === 0) {
    throw new TransformError('select_item: slice step cannot be zero', 'select_item');
  }

  const n = items.length;
  const clamp = (value: number | undefined, fallback: number, low: number, high: number) => {
    if (value === undefined) return fallback;
    const absolute = value < 0 ? value + n : value;
    return Math.min(Math.max(absolute, low), high);
  };

  const result: T[] = [];
  if (step > 0) {
    const from = clamp(start, 0, 0, n);
    const to = clamp(end, n, 0, n);
    for (let i = from; i < to; i += step) result.push(items[i]);
  } else {
    const from = clamp(start, n - 1, -1, n - 1);
    const to = clamp(end, -1, -1, n - 1);
    for (let i = from; i > to; i += step) result.push(items[i]);
  }
  return result;
}

function selectItem(step: MethodStep<'select_item'>, items: unknown[], evaluate: ItemEvaluator): unknown {
  if (step.index !== undefined) {
    if (Math.abs(step.index) >= items.length) {
      fail(step, `Index ${step.index} out of range for array of length ${items.length}`);
    }
    return items.at(step.index);
  }
  if (step.slice !== undefined) {
    return sliceItems(items, step.slice);
  }
  const { condition } = step;
  if (condition === undefined) {
    return fail(step, 'one of "index", "slice" or "condition" is required');
  }
  return items.filter((item, index) => toBoolean(evaluateItem(step, condition, evaluate, item, index)));
}

function evaluateItem(
  step: TextProcessStep,
  expression: string,
  evaluate: ItemEvaluator,
  item: unknown,
  index: number
): unknown {
  try {
    return evaluate(expression, item, index);
  } catch (error) {
    return fail(step, `Error evaluating '${expression}' on item ${index}: ${errorMessage(error)}`);
  }
}

export function aggregate(
  operation: MethodStep<'array_aggregate'>['operation'],
  items: unknown[],
  separator: string
): unknown {
  const numbers = items.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
  switch (operation) {
    case 'count':
      return items.length;
    case 'sum':
      return numbers.reduce((total, n) => total + n, 0);
    case 'avg':
      return numbers.length > 0 ? numbers.reduce((total, n) => total + n, 0) / numbers.length : 0;
    case 'min':
      return numbers.length > 0 ? Math.min(...numbers) : null;
    case 'max':
      return numbers.length > 0 ? Math.max(...numbers) : null;
    case 'join':
      return items.map(asText).join(separator);
  }
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  throw new Error(`cannot compare ${dataType(a)} with ${dataType(b)}`);
}

function sortItems(step: MethodStep<'array_sort'>, items: unknown[]): unknown[] {
  const { sort_key: key } = step;
  const sortValue = (item: unknown): unknown => {
    if (key === undefined) return item;
    return isRecord(item) && key in item ? item[key] : asText(item);
  };
  const direction = step.sort_reverse ? -1 : 1;

  try {
    return [...items].sort((a, b) => direction * compareValues(sortValue(a), sortValue(b)));
  } catch (error) {
    return fail(step, `Error in sorting: ${errorMessage(error)}`);
  }
}

// ===== Dispatch =====

/**
 * Apply a text method to an already-resolved input. Deterministic apart from
 * `parse_as_json` reading its `schema_file`.
 *
 * @throws TransformError on malformed input
 */
function applyTransform(
  step: TextProcessStep,
  input: unknown,
  evaluate: ItemEvaluator
): unknown {
  switch (step.method) {
    case 'split':
      return splitText(asText(input), step.separator, step.max_splits);
    case 'extract_between_marker':
      return extractBetween(asText(input), step.begin, step.end, step.extract_all);
    case 'regex_extract':
      return regexExtract(step, asText(input));
    case 'select_item':
      return selectItem(step, asSelectable(step, input), evaluate);
    case 'parse_as_json':
      return parseAsJson(step, asText(input));
    case 'replace':
      return replaceText(step, asText(input));
    case 'json_parse': {
      const parsed = parseJsonStrict(asText(input));
      if (!parsed.ok) fail(step, `Invalid JSON: ${parsed.error}`);
      return parsed.value;
    }
    case 'yaml_parse':
      try {
        return yaml.load(asText(input)) ?? null;
      } catch (error) {
        return fail(step, `Invalid YAML: ${errorMessage(error)}`);
      }
    case 'fixed_split':
      return step.split_by === 'tokens'
        ? splitByTokens(asText(input), step.size, step.overlap)
        : splitByCharacters(asText(input), step.size, step.overlap, step.preserve_boundaries);
    case 'array_filter': {
      const { condition } = step;
      return asArray(step, input).filter((item, index) =>
        toBoolean(evaluateItem(step, condition, evaluate, item, index))
      );
    }
    case 'array_transform': {
      const { transform } = step;
      return asArray(step, input).map((item, index) =>
        evaluateItem(step, transform, evaluate, item, index)
      );
    }
    case 'array_aggregate':
      return aggregate(step.operation, asArray(step, input), step.separator);
    case 'array_sort':
      return sortItems(step, asArray(step, input));
    case 'format':
      return fail(step, 'format needs the execution context');
  }
}

/**
 * Execute a `text_process` step
 */
export async function executeTransformStep(
  step: TextProcessStep,
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<TextResult | StructuredResult> {
  const input = env.evaluator.resolve(step.input, context);

  let output: unknown;
  if (step.method === 'format') {
    output = env.evaluator.render(step.template, {
      input: context.input,
      steps: context.steps,
      scope: { ...context.scope, value: input },
    });
  } else {
    output = applyTransform(step, input, (expression, item, index) =>
      env.evaluator.evaluate(expression, {
        input: context.input,
        steps: context.steps,
        scope: { ...context.scope, item, index },
      })
    );
  }

  if (typeof output === 'string') {
    return { kind: 'text', output };
  }
  return { kind: 'structured', output };
}

