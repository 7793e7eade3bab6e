/**
 * Shared utilities for CLI commands
 */

import { LIMITS } from '../utils/constants.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

const MAX_INPUT_STRING_LENGTH = LIMITS.MAX_INPUT_STRING_LENGTH;
const INPUT_KEY = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const BLOCKED_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

function checkString(key: string, value: string, logger: Logger): boolean {
  if (value.length > MAX_INPUT_STRING_LENGTH) {
    logger.warn(`⚠️  Input "${key}" exceeds maximum length of ${MAX_INPUT_STRING_LENGTH} characters`);
    return false;
  }
  if (value.includes('\u0000')) {
    logger.warn(`⚠️  Input "${key}" contains invalid null characters`);
    return false;
  }
  return true;
}

/** Why `key` cannot name an input, if it cannot */
export function inputKeyProblem(key: string): string | undefined {
  if (!INPUT_KEY.test(key)) return 'use alphanumeric and underscores only';
  if (BLOCKED_KEYS.has(key)) return 'reserved keyword';
  return undefined;
}

/**
 * Parse `key=value` pairs into inputs. Values are read as JSON when they
 * parse (numbers, booleans, arrays, objects) and kept as strings otherwise.
 * Bad pairs are reported on `logger` and skipped.
 */
export function parseInputs(
  pairs?: string[],
  logger: Logger = new ConsoleLogger()
): Record<string, unknown> {
  const inputs: Record<string, unknown> = {};
  if (!pairs) return inputs;

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      logger.warn(`⚠️  Invalid input format: "${pair}" (expected key=value)`);
      continue;
    }
    const key = pair.slice(0, index);
    const value = pair.slice(index + 1);

    const problem = inputKeyProblem(key);
    if (problem) {
      logger.warn(`⚠️  Invalid input key: "${key}" (${problem})`);
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      if ((value.startsWith('{') || value.startsWith('[')) && value.length > 1) {
        logger.warn(`⚠️  Input "${key}" looks like JSON but failed to parse. Check for syntax errors.`);
      }
      parsed = value;
    }

    if (typeof parsed === 'string' && !checkString(key, parsed, logger)) continue;
    inputs[key] = parsed;
  }
  return inputs;
}

/**
 * Parse the `--input` JSON object. Pairs given with `-i` override its keys.
 * `flag` names the option in error messages.
 */
export function parseInputJson(text: string | undefined, flag = '--input'): Record<string, unknown> {
  if (text === undefined) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error(`${flag} must be a JSON object: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${flag} must be a JSON object`);
  }
  const inputs: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!BLOCKED_KEYS.has(key)) inputs[key] = value;
  }
  return inputs;
}

/** Text for stdout: strings as-is, anything else as indented JSON */
export function formatForDisplay(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value ?? null, null, 2);
}
