/**
 * `--input-file-for key=path[:format[:encoding]]` support
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { extname } from 'node:path';
import * as yaml from 'js-yaml';
import { errorMessage } from '../runner/errors.ts';
import { inputKeyProblem } from './utils.ts';

const FILE_FORMATS = ['text', 'lines', 'json', 'yaml'] as const;
type FileFormat = (typeof FILE_FORMATS)[number];

export interface FileInputSpec {
  key: string;
  path: string;
  format: FileFormat;
  encoding: BufferEncoding;
}

const MAX_FILE_SIZE = 10 * 1024 * 1024;
const SNIFF_BYTES = 8192;
const CONTROL_CHAR_THRESHOLD = 0.05;

const EXTENSION_FORMATS: Record<string, FileFormat> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.txt': 'text',
};

function isFileFormat(value: string): value is FileFormat {
  return FILE_FORMATS.some((format) => format === value);
}

function toFormat(value: string): FileFormat {
  const lower = value.toLowerCase();
  const format = lower === 'yml' ? 'yaml' : lower;
  if (!isFileFormat(format)) {
    throw new Error(`Unsupported file format: "${value}". Supported formats: ${FILE_FORMATS.join(', ')}`);
  }
  return format;
}

function toEncoding(value: string): BufferEncoding {
  const encoding = value.toLowerCase();
  if (!Buffer.isEncoding(encoding)) {
    throw new Error(`Unsupported encoding: "${value}"`);
  }
  return encoding;
}

/**
 * Parse `key=path[:format[:encoding]]`. Without a format the file extension
 * decides, falling back to text.
 */
export function parseFileInputSpec(spec: string): FileInputSpec {
  const index = spec.indexOf('=');
  if (index === -1) {
    throw new Error(`Invalid file input format: "${spec}". Expected "key=path[:format[:encoding]]"`);
  }
  const key = spec.slice(0, index).trim();
  if (!key) {
    throw new Error(`File input key cannot be empty in: "${spec}"`);
  }
  const problem = inputKeyProblem(key);
  if (problem) {
    throw new Error(`Invalid input key: "${key}" (${problem})`);
  }

  const [path = '', format, encoding] = spec.slice(index + 1).trim().split(':');
  if (!path) {
    throw new Error(`File input path cannot be empty in: "${spec}"`);
  }
  return {
    key,
    path,
    format: format ? toFormat(format) : (EXTENSION_FORMATS[extname(path).toLowerCase()] ?? 'text'),
    encoding: encoding ? toEncoding(encoding) : 'utf8',
  };
}

/** Null bytes, or too many control characters other than tab and line breaks */
function looksBinary(chunk: Buffer): boolean {
  if (chunk.includes(0)) return true;
  let control = 0;
  for (const byte of chunk) {
    if (byte < 32 && byte !== 9 && byte !== 10 && byte !== 13) control++;
  }
  return chunk.length > 0 && control / chunk.length > CONTROL_CHAR_THRESHOLD;
}

function loadFileInput(spec: FileInputSpec): unknown {
  const { path, format, encoding } = spec;
  if (!existsSync(path)) {
    throw new Error(`File not found: "${path}"`);
  }
  const stats = statSync(path);
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: "${path}"`);
  }
  if (stats.size > MAX_FILE_SIZE) {
    throw new Error(
      `File "${path}" size (${stats.size} bytes) exceeds maximum allowed size (${MAX_FILE_SIZE} bytes)`
    );
  }

  const raw = readFileSync(path);
  if (looksBinary(raw.subarray(0, SNIFF_BYTES))) {
    throw new Error(`Binary files are not supported: "${path}"`);
  }
  const content = raw.toString(encoding);

  switch (format) {
    case 'text':
      return content;
    case 'lines':
      return content.split(/\r?\n/).filter((line, i, lines) => i < lines.length - 1 || line !== '');
    case 'json':
      try {
        return JSON.parse(content);
      } catch (error) {
        throw new Error(`Invalid JSON in file "${path}": ${errorMessage(error)}`);
      }
    case 'yaml':
      try {
        return yaml.load(content);
      } catch (error) {
        throw new Error(`Invalid YAML in file "${path}": ${errorMessage(error)}`);
      }
  }
}

/** Load every `--input-file-for` spec into one inputs object; later keys win */
export function loadFileInputs(specs: string[] | undefined): Record<string, unknown> {
  const inputs: Record<string, unknown> = {};
  for (const spec of specs ?? []) {
    const parsed = parseFileInputSpec(spec);
    inputs[parsed.key] = loadFileInput(parsed);
  }
  return inputs;
}
