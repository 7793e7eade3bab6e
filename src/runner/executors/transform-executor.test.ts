import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { createTestEnv, parseStep } from '../__test__/test-env.ts';
import { TemplateResolutionError, TransformError } from '../errors.ts';
import { executeStep } from '../step-executor.ts';
import { createContext } from '../workflow-state.ts';
import {
  aggregate,
  extractBetween,
  sliceItems,
  splitByCharacters,
  splitByTokens,
  splitText,
} from './transform-executor.ts';

async function transform(raw: Record<string, unknown>, input: Record<string, unknown>) {
  const { env } = createTestEnv();
  const step = parseStep({ id: 't', type: 'text_process', input: '${{ input.value }}', ...raw });
  return executeStep(step, createContext(input), env);
}

async function output(raw: Record<string, unknown>, value: unknown) {
  return (await transform(raw, { value })).output;
}

describe('splitText', () => {
  it('splits on every separator by default', () => {
    expect(splitText('a,b,c', ',')).toEqual(['a', 'b', 'c']);
  });

  it('keeps the remainder after max_splits cuts', () => {
    expect(splitText('a,b,c', ',', 1)).toEqual(['a', 'b,c']);
    expect(splitText('a,b,c', ',', 0)).toEqual(['a,b,c']);
  });
});

describe('extractBetween', () => {
  const text = '<a>1</a> <a>2</a>';

  it('returns the first match or an empty string', () => {
    expect(extractBetween(text, '<a>', '</a>', false)).toBe('1');
    expect(extractBetween(text, '[', ']', false)).toBe('');
  });

  it('collects non-overlapping matches with extract_all', () => {
    expect(extractBetween(text, '<a>', '</a>', true)).toEqual(['1', '2']);
  });
});

describe('sliceItems', () => {
  const items = ['a', 'b', 'c', 'd'];

  it('handles open bounds and negative indices', () => {
    expect(sliceItems(items, '1:')).toEqual(['b', 'c', 'd']);
    expect(sliceItems(items, ':-1')).toEqual(['a', 'b', 'c']);
    expect(sliceItems(items, '-2:')).toEqual(['c', 'd']);
  });

  it('supports steps, including negative ones', () => {
    expect(sliceItems(items, '::2')).toEqual(['a', 'c']);
    expect(sliceItems(items, '::-1')).toEqual(['d', 'c', 'b', 'a']);
  });

  it('clamps out-of-range bounds', () => {
    expect(sliceItems(items, '2:99')).toEqual(['c', 'd']);
    expect(sliceItems(items, '9:')).toEqual([]);
  });
});

describe('fixed_split chunking', () => {
  it('cuts fixed character windows', () => {
    const chunks = splitByCharacters('abcdefghij', 4, 0, false);
    expect(chunks.map((c) => c.content)).toEqual(['abcd', 'efgh', 'ij']);
    expect(chunks[2]).toMatchObject({ index: 2, start_pos: 8, end_pos: 10, char_count: 2 });
  });

  it('overlaps consecutive windows', () => {
    const chunks = splitByCharacters('abcdefghij', 4, 2, false);
    expect(chunks.map((c) => c.content)).toEqual(['abcd', 'cdef', 'efgh', 'ghij']);
  });

  it('pulls a cut back to a nearby space when preserving boundaries', () => {
    const chunks = splitByCharacters('hello world foo', 12, 0, true);
    expect(chunks).toEqual([
      { content: 'hello world', index: 0, start_pos: 0, end_pos: 11, char_count: 11, word_count: 2 },
      { content: 'foo', index: 1, start_pos: 11, end_pos: 15, char_count: 3, word_count: 1 },
    ]);
  });

  it('counts token windows in words', () => {
    expect(splitByTokens('a b c d e', 2, 0).map((c) => c.content)).toEqual(['a b', 'c d', 'e']);
    const overlapping = splitByTokens('a b c d e', 2, 1);
    expect(overlapping.map((c) => c.content)).toEqual(['a b', 'b c', 'c d', 'd e']);
    expect(overlapping[3]).toMatchObject({ start_pos: 3, end_pos: 5 });
  });
});

describe('aggregate', () => {
  it('sums and averages numeric items only', () => {
    expect(aggregate('sum', [1, 2, 'x', 3], ', ')).toBe(6);
    expect(aggregate('avg', [2, 4], ', ')).toBe(3);
    expect(aggregate('avg', [], ', ')).toBe(0);
  });

  it('returns null for min and max of an empty list', () => {
    expect(aggregate('min', [], ', ')).toBeNull();
    expect(aggregate('max', [3, 9, 1], ', ')).toBe(9);
  });

  it('counts and joins every item', () => {
    expect(aggregate('count', ['a', null, 3], ', ')).toBe(3);
    expect(aggregate('join', ['a', 1, { b: 2 }], ' | ')).toBe('a | 1 | {"b":2}');
  });
});

describe('executeTransformStep', () => {
  it('returns a text result for string output', async () => {
    const result = await transform({ method: 'select_item', index: -1 }, { value: ['a', 'b', 'c'] });
    expect(result).toEqual({ kind: 'text', output: 'c' });
  });

  it('returns a structured result for other output', async () => {
    const result = await transform({ method: 'split', separator: ',' }, { value: 'x,y' });
    expect(result).toEqual({ kind: 'structured', output: ['x', 'y'] });
  });

  it('fails on an unknown input reference', async () => {
    await expect(transform({ method: 'json_parse' }, {})).rejects.toBeInstanceOf(
      TemplateResolutionError
    );
  });

  describe('regex_extract', () => {
    it('returns the first whole match by default', async () => {
      expect(await output({ method: 'regex_extract', pattern: 'id=\\d+' }, 'id=12, id=34')).toBe(
        'id=12'
      );
    });

    it('collects a numbered group as an array', async () => {
      const step = { method: 'regex_extract', pattern: 'id=(\\d+)', group: 1, output_format: 'array' };
      expect(await output(step, 'id=12, id=34')).toEqual(['12', '34']);
    });

    it('yields objects for named groups', async () => {
      const step = {
        method: 'regex_extract',
        pattern: '(?<key>\\w+)=(?<value>\\d+)',
        output_format: 'array',
      };
      expect(await output(step, 'a=1 b=2')).toEqual([
        { key: 'a', value: '1' },
        { key: 'b', value: '2' },
      ]);
    });

    it('applies flags', async () => {
      const step = { method: 'regex_extract', pattern: 'hello', flags: ['IGNORECASE'] };
      expect(await output(step, 'Say HELLO')).toBe('HELLO');
    });

    it('returns an empty string when nothing matches', async () => {
      expect(await output({ method: 'regex_extract', pattern: '\\d+' }, 'none')).toBe('');
    });

    it('rejects a group the pattern does not have', async () => {
      const step = { method: 'regex_extract', pattern: 'id=(\\d+)', group: 3 };
      await expect(output(step, 'id=1')).rejects.toThrow(
        "regex_extract: Group 3 not found in pattern 'id=(\\d+)'"
      );
    });
  });

  describe('select_item', () => {
    it('rejects an index outside the array', async () => {
      await expect(output({ method: 'select_item', index: 3 }, ['a', 'b', 'c'])).rejects.toThrow(
        'select_item: Index 3 out of range for array of length 3'
      );
    });

    it('reads a comma-separated list', async () => {
      expect(await output({ method: 'select_item', index: 1 }, 'x, y ,z')).toBe('y');
    });

    it('slices', async () => {
      expect(await output({ method: 'select_item', slice: '::-1' }, '[1,2,3]')).toEqual([3, 2, 1]);
    });

    it('filters by condition', async () => {
      expect(await output({ method: 'select_item', condition: 'item > 1' }, [1, 2, 3])).toEqual([2, 3]);
    });
  });

  describe('parse_as_json', () => {
    const dirs: string[] = [];

    afterAll(() => {
      for (const dir of dirs) rmSync(dir, { recursive: true, force: true });
    });

    it('reports schema mismatches without failing', async () => {
      const step = {
        method: 'parse_as_json',
        schema: { type: 'object', required: ['a', 'b'] },
      };
      const result = await output(step, '{"a":1}');
      expect(result).toMatchObject({
        data: { a: 1 },
        validation_result: { valid: false, schema_valid: false },
        metadata: {
          schema_file: null,
          strict_validation: false,
          format_output: false,
          data_type: 'object',
          data_size: 7,
        },
      });
    });

    it('fails on a schema mismatch under strict_validation', async () => {
      const step = {
        method: 'parse_as_json',
        schema: { type: 'array' },
        strict_validation: true,
      };
      await expect(output(step, '{"a":1}')).rejects.toBeInstanceOf(TransformError);
    });

    it('pretty-prints data with format_output', async () => {
      const result = await output({ method: 'parse_as_json', format_output: true }, '{"a":1}');
      expect(result).toMatchObject({
        data: '{\n  "a": 1\n}',
        validation_result: { valid: true, errors: [], schema_valid: true },
      });
    });

    it('reads the schema from schema_file', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'stepline-schema-'));
      dirs.push(dir);
      const schemaFile = join(dir, 'schema.json');
      writeFileSync(schemaFile, JSON.stringify({ type: 'array' }));

      const result = await output({ method: 'parse_as_json', schema_file: schemaFile }, '[1]');
      expect(result).toMatchObject({
        validation_result: { valid: true, schema_valid: true },
        metadata: { schema_file: schemaFile, data_type: 'array' },
      });
    });

    it('reports a missing schema file', async () => {
      const step = { method: 'parse_as_json', schema_file: '/nonexistent/schema.json' };
      const result = await output(step, '{}');
      expect(result).toMatchObject({
        validation_result: {
          valid: false,
          errors: ['Schema file not found: /nonexistent/schema.json'],
          schema_valid: false,
        },
      });
    });

    it('fails on invalid JSON', async () => {
      await expect(output({ method: 'parse_as_json' }, '{oops')).rejects.toThrow(
        /^parse_as_json: Failed to parse JSON/
      );
    });
  });

  it('replaces literals and patterns in order', async () => {
    const step = {
      method: 'replace',
      replacements: [
        { from: 'foo', to: 'bar' },
        { pattern: '(\\w+)@(\\w+)', to: '$2 at $1' },
      ],
    };
    expect(await output(step, 'foo me@host foo')).toBe('bar host at me bar');
  });

  it('parses JSON and YAML', async () => {
    expect(await output({ method: 'json_parse' }, '[1,2]')).toEqual([1, 2]);
    expect(await output({ method: 'yaml_parse' }, 'a: 1\nb: [x, y]')).toEqual({ a: 1, b: ['x', 'y'] });
    await expect(output({ method: 'json_parse' }, 'nope')).rejects.toBeInstanceOf(TransformError);
  });

  it('formats with the input bound as value', async () => {
    const result = await transform(
      { method: 'format', template: 'Hello ${{ value }} from ${{ input.place }}!' },
      { value: 'World', place: 'Mars' }
    );
    expect(result).toEqual({ kind: 'text', output: 'Hello World from Mars!' });
  });

  describe('array methods', () => {
    it('filters objects by condition', async () => {
      const step = { method: 'array_filter', condition: 'item.n > 2' };
      expect(await output(step, [{ n: 1 }, { n: 5 }])).toEqual([{ n: 5 }]);
    });

    it('accepts a JSON array string', async () => {
      expect(await output({ method: 'array_filter', condition: 'item >= 2' }, '[1,2,3]')).toEqual([
        2, 3,
      ]);
    });

    it('rejects input that is not an array', async () => {
      await expect(output({ method: 'array_filter', condition: 'item' }, 'hello')).rejects.toThrow(
        TransformError
      );
    });

    it('transforms with item and index in scope', async () => {
      expect(await output({ method: 'array_transform', transform: 'item * 2' }, [1, 2])).toEqual([
        2, 4,
      ]);
      expect(await output({ method: 'array_transform', transform: 'index' }, ['a', 'b'])).toEqual([
        0, 1,
      ]);
    });

    it('aggregates', async () => {
      expect(await output({ method: 'array_aggregate', operation: 'sum' }, [1, 2, 3])).toBe(6);
      expect(await output({ method: 'array_aggregate', operation: 'join' }, ['a', 'b'])).toBe('a, b');
    });

    it('sorts by value or key', async () => {
      expect(await output({ method: 'array_sort' }, [3, 1, 2])).toEqual([1, 2, 3]);
      expect(await output({ method: 'array_sort', sort_reverse: true }, [3, 1, 2])).toEqual([3, 2, 1]);
      const people = [
        { name: 'b', age: 40 },
        { name: 'a', age: 30 },
      ];
      expect(await output({ method: 'array_sort', sort_key: 'age' }, people)).toEqual([
        { name: 'a', age: 30 },
        { name: 'b', age: 40 },
      ]);
    });

    it('rejects mixed types', async () => {
      await expect(output({ method: 'array_sort' }, [1, 'a'])).rejects.toThrow(
        /^array_sort: Error in sorting: cannot compare (number with string|string with number)$/
      );
    });
  });
});
