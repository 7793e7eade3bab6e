import { describe, expect, it } from 'vitest';
import { extractJson, extractWithPattern, parseJsonStrict } from './json-parser.ts';

describe('extractJson', () => {
  it('extracts JSON from markdown code blocks', () => {
    const text = 'Here is the data:\n```json\n{"foo": "bar"}\n```\nHope that helps!';
    expect(extractJson(text)).toEqual({ foo: 'bar' });
  });

  it('skips an invalid block and uses the next valid one', () => {
    const text = '```\nnot json\n```\nand\n```json\n[1, 2]\n```';
    expect(extractJson(text)).toEqual([1, 2]);
  });

  it('extracts JSON embedded in prose', () => {
    const text = 'The result is {"key": "value"} and it works.';
    expect(extractJson(text)).toEqual({ key: 'value' });
  });

  it('handles nested structures with balanced braces', () => {
    const text = 'Preamble {"outer": {"inner": [1, 2, 3]}, "active": true} postscript.';
    expect(extractJson(text)).toEqual({ outer: { inner: [1, 2, 3] }, active: true });
  });

  it('ignores braces inside strings', () => {
    const text = 'Data: {"msg": "found a } brace", "id": 1}';
    expect(extractJson(text)).toEqual({ msg: 'found a } brace', id: 1 });
  });

  it('handles array roots', () => {
    expect(extractJson('List: [{"id": 1}, {"id": 2}]')).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('parses a bare scalar as a last resort', () => {
    expect(extractJson('  42  ')).toBe(42);
  });

  it('throws on empty input', () => {
    expect(() => extractJson('')).toThrow(/Failed to extract valid JSON/);
  });

  it('throws if no JSON is found', () => {
    expect(() => extractJson('Hello world, no JSON here!')).toThrow(/Failed to extract valid JSON/);
  });

  it('throws if nesting depth is exceeded', () => {
    const text = '{'.repeat(200) + '}'.repeat(200);
    expect(() => extractJson(text)).toThrow(/structure nested too deeply/);
  });

  it('throws if input text is too large', () => {
    const text = `{"a": "${'x'.repeat(1_000_001)}"}`;
    expect(() => extractJson(text)).toThrow(/input too large/);
  });
});

describe('parseJsonStrict', () => {
  it('accepts surrounding whitespace', () => {
    expect(parseJsonStrict('\n {"a": 1} \n')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('reports the parse error instead of throwing', () => {
    const result = parseJsonStrict('{"a": ');
    expect(result.ok).toBe(false);
  });
});

describe('extractWithPattern', () => {
  it('returns the first capture group across newlines', () => {
    const text = 'noise\n```json\n{"a":\n 1}\n```\nmore';
    expect(extractWithPattern(text, '```json\\s*(\\{.*?\\})\\s*```')).toBe('{"a":\n 1}');
  });

  it('returns the whole match without groups', () => {
    expect(extractWithPattern('abc {"x": 2} def', '\\{.*\\}')).toBe('{"x": 2}');
  });

  it('returns undefined when nothing matches', () => {
    expect(extractWithPattern('plain text', '\\{.*\\}')).toBeUndefined();
  });

  it('throws on an invalid pattern', () => {
    expect(() => extractWithPattern('x', '(unclosed')).toThrow(/Invalid extract_json_pattern/);
  });
});
