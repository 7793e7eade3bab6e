import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, test } from 'vitest';
import { loadFileInputs, parseFileInputSpec } from './file-inputs.ts';

describe('parseFileInputSpec', () => {
  test('should detect the format from the extension', () => {
    expect(parseFileInputSpec('doc=notes.md')).toEqual({
      key: 'doc',
      path: 'notes.md',
      format: 'text',
      encoding: 'utf8',
    });
    expect(parseFileInputSpec('data=config.yml').format).toBe('yaml');
  });

  test('should take an explicit format and encoding', () => {
    expect(parseFileInputSpec('rows=list.txt:lines:latin1')).toMatchObject({
      path: 'list.txt',
      format: 'lines',
      encoding: 'latin1',
    });
  });

  test('should reject malformed specs', () => {
    expect(() => parseFileInputSpec('nokey')).toThrow('Invalid file input format: "nokey"');
    expect(() => parseFileInputSpec('=a.txt')).toThrow('File input key cannot be empty');
    expect(() => parseFileInputSpec('__proto__=a.txt')).toThrow('(reserved keyword)');
    expect(() => parseFileInputSpec('k=a.txt:csv')).toThrow('Unsupported file format: "csv"');
  });
});

describe('loadFileInputs', () => {
  const dir = mkdtempSync(join(tmpdir(), 'stepline-files-'));
  const file = (name: string, content: string | Buffer) => {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  };

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should load each file in its format', () => {
    const inputs = loadFileInputs([
      `text=${file('a.txt', 'hello\n')}`,
      `rows=${file('b.txt', 'one\r\ntwo\n')}:lines`,
      `data=${file('c.json', '{"n": 1}')}`,
      `conf=${file('d.yaml', 'items:\n  - x\n')}`,
    ]);

    expect(inputs).toEqual({
      text: 'hello\n',
      rows: ['one', 'two'],
      data: { n: 1 },
      conf: { items: ['x'] },
    });
  });

  test('should refuse binary files', () => {
    const path = file('blob.bin', Buffer.from([0x50, 0x00, 0x01]));
    expect(() => loadFileInputs([`blob=${path}`])).toThrow(`Binary files are not supported: "${path}"`);
  });

  test('should report missing files', () => {
    const path = join(dir, 'missing.txt');
    expect(() => loadFileInputs([`x=${path}`])).toThrow(`File not found: "${path}"`);
  });
});
