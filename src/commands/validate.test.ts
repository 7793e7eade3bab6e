import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterAll, describe, expect, test } from 'vitest';
import { MemoryLogger } from '../utils/logger.ts';
import { validateWorkflows } from './validate.ts';

describe('validateWorkflows', () => {
  const dir = mkdtempSync(join(tmpdir(), 'stepline-validate-'));

  writeFileSync(
    join(dir, 'good.yaml'),
    `name: demo
steps:
  - id: ask
    type: ai_call
    prompt: "Hello"
  - id: shout
    type: text_process
    method: format
    input: "\${{ steps.ask.output }}"
    template: "\${{ value }}!"
`
  );
  writeFileSync(
    join(dir, 'bad.yml'),
    `name: broken
steps:
  - id: shout
    type: text_process
    method: format
    input: "\${{ steps.later.output }}"
    template: "x"
  - id: later
    type: ai_call
    prompt: "Hi"
`
  );

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should report each file and a summary', async () => {
    const logger = new MemoryLogger();

    const summary = await validateWorkflows(dir, logger);

    expect(summary).toEqual({ passed: 1, failed: 1 });
    const lines = logger.messages('log');
    expect(lines.some((line) => line.startsWith('  ✓ ') && line.endsWith('good.yaml demo (2 steps)'))).toBe(true);
    expect(lines.at(-1)).toBe('\nSummary: 1 passed, 1 failed.');
    const [failure] = logger.messages('error');
    expect(failure).toMatch(/bad\.yml .*references step "later", which is not defined earlier in scope/s);
  });

  test('should validate a single file', async () => {
    const summary = await validateWorkflows(join(dir, 'good.yaml'), new MemoryLogger());

    expect(summary).toEqual({ passed: 1, failed: 0 });
  });

  test('should fail on a missing path', async () => {
    await expect(validateWorkflows(join(dir, 'nope'), new MemoryLogger())).rejects.toThrow(
      /^Path not found: /
    );
  });

  test('should accept the bundled example workflows', async () => {
    const examples = fileURLToPath(new URL('../../workflows/', import.meta.url));

    expect(await validateWorkflows(examples, new MemoryLogger())).toEqual({ passed: 2, failed: 0 });
  });
});
