import { describe, expect, it } from 'vitest';
import { TimeoutError, withTimeout } from './timeout.ts';

describe('timeout', () => {
  it('should resolve if the promise completes before the timeout', async () => {
    const promise = Promise.resolve('ok');
    const result = await withTimeout(promise, 100);
    expect(result).toBe('ok');
  });

  it('should reject if the promise takes longer than the timeout', async () => {
    const promise = new Promise((resolve) => setTimeout(() => resolve('ok'), 200));
    await expect(withTimeout(promise, 50)).rejects.toThrow(TimeoutError);
  });

  it('should include the operation name in the error message', async () => {
    const promise = new Promise((resolve) => setTimeout(() => resolve('ok'), 100));
    await expect(withTimeout(promise, 10, 'MyStep')).rejects.toThrow(/MyStep timed out/);
  });
});

describe('TimeoutError', () => {
  it('records the limit', async () => {
    const never = new Promise(() => {});
    const error = await withTimeout(never, 5, 'call').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.timeoutMs).toBe(5);
    expect(error instanceof Error && error.message).toBe('call timed out after 5ms');
  });
});
