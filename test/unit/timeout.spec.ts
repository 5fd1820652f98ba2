import { describe, expect, it } from 'vitest';
import { TimeoutError, withTimeout } from '@question-rotation/core';

describe('withTimeout', () => {
  it('resolves with the operation result when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50, 'fast call')).resolves.toBe('done');
  });

  it('passes the operation rejection through', async () => {
    await expect(withTimeout(Promise.reject(new Error('denied')), 50, 'call')).rejects.toThrow('denied');
  });

  it('rejects with a TimeoutError when the operation hangs', async () => {
    const pending = withTimeout(new Promise<never>(() => undefined), 10, 'store read');

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('store read timed out after 10ms');
  });

  it('does not bound the operation when the timeout is disabled', async () => {
    await expect(withTimeout(Promise.resolve(1), 0, 'unbounded')).resolves.toBe(1);
  });
});
