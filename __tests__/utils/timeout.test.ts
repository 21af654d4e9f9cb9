import { describe, it, expect } from 'vitest';
import { TimeoutError, withTimeout } from '../../src/utils/timeout';

describe('withTimeout', () => {
  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'Lookup')).resolves.toBe(42);
  });

  it('passes through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100, 'Lookup')).rejects.toThrow('boom');
  });

  it('rejects with TimeoutError when the promise hangs', async () => {
    const hanging = new Promise<never>(() => {});

    await expect(withTimeout(hanging, 10, 'Vector search')).rejects.toThrow(
      new TimeoutError('Vector search', 10)
    );
    await expect(withTimeout(hanging, 10, 'Vector search')).rejects.toThrow('Vector search timed out after 10ms');
  });
});
