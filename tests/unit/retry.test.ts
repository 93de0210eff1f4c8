/**
 * Unit Tests for the retry helper
 */

import { withRetry } from '../../src/utils/retry';

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = jest.fn().mockRejectedValueOnce(new Error('refused')).mockResolvedValueOnce('connected');

    await expect(withRetry(fn, { initialDelayMs: 1 })).resolves.toBe('connected');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should give up after the last attempt', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('refused'));

    await expect(withRetry(fn, { maxRetries: 3, initialDelayMs: 1 })).rejects.toThrow('refused');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop at once when the error is not retryable', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('bad credentials'));

    await expect(withRetry(fn, { initialDelayMs: 1, shouldRetry: () => false })).rejects.toThrow('bad credentials');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
