import { describe, it, expect, vi } from 'vitest';
import { AuthError, ConnectionError, RequestError } from '../types/errors';
import { expBackoff, isTransientError, withRetry } from './retry';

describe('objects/retry', () => {
  describe('expBackoff', () => {
    it('should grow exponentially up to the cap', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0);
      expect(expBackoff(0, 100, 1000)).toBe(100);
      expect(expBackoff(2, 100, 1000)).toBe(400);
      expect(expBackoff(5, 100, 1000)).toBe(1000);
    });

    it('should add at most one base of jitter', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5);
      expect(expBackoff(1, 100, 5000)).toBe(250);
    });
  });

  describe('isTransientError', () => {
    it('should only treat connection failures and 5xx as transient', () => {
      expect(isTransientError(new ConnectionError('down', 'http://h'))).toBe(true);
      expect(isTransientError(new ConnectionError('busy', 'http://h', 503))).toBe(true);
      expect(isTransientError(new AuthError('no', 'http://h', 401))).toBe(false);
      expect(isTransientError(new RequestError('bad', 'http://h', 400, ''))).toBe(false);
      expect(isTransientError(new Error('other'))).toBe(false);
    });
  });

  describe('withRetry', () => {
    it('should retry transient failures until success', async () => {
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new ConnectionError('busy', 'http://h', 503))
        .mockRejectedValueOnce(new ConnectionError('busy', 'http://h', 503))
        .mockResolvedValue('ok');

      await expect(withRetry('get', fn, { retries: 2, baseDelayMs: 0 })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should give up after the configured retries', async () => {
      const failure = new ConnectionError('down', 'http://h');
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

      await expect(withRetry('get', fn, { retries: 2, baseDelayMs: 0 })).rejects.toBe(failure);
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry permanent failures', async () => {
      const failure = new AuthError('denied', 'http://h', 403);
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

      await expect(withRetry('get', fn, { retries: 5, baseDelayMs: 0 })).rejects.toBe(failure);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying once aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValue(new ConnectionError('down', 'http://h'));

      await expect(
        withRetry('get', fn, { retries: 3, baseDelayMs: 0, signal: controller.signal }),
      ).rejects.toThrow('down');
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });
});
