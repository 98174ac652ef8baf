/**
 * Tests for Retry Utility with Exponential Backoff
 */

import {
  calculateDelay,
  errorCode,
  errorStatus,
  isMissingFileError,
  isTransientError,
  withRetry,
} from '../../src/lib/retry';

const NO_JITTER = {
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
  jitter: false,
};

function httpError(status: number, message: string = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { response: { status } });
}

describe('Retry Utility', () => {
  describe('calculateDelay', () => {
    it('should calculate exponential delay without jitter', () => {
      expect(calculateDelay(0, NO_JITTER)).toBe(500);   // 500 * 2^0
      expect(calculateDelay(1, NO_JITTER)).toBe(1000);  // 500 * 2^1
      expect(calculateDelay(2, NO_JITTER)).toBe(2000);  // 500 * 2^2
      expect(calculateDelay(3, NO_JITTER)).toBe(4000);  // 500 * 2^3
    });

    it('should clamp delay to maxDelayMs', () => {
      const config = { ...NO_JITTER, maxDelayMs: 3000 };
      expect(calculateDelay(3, config)).toBe(3000); // Clamped from 4000
      expect(calculateDelay(10, config)).toBe(3000);
    });

    it('should keep jittered delays between 50% and 100%', () => {
      const config = { ...NO_JITTER, jitter: true };
      for (let i = 0; i < 20; i++) {
        const delay = calculateDelay(1, config);
        expect(delay).toBeGreaterThanOrEqual(500);
        expect(delay).toBeLessThanOrEqual(1000);
      }
    });

    it('should handle custom backoff multiplier', () => {
      const config = { ...NO_JITTER, backoffMultiplier: 3 };
      expect(calculateDelay(1, config)).toBe(1500);
      expect(calculateDelay(2, config)).toBe(4500);
    });
  });

  describe('errorStatus', () => {
    it('should read a direct status', () => {
      expect(errorStatus(Object.assign(new Error('x'), { status: 429 }))).toBe(429);
      expect(errorStatus({ statusCode: 503 })).toBe(503);
    });

    it('should read an axios-style response status', () => {
      expect(errorStatus(httpError(404))).toBe(404);
    });

    it('should return undefined when there is none', () => {
      expect(errorStatus(new Error('plain'))).toBeUndefined();
      expect(errorStatus('string error')).toBeUndefined();
      expect(errorStatus(null)).toBeUndefined();
    });
  });

  describe('errorCode', () => {
    it('should read the code from any object shape', () => {
      expect(errorCode(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe('ENOENT');
      expect(errorCode({ code: 'EACCES', message: 'denied' })).toBe('EACCES');
    });

    it('should ignore missing or non-string codes', () => {
      expect(errorCode(new Error('plain'))).toBeUndefined();
      expect(errorCode({ code: 2 })).toBeUndefined();
      expect(errorCode('ENOENT')).toBeUndefined();
      expect(errorCode(null)).toBeUndefined();
    });
  });

  describe('isMissingFileError', () => {
    it('should match ENOENT errors that are not Error instances', () => {
      const foreign = { code: 'ENOENT', errno: -2, syscall: 'open', path: 'tickers/golds_list.txt' };
      expect(foreign instanceof Error).toBe(false);
      expect(isMissingFileError(foreign)).toBe(true);
    });

    it('should not match other file-system failures', () => {
      expect(isMissingFileError({ code: 'EACCES' })).toBe(false);
      expect(isMissingFileError(new Error('ENOENT'))).toBe(false);
    });
  });

  describe('isTransientError', () => {
    it('should treat rate limiting and server errors as transient', () => {
      expect(isTransientError(httpError(429))).toBe(true);
      expect(isTransientError(httpError(502))).toBe(true);
    });

    it('should treat client errors as permanent', () => {
      expect(isTransientError(httpError(400))).toBe(false);
      expect(isTransientError(httpError(401))).toBe(false);
      expect(isTransientError(httpError(404))).toBe(false);
    });

    it('should recognise dropped connections', () => {
      expect(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
      expect(isTransientError(new Error('socket hang up'))).toBe(true);
      expect(isTransientError(new Error('Request timeout after 10000ms'))).toBe(true);
      expect(isTransientError({ code: 'ETIMEDOUT' })).toBe(true);
    });

    it('should not retry unknown failures', () => {
      expect(isTransientError(new Error('Invalid symbol'))).toBe(false);
    });
  });

  describe('withRetry', () => {
    const wait = jest.fn().mockResolvedValue(undefined);

    beforeEach(() => {
      wait.mockClear();
    });

    it('should return on the first success', async () => {
      const fn = jest.fn().mockResolvedValue('ok');

      await expect(withRetry(fn, { wait })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(wait).not.toHaveBeenCalled();
    });

    it('should retry transient failures with backoff', async () => {
      const fn = jest.fn()
        .mockRejectedValueOnce(httpError(503))
        .mockRejectedValueOnce(httpError(429))
        .mockResolvedValue('ok');

      await expect(withRetry(fn, { ...NO_JITTER, wait })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(wait.mock.calls).toEqual([[500], [1000]]);
    });

    it('should throw the last error once retries are exhausted', async () => {
      const fn = jest.fn().mockRejectedValue(httpError(503, 'Service Unavailable'));

      await expect(withRetry(fn, { ...NO_JITTER, maxRetries: 2, wait })).rejects.toThrow('Service Unavailable');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry a permanent failure', async () => {
      const fn = jest.fn().mockRejectedValue(httpError(404, 'Not Found'));

      await expect(withRetry(fn, { wait })).rejects.toThrow('Not Found');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should honor a custom retry predicate', async () => {
      const fn = jest.fn()
        .mockRejectedValueOnce(new Error('custom'))
        .mockResolvedValue('ok');

      await expect(withRetry(fn, { isRetryable: () => true, wait })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should report each retry', async () => {
      const onRetry = jest.fn();
      const error = httpError(500);
      const fn = jest.fn().mockRejectedValueOnce(error).mockResolvedValue('ok');

      await withRetry(fn, { ...NO_JITTER, onRetry, wait });

      expect(onRetry).toHaveBeenCalledWith(1, error, 500);
    });
  });
});
