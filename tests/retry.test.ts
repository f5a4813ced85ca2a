/**
 * Tests for the probe retry and circuit breaker helpers
 */

import {
  withRetry,
  CircuitBreaker,
  CircuitOpenError,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  RetryLog,
  isRetryableError,
} from '../src/utils/retry.js';

const FAST: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 10,
  maxDelayMs: 20,
  multiplier: 2,
  timeoutMs: 1000,
};

async function tripBreaker(breaker: CircuitBreaker, failures: number) {
  const fn = jest.fn().mockRejectedValue(new Error('ECONNREFUSED'));
  for (let i = 0; i < failures; i++) {
    await expect(breaker.execute(fn)).rejects.toThrow('ECONNREFUSED');
  }
}

describe('Retry Logic', () => {
  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('pong');
      const result = await withRetry(fn);

      expect(result).toBe('pong');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockResolvedValueOnce('pong');

      const result = await withRetry(fn, FAST);
      expect(result).toBe('pong');
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should stop after the default two attempts', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Always fails'));

      await expect(
        withRetry(fn, { ...DEFAULT_RETRY_CONFIG, initialDelayMs: 10 })
      ).rejects.toThrow('Failed after 2 attempts. Last error: Always fails');

      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should not retry when retryIf rejects the error', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('HTTP 500'));

      await expect(withRetry(fn, FAST, undefined, isRetryableError)).rejects.toThrow(
        'Last error: HTTP 500'
      );
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log each attempt with the next delay', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail 1'))
        .mockRejectedValueOnce(new Error('Fail 2'))
        .mockResolvedValueOnce('ok');

      await withRetry(fn, FAST, (log) => logs.push(log));

      expect(logs.map((log) => log.success)).toEqual([false, false, true]);
      expect(logs.map((log) => log.nextRetryInMs)).toEqual([10, 20, undefined]);
      expect(logs[1].error).toBe('Fail 2');
    });
  });

  describe('Timeout Handling', () => {
    it('should time out a slow attempt', async () => {
      const fn = jest.fn(
        () =>
          new Promise((resolve) => {
            setTimeout(() => resolve('slow'), 500);
          })
      );

      await expect(withRetry(fn, { ...FAST, maxAttempts: 1, timeoutMs: 50 })).rejects.toThrow(
        'Timeout after 50ms'
      );
    });
  });
});

describe('Circuit Breaker', () => {
  let clock: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    clock = 1_000;
    breaker = new CircuitBreaker('w1', 3, 200, () => clock);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should start in closed state', () => {
    expect(breaker.getState()).toBe('closed');
  });

  it('should open after consecutive failures and fail fast', async () => {
    await tripBreaker(breaker, 3);
    expect(breaker.getState()).toBe('open');

    clock += 50;
    const fn = jest.fn().mockResolvedValue('pong');
    await expect(breaker.execute(fn)).rejects.toThrow('Circuit for w1 is open, next probe allowed in 150ms');
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('should only count failures in a row', async () => {
    await tripBreaker(breaker, 2);
    await breaker.execute(jest.fn().mockResolvedValue('pong'));
    await tripBreaker(breaker, 2);

    expect(breaker.getState()).toBe('closed');
  });

  it('should close after a successful trial probe', async () => {
    await tripBreaker(breaker, 3);
    clock += 200;
    expect(breaker.getState()).toBe('half-open');

    await expect(breaker.execute(jest.fn().mockResolvedValue('pong'))).resolves.toBe('pong');
    expect(breaker.getState()).toBe('closed');
  });

  it('should reopen if the trial probe fails', async () => {
    await tripBreaker(breaker, 3);
    clock += 200;

    await tripBreaker(breaker, 1);
    expect(breaker.getState()).toBe('open');
  });

  it('should let a single trial probe through at a time', async () => {
    await tripBreaker(breaker, 3);
    clock += 200;

    let release: (value: string) => void = () => undefined;
    const trial = breaker.execute(() => new Promise<string>((resolve) => (release = resolve)));
    const second = jest.fn().mockResolvedValue('pong');
    await expect(breaker.execute(second)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(second).not.toHaveBeenCalled();

    release('pong');
    await expect(trial).resolves.toBe('pong');
    expect(breaker.getState()).toBe('closed');
  });
});

describe('Error Classification', () => {
  it('should identify retryable transport errors', () => {
    expect(isRetryableError(new Error('connect ECONNREFUSED 10.0.0.5:7576'))).toBe(true);
    expect(isRetryableError(new Error('network timeout at: http://10.0.0.5:7576/ping'))).toBe(true);
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
  });

  it('should not retry HTTP status failures', () => {
    expect(isRetryableError(new Error('HTTP 500'))).toBe(false);
    expect(isRetryableError(new Error('HTTP 404'))).toBe(false);
  });
});
