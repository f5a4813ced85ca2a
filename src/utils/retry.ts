/**
 * Retry and Circuit Breaker patterns for worker agent probes
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 200,
  maxDelayMs: 1000,
  multiplier: 2,
  timeoutMs: 10000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param onLog - Optional callback for retry logging
 * @param retryIf - Stops retrying early when it returns false for an error
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  retryIf: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: Error | null = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    let timer: NodeJS.Timeout | undefined;
    try {
      // Create a promise that rejects after timeout
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Timeout after ${config.timeoutMs}ms`)),
          config.timeoutMs
        );
      });

      // Race between the function and timeout
      const result = await Promise.race([fn(), timeoutPromise]);

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: 0,
          success: true,
        });
      }

      return result;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < config.maxAttempts && retryIf(error);

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: lastDelay,
          success: false,
          error: lastError.message,
          nextRetryInMs: willRetry ? lastDelay : undefined,
        });
      }

      if (!willRetry) {
        break;
      }

      await sleep(lastDelay);

      // Calculate next delay (exponential backoff)
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    } finally {
      clearTimeout(timer);
    }
  }

  throw new Error(
    `Failed after ${config.maxAttempts} attempts. Last error: ${lastError?.message}`
  );
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export class CircuitOpenError extends Error {
  constructor(
    readonly target: string,
    readonly retryInMs: number
  ) {
    super(`Circuit for ${target} is open, next probe allowed in ${retryInMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Per-worker breaker for health probes.
 *
 * `failureThreshold` consecutive failures open the circuit and probes fail
 * fast. After `resetTimeoutMs` the circuit is half-open: one trial probe is
 * let through, and its outcome closes or reopens it.
 */
export class CircuitBreaker {
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;

  constructor(
    private target: string,
    private failureThreshold: number = 5,
    private resetTimeoutMs: number = 30000,
    private now: () => number = Date.now
  ) {}

  getState(): CircuitState {
    if (this.openedAt === null) return 'closed';
    return this.now() - this.openedAt >= this.resetTimeoutMs ? 'half-open' : 'open';
  }

  async execute<T>(probe: () => Promise<T>): Promise<T> {
    const state = this.getState();
    if (state === 'open' || (state === 'half-open' && this.trialInFlight)) {
      throw new CircuitOpenError(this.target, this.retryInMs());
    }

    this.trialInFlight = state === 'half-open';
    try {
      const result = await probe();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      this.trialInFlight = false;
    }
  }

  private retryInMs(): number {
    if (this.openedAt === null) return 0;
    return Math.max(0, this.resetTimeoutMs - (this.now() - this.openedAt));
  }

  private onSuccess(): void {
    if (this.openedAt !== null) {
      console.error(`[CircuitBreaker] ${this.target} recovered, circuit closed`);
    }
    this.consecutiveFailures = 0;
    this.openedAt = null;
  }

  private onFailure(): void {
    this.consecutiveFailures++;
    if (this.openedAt !== null || this.consecutiveFailures >= this.failureThreshold) {
      this.openedAt = this.now();
      console.error(
        `[CircuitBreaker] ${this.target} circuit open after ${this.consecutiveFailures} consecutive failure(s)`
      );
    }
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'timed out',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
