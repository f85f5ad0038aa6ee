/**
 * Exponential backoff retry utilities.
 *
 * Wraps remote store calls (list, download, upload) so that a transient
 * network failure is retried a bounded number of times before the caller
 * treats the store as unavailable.
 */

import { Err, Ok, type Result } from 'ts-results';

export interface RetryConfig {
  /**
   * Maximum number of attempts (initial call + retries).
   */
  maxAttempts: number;
  /**
   * Delay used for the first retry attempt (in milliseconds).
   */
  initialDelayMs: number;
  /**
   * Maximum delay between attempts (in milliseconds).
   */
  maxDelayMs: number;
  /**
   * Exponential backoff multiplier applied after each attempt.
   */
  backoffMultiplier: number;
  /**
   * List of retryable error identifiers (case insensitive). Matched against
   * error codes, error names and a timeout heuristic on the message.
   */
  retryableErrors: string[];
  /**
   * Optional jitter factor (0-1). Defaults to 0 (disabled).
   */
  jitter?: number;
  /**
   * Optional callback invoked before each retry attempt.
   */
  onRetry?: (context: RetryAttemptContext) => void;
}

export interface RetryAttemptContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * Why a retried operation finally gave up.
 */
export interface RetryFailure {
  error: unknown;
  attempts: number;
  /** True when the last error was retryable but the attempt budget ran out */
  exhausted: boolean;
}

type RetryTokenExtractor = (error: unknown) => string[];

function readCode(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return error.code;
  }
  return undefined;
}

const DEFAULT_RETRY_TOKENS: RetryTokenExtractor[] = [
  (error) => {
    const code = readCode(error);
    if (typeof code === 'string') {
      return [code];
    }
    if (typeof code === 'number') {
      return [String(code)];
    }
    return [];
  },
  (error) => (error instanceof Error ? [error.name] : []),
  (error) => {
    // fetch() wraps socket errors: TypeError('fetch failed', { cause: { code } })
    if (error instanceof Error && error.cause !== undefined) {
      const code = readCode(error.cause);
      return typeof code === 'string' ? [code] : [];
    }
    return [];
  },
  (error) => {
    if (error instanceof Error && /(?:timeout|timed\s+out)/i.test(error.message)) {
      return ['TIMEOUT'];
    }
    return [];
  },
];

/**
 * Determine whether an error should be retried.
 *
 * @param error - The error thrown from the previous attempt
 * @param retryableSet - Upper-cased retryable identifiers
 */
export function isRetryableError(
  error: unknown,
  retryableSet: Set<string>,
  extractors: RetryTokenExtractor[] = DEFAULT_RETRY_TOKENS
): boolean {
  if (!retryableSet.size) {
    return false;
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return false;
  }

  return extractors.some((extract) =>
    extract(error).some((token) => retryableSet.has(token.toUpperCase()))
  );
}

async function delay(ms: number): Promise<void> {
  if (ms > 0) {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function nextDelay(current: number, multiplier: number, max: number): number {
  if (!Number.isFinite(current) || current < 0) {
    return max;
  }
  return Math.min(max, Math.max(current, Math.round(current * multiplier)));
}

function assertRetryConfig(config: RetryConfig): void {
  if (config.maxAttempts < 1) {
    throw new Error('maxAttempts must be >= 1');
  }
  if (config.initialDelayMs < 0) {
    throw new Error('initialDelayMs must be >= 0');
  }
  if (config.maxDelayMs < config.initialDelayMs) {
    throw new Error('maxDelayMs must be >= initialDelayMs');
  }
  if (config.backoffMultiplier < 1) {
    throw new Error('backoffMultiplier must be >= 1');
  }
}

/**
 * Execute an async function with retries and exponential backoff, returning
 * a Result instead of throwing on the final failure.
 */
export async function attemptWithRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig
): Promise<Result<T, RetryFailure>> {
  assertRetryConfig(config);

  const retryableSet = new Set(config.retryableErrors.map((token) => token.toUpperCase()));
  const jitter = Math.min(Math.max(config.jitter ?? 0, 0), 1);

  let attempt = 0;
  let delayMs = config.initialDelayMs;

  for (;;) {
    attempt += 1;

    try {
      return Ok(await fn());
    } catch (error) {
      const retryable = isRetryableError(error, retryableSet);
      if (!retryable || attempt >= config.maxAttempts) {
        return Err({ error, attempts: attempt, exhausted: retryable });
      }

      // Randomize within ±jitter of the base delay
      const computedDelay = jitter > 0
        ? Math.floor(delayMs * (1 - jitter + 2 * jitter * Math.random()))
        : delayMs;

      config.onRetry?.({ attempt, delayMs: computedDelay, error });

      await delay(computedDelay);

      delayMs = nextDelay(delayMs, config.backoffMultiplier, config.maxDelayMs);
    }
  }
}
