/**
 * Exponential backoff for retrying transient source errors
 */

export interface BackoffOptions {
  /** Initial delay in milliseconds (default: 500) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 4000) */
  maxDelay?: number;
  /** Multiplier for each attempt (default: 2) */
  multiplier?: number;
  /** Maximum number of attempts before giving up (default: 3) */
  maxAttempts?: number;
  /** Add random jitter (default: true) */
  jitter?: boolean;
}

export interface BackoffState {
  attempt: number;
  nextDelay: number;
  exhausted: boolean;
}

const DEFAULT_OPTIONS: Required<BackoffOptions> = {
  initialDelay: 500,
  maxDelay: 4000,
  multiplier: 2,
  maxAttempts: 3,
  jitter: true,
};

/**
 * Calculate the next backoff delay
 */
export function calculateBackoff(
  attempt: number,
  options: BackoffOptions = {}
): BackoffState {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (attempt >= opts.maxAttempts) {
    return {
      attempt,
      nextDelay: 0,
      exhausted: true,
    };
  }

  let delay = opts.initialDelay * Math.pow(opts.multiplier, attempt);
  delay = Math.min(delay, opts.maxDelay);

  // ±25% jitter
  if (opts.jitter) {
    const jitterRange = delay * 0.25;
    delay = delay - jitterRange + Math.random() * jitterRange * 2;
  }

  return {
    attempt,
    nextDelay: Math.round(delay),
    exhausted: false,
  };
}

/**
 * Create a backoff controller for managing retry state
 */
export function createBackoffController(options: BackoffOptions = {}) {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let attempt = 0;

  return {
    /** Get the current attempt number */
    getAttempt: () => attempt,

    /** Calculate next delay and increment attempt counter */
    next: (): BackoffState => {
      const state = calculateBackoff(attempt, opts);
      attempt++;
      return state;
    },

    /** Reset the backoff state */
    reset: () => {
      attempt = 0;
    },

    /** Check if max attempts have been reached */
    isExhausted: () => attempt >= opts.maxAttempts,
  };
}

export interface RetryOptions extends BackoffOptions {
  /** Decide whether an error is worth another attempt (default: always) */
  shouldRetry?: (error: unknown) => boolean;
  /** Stop retrying once aborted */
  signal?: AbortSignal;
  /** Delay implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run an operation, retrying with backoff while it fails with a retryable
 * error. maxAttempts counts the retries after the first call. The last
 * error is rethrown once retries are exhausted.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry = () => true, signal, sleep = defaultSleep, ...backoffOptions } = options;
  const backoff = createBackoffController(backoffOptions);

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (signal?.aborted || !shouldRetry(error)) throw error;

      const state = backoff.next();
      if (state.exhausted) throw error;

      await sleep(state.nextDelay);
      if (signal?.aborted) throw error;
    }
  }
}
