export type Jitter = 'full' | 'none';

export interface BackoffOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  multiplier?: number;
  maxDelayMs?: number;
  jitter?: Jitter;
  isRetryable?: (err: unknown) => boolean;
  /** Called before each sleep; attempt is 1-based and refers to the attempt that just failed. */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempt(s)`);
    this.name = 'RetryExhaustedError';
  }
}

export class AbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Exponential backoff shared by the list client and the classifier.
 * Non-retryable errors are rethrown untouched; retryable ones that outlast
 * `maxAttempts` surface as RetryExhaustedError wrapping the last failure.
 */
export class BackoffPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;
  readonly jitter: Jitter;
  private readonly isRetryable: (err: unknown) => boolean;
  private readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  private readonly random: () => number;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: BackoffOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.multiplier = options.multiplier ?? 2;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.jitter = options.jitter ?? 'full';
    this.isRetryable = options.isRetryable ?? (() => true);
    this.onRetry = options.onRetry;
    this.random = options.random ?? Math.random;
    this.sleepFn = options.sleep ?? sleep;
  }

  /** Delay before the retry that follows failed attempt `attempt` (1-based). */
  delayFor(attempt: number): number {
    const ceiling = Math.min(
      this.maxDelayMs,
      this.baseDelayMs * Math.pow(this.multiplier, attempt - 1),
    );
    return this.jitter === 'full' ? Math.floor(this.random() * ceiling) : ceiling;
  }

  /** Same policy with a different retry predicate or hook. */
  with(overrides: Pick<BackoffOptions, 'isRetryable' | 'onRetry'>): BackoffPolicy {
    return new BackoffPolicy({
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      multiplier: this.multiplier,
      maxDelayMs: this.maxDelayMs,
      jitter: this.jitter,
      isRetryable: overrides.isRetryable ?? this.isRetryable,
      onRetry: overrides.onRetry ?? this.onRetry,
      random: this.random,
      sleep: this.sleepFn,
    });
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw new AbortedError();
      try {
        return await operation(attempt);
      } catch (err) {
        if (!this.isRetryable(err)) throw err;
        if (attempt >= this.maxAttempts) throw new RetryExhaustedError(attempt, err);

        const delay = this.delayFor(attempt);
        this.onRetry?.(err, attempt, delay);
        await this.sleepFn(delay, signal);
      }
    }
  }
}
