/**
 * Options for RetryPolicy.
 */
export interface RetryPolicyOptions {
  /** Delay before the first retry, in ms */
  baseDelayMs: number;
  /** Upper bound for any delay, in ms */
  maxDelayMs: number;
  /** Attempts after which a job is dead-lettered */
  maxAttempts: number;
  /** Fraction of the delay added or removed at random (0 disables jitter) */
  jitterRatio: number;
  /** Source of randomness in [0, 1) (default: Math.random) */
  random?: () => number;
}

/**
 * Exponential backoff with symmetric jitter.
 *
 * `delayFor(attempt)` is `min(maxDelay, baseDelay * 2^(attempt - 1))`, moved by
 * up to `±jitterRatio` of itself and clamped to `[0, maxDelay]`.
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({
 *   baseDelayMs: 60_000,
 *   maxDelayMs: 3_600_000,
 *   maxAttempts: 5,
 *   jitterRatio: 0.1,
 * });
 * policy.delayFor(3); // ~240000
 * ```
 */
export class RetryPolicy {
  static readonly DEFAULT_CONFIG: Required<Omit<RetryPolicyOptions, "random">> = {
    baseDelayMs: 60_000,
    maxDelayMs: 3_600_000,
    maxAttempts: 5,
    jitterRatio: 0.1,
  };

  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxAttempts: number;
  readonly jitterRatio: number;
  private readonly random: () => number;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    this.baseDelayMs = options.baseDelayMs ?? RetryPolicy.DEFAULT_CONFIG.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? RetryPolicy.DEFAULT_CONFIG.maxDelayMs;
    this.maxAttempts = options.maxAttempts ?? RetryPolicy.DEFAULT_CONFIG.maxAttempts;
    this.jitterRatio = options.jitterRatio ?? RetryPolicy.DEFAULT_CONFIG.jitterRatio;
    this.random = options.random ?? Math.random;
  }

  /**
   * Delay before retrying after the given (1-based) failed attempt.
   */
  delayFor(attempt: number): number {
    const exponent = Math.max(attempt, 1) - 1;
    const base = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** exponent);
    const jitter = base * this.jitterRatio * (this.random() * 2 - 1);
    return Math.round(Math.min(this.maxDelayMs, Math.max(0, base + jitter)));
  }

  /**
   * Whether a job that has made `attempt` attempts may run again.
   */
  shouldRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }
}
