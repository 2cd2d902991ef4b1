export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
  /** Fraction of the delay randomized away, 0 disables jitter */
  jitterRatio?: number;
  random?: () => number;
}

/**
 * Bounded exponential backoff for retriable job failures
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private baseDelayMs: number;
  private maxDelayMs: number;
  private multiplier: number;
  private jitterRatio: number;
  private random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.multiplier = options.multiplier ?? 2;
    this.jitterRatio = Math.min(1, Math.max(0, options.jitterRatio ?? 0));
    this.random = options.random ?? Math.random;
  }

  canRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }

  /**
   * Delay to wait after the given (1-based) failed attempt
   */
  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * this.multiplier ** Math.max(0, attempt - 1);
    const capped = Math.min(this.maxDelayMs, exponential);
    if (this.jitterRatio === 0) {
      return capped;
    }
    const jitter = capped * this.jitterRatio * this.random();
    return Math.round(capped - jitter);
  }
}
