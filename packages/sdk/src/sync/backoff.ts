/**
 * Retry delays for the sync orchestrator
 * @module sync/backoff
 */

export interface BackoffOptions {
  /**
   * Delay after the first failure (ms)
   * @default 1000
   */
  baseDelay?: number;
  /**
   * Upper bound on any delay (ms)
   * @default 60000
   */
  maxDelay?: number;
  /**
   * Largest fraction shaved off a delay at random, between 0 and 1.
   * Spreads retries of many clients recovering at once.
   * @default 0.5
   */
  jitter?: number;
  /** Source of randomness in [0, 1) */
  random?: () => number;
}

/**
 * Exponential backoff with jitter
 *
 * delay(n) = min(baseDelay * 2^(n-1), maxDelay) * (1 - jitter * random())
 */
export class BackoffPolicy {
  private options: Required<BackoffOptions>;

  constructor(options: BackoffOptions = {}) {
    this.options = {
      baseDelay: 1000,
      maxDelay: 60000,
      jitter: 0.5,
      random: Math.random,
      ...options,
    };
    if (this.options.jitter < 0 || this.options.jitter > 1) {
      throw new RangeError(`jitter must be between 0 and 1, got ${this.options.jitter}`);
    }
  }

  /**
   * Delay before retrying after `consecutiveFailures` failures in a row
   */
  delay(consecutiveFailures: number): number {
    const attempt = Math.max(1, consecutiveFailures);
    const exponential = this.options.baseDelay * Math.pow(2, attempt - 1);
    const capped = Math.min(exponential, this.options.maxDelay);
    return Math.floor(capped * (1 - this.options.jitter * this.options.random()));
  }
}
