import { ITokenBucketSummary } from '../interfaces/token-bucket.interface';
import { assertPositiveInteger } from '../utils/validation';

/**
 * Discrete-time token bucket.
 *
 * Tokens accrue one per `refillIntervalSeconds`, only at whole-interval
 * boundaries counted from the last admitted request. Refill is computed
 * lazily inside {@link TokenBucket.tryAdmit}, never on a timer.
 *
 * @example
 * ```typescript
 * const bucket = new TokenBucket(5, 10);
 * bucket.tryAdmit(0); // true, 4 tokens left
 * ```
 */
export class TokenBucket {
  readonly capacity: number;
  readonly refillIntervalSeconds: number;
  private currentTokens: number;
  private lastAdmissionTime: number | null = null;

  /**
   * @param capacity Maximum number of tokens, the bucket starts full
   * @param refillIntervalSeconds Seconds needed to regenerate one token
   * @throws InvalidConfigurationError if either value is not a positive integer
   */
  constructor(capacity: number, refillIntervalSeconds: number) {
    this.capacity = assertPositiveInteger('capacity', capacity);
    this.refillIntervalSeconds = assertPositiveInteger(
      'refillIntervalSeconds',
      refillIntervalSeconds,
    );
    this.currentTokens = capacity;
  }

  /**
   * Refill, then consume one token if there is one.
   *
   * The whole method is synchronous: no other caller can run between the
   * token check and the decrement, which makes this the bucket's critical
   * section.
   *
   * @param now Seconds since epoch
   * @returns true if the request was admitted, false if it was rejected.
   *   A non-finite `now` is rejected and leaves the bucket untouched.
   */
  tryAdmit(now: number): boolean {
    if (!Number.isFinite(now)) {
      return false;
    }

    this.refill(now);

    if (this.currentTokens > 0) {
      this.lastAdmissionTime = now;
      this.currentTokens -= 1;
      return true;
    }

    return false;
  }

  /**
   * Seconds a rejected caller should wait before a token is available,
   * 0 if one is available now. Does not change the bucket.
   */
  retryAfterSeconds(now: number): number {
    if (this.currentTokens > 0 || this.lastAdmissionTime === null) {
      return 0;
    }
    if (!Number.isFinite(now)) {
      return this.refillIntervalSeconds;
    }
    const elapsed = Math.max(0, now - this.lastAdmissionTime);
    return Math.max(0, this.refillIntervalSeconds - elapsed);
  }

  /**
   * Snapshot of the stored state. The token count is the one computed by the
   * last admission, it is not refilled here.
   */
  summary(): ITokenBucketSummary {
    return {
      capacity: this.capacity,
      refillIntervalSeconds: this.refillIntervalSeconds,
      currentTokens: this.currentTokens,
      lastAdmissionTime: this.lastAdmissionTime,
    };
  }

  private refill(now: number): void {
    // Full since construction
    if (this.lastAdmissionTime === null) {
      return;
    }

    // A clock stepping backwards accrues nothing
    const elapsed = Math.max(0, now - this.lastAdmissionTime);
    const tokensToAdd = Math.floor(elapsed / this.refillIntervalSeconds);

    this.currentTokens = Math.min(
      this.capacity,
      this.currentTokens + tokensToAdd,
    );
  }
}
