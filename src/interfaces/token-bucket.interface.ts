/**
 * Opaque key of an independent rate-limit domain.
 * Keys are compared with Map semantics, so `1` and `'1'` are different accounts.
 */
export type AccountId = string | number;

/**
 * Source of the current time in whole seconds since epoch
 */
export type Clock = () => number;

/**
 * Read-only snapshot of a bucket, for diagnostics
 */
export interface ITokenBucketSummary {
  capacity: number;
  refillIntervalSeconds: number;
  currentTokens: number;
  /**
   * Seconds since epoch of the last admitted request, null if none yet
   */
  lastAdmissionTime: number | null;
}

/**
 * Everything needed to create the bucket of one account
 */
export interface AccountBucketOptions {
  accountId: AccountId;

  /**
   * Maximum number of tokens the bucket holds
   */
  capacity: number;

  /**
   * Seconds needed to regenerate a single token
   */
  refillIntervalSeconds: number;
}

export interface AccountBucketSummary {
  accountId: AccountId;
  summary: ITokenBucketSummary;
}
