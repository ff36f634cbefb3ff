import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { AccountAdmissionConfig } from '../interfaces/config.interface';
import {
  AccountBucketOptions,
  AccountBucketSummary,
  AccountId,
  Clock,
  ITokenBucketSummary,
} from '../interfaces/token-bucket.interface';
import { TokenBucket } from '../models/token-bucket.model';
import {
  AccountNotFoundError,
  InvalidConfigurationError,
  InvalidTimestampError,
} from '../errors/admission.errors';
import { isAccountId } from '../utils/validation';
import { ACCOUNT_ADMISSION_CONFIG, ANONYMOUS_CALLER } from '../utils/constants';
import { currentTimeInSeconds } from '../utils/clock';

/**
 * Maps account identifiers to their token buckets.
 *
 * Every operation runs to completion without yielding, so lookups, map
 * mutations and admissions never interleave. An admit racing a deregister
 * either finds the bucket and completes, or reports AccountNotFoundError.
 */
@Injectable()
export class BucketRegistryService implements OnModuleInit {
  private readonly logger = new Logger(BucketRegistryService.name);
  private readonly buckets: Map<AccountId, TokenBucket> = new Map();
  private readonly clock: Clock;
  private readonly logAdmissions: boolean;

  constructor(
    @Inject(ACCOUNT_ADMISSION_CONFIG)
    private readonly config: AccountAdmissionConfig,
  ) {
    this.clock = config.clock ?? currentTimeInSeconds;
    this.logAdmissions = config.logAdmissions ?? true;
  }

  /**
   * Register the buckets listed in the module configuration
   */
  onModuleInit(): void {
    for (const account of this.config.accounts ?? []) {
      this.registerAccount(account);
    }
    this.logger.log(
      `Initialized BucketRegistryService with ${this.buckets.size} accounts`,
    );
  }

  get size(): number {
    return this.buckets.size;
  }

  /**
   * Current time according to the configured clock
   */
  currentTime(): number {
    return this.clock();
  }

  /**
   * Insert or replace the bucket of an account.
   * Replacing discards the previous bucket and its state.
   *
   * @throws InvalidConfigurationError if the id is an empty string or a non-integer number
   */
  register(accountId: AccountId, bucket: TokenBucket): void {
    if (!isAccountId(accountId)) {
      throw new InvalidConfigurationError(
        'accountId must be a non-empty string or a safe integer',
        { accountId },
      );
    }
    const replaced = this.buckets.has(accountId);
    this.buckets.set(accountId, bucket);
    this.logger.log(
      `${replaced ? 'Replaced' : 'Registered'} bucket for account '${accountId}' ` +
        `(capacity ${bucket.capacity}, one token every ${bucket.refillIntervalSeconds}s)`,
    );
  }

  /**
   * Create a full bucket from options and register it
   *
   * @throws InvalidConfigurationError if the id, capacity or refill interval is invalid
   */
  registerAccount(options: AccountBucketOptions): TokenBucket {
    const bucket = new TokenBucket(
      options.capacity,
      options.refillIntervalSeconds,
    );
    this.register(options.accountId, bucket);
    return bucket;
  }

  /**
   * Remove the bucket of an account immediately
   *
   * @throws AccountNotFoundError if the account is not registered
   */
  deregister(accountId: AccountId): void {
    if (!this.buckets.delete(accountId)) {
      throw new AccountNotFoundError(accountId);
    }
    this.logger.log(`Deregistered bucket for account '${accountId}'`);
  }

  has(accountId: AccountId): boolean {
    return this.buckets.has(accountId);
  }

  /**
   * Decide whether a request of an account is admitted.
   * A rejection is a normal result, not an error.
   *
   * @param accountId Account the request belongs to
   * @param now Seconds since epoch, defaults to the configured clock
   * @param callerId Opaque identifier of the caller, only used for logging
   * @throws InvalidTimestampError if `now` is not a finite number
   * @throws AccountNotFoundError if the account is not registered
   */
  admit(
    accountId: AccountId,
    now: number = this.clock(),
    callerId: string = ANONYMOUS_CALLER,
  ): boolean {
    if (!Number.isFinite(now)) {
      throw new InvalidTimestampError(now);
    }
    const bucket = this.getBucket(accountId);
    const admitted = bucket.tryAdmit(now);

    if (this.logAdmissions) {
      const { currentTokens } = bucket.summary();
      if (admitted) {
        this.logger.debug(
          `${callerId} admitted to bucket '${accountId}', ${currentTokens} tokens remaining`,
        );
      } else {
        this.logger.debug(
          `${callerId} rejected by bucket '${accountId}', not enough tokens. ` +
            `Try again in ${bucket.retryAfterSeconds(now)} seconds`,
        );
      }
    }

    return admitted;
  }

  /**
   * Advisory wait before the account's bucket has a token again
   *
   * @throws AccountNotFoundError if the account is not registered
   */
  retryAfterSeconds(accountId: AccountId, now: number = this.clock()): number {
    return this.getBucket(accountId).retryAfterSeconds(now);
  }

  /**
   * @throws AccountNotFoundError if the account is not registered
   */
  getSummary(accountId: AccountId): ITokenBucketSummary {
    return this.getBucket(accountId).summary();
  }

  listSummaries(): AccountBucketSummary[] {
    return [...this.buckets.entries()].map(([accountId, bucket]) => ({
      accountId,
      summary: bucket.summary(),
    }));
  }

  /**
   * Map an identifier that arrived as text (a header, a route param) to the
   * key it was registered under. Numeric text falls back to the numeric key
   * when only that one is registered.
   */
  resolveAccountId(raw: string): AccountId {
    if (this.buckets.has(raw)) {
      return raw;
    }
    // Only canonical integer text: '01' or digits beyond 2^53 stay strings
    const numeric = Number(raw);
    if (
      Number.isSafeInteger(numeric) &&
      String(numeric) === raw.trim() &&
      this.buckets.has(numeric)
    ) {
      return numeric;
    }
    return raw;
  }

  private getBucket(accountId: AccountId): TokenBucket {
    const bucket = this.buckets.get(accountId);
    if (!bucket) {
      throw new AccountNotFoundError(accountId);
    }
    return bucket;
  }
}
