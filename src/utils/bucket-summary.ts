import { ITokenBucketSummary } from '../interfaces/token-bucket.interface';

/**
 * Human-readable lines describing a bucket
 */
export function formatBucketSummary(summary: ITokenBucketSummary): string[] {
  return [
    `Max Token Capacity: ${summary.capacity}`,
    `Refill Interval (s): ${summary.refillIntervalSeconds}`,
    `Current Token Count: ${summary.currentTokens}`,
    `Last Admission Time: ${summary.lastAdmissionTime ?? 'never'}`,
  ];
}
