import { formatBucketSummary } from '../bucket-summary';

describe('formatBucketSummary', () => {
  it('should describe a bucket that never admitted a request', () => {
    expect(
      formatBucketSummary({
        capacity: 10,
        refillIntervalSeconds: 5,
        currentTokens: 10,
        lastAdmissionTime: null,
      }),
    ).toEqual([
      'Max Token Capacity: 10',
      'Refill Interval (s): 5',
      'Current Token Count: 10',
      'Last Admission Time: never',
    ]);
  });

  it('should print the last admission time in seconds', () => {
    expect(
      formatBucketSummary({
        capacity: 5,
        refillIntervalSeconds: 10,
        currentTokens: 0,
        lastAdmissionTime: 1_700_000_000,
      })[3],
    ).toBe('Last Admission Time: 1700000000');
  });
});
