/**
 * Injection token for AccountAdmission configuration
 */
export const ACCOUNT_ADMISSION_CONFIG = 'ACCOUNT_ADMISSION_CONFIG';

/**
 * Header the admission interceptor reads the account identifier from
 * when no other source is configured
 */
export const DEFAULT_ACCOUNT_HEADER = 'x-account-id';

/**
 * Caller identifier used in logs when the caller did not supply one
 */
export const ANONYMOUS_CALLER = 'anonymous';

/**
 * Metadata key for rate-limited controllers and handlers
 */
export const ACCOUNT_RATE_LIMITED_KEY = 'account_admission:rate_limited';
