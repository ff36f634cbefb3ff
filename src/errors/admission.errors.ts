import { AccountId } from '../interfaces/token-bucket.interface';

/**
 * Base class of every error raised by the admission core
 */
export class AdmissionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AdmissionError';
    Object.setPrototypeOf(this, AdmissionError.prototype);
  }
}

/**
 * A bucket or module was configured with values it cannot work with
 */
export class InvalidConfigurationError extends AdmissionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      `Invalid configuration: ${message}`,
      'INVALID_CONFIGURATION',
      400,
      details,
    );
    this.name = 'InvalidConfigurationError';
    Object.setPrototypeOf(this, InvalidConfigurationError.prototype);
  }
}

export class AccountNotFoundError extends AdmissionError {
  constructor(public readonly accountId: AccountId) {
    super(`Account not found: ${accountId}`, 'ACCOUNT_NOT_FOUND', 404, {
      accountId,
    });
    this.name = 'AccountNotFoundError';
    Object.setPrototypeOf(this, AccountNotFoundError.prototype);
  }
}

/**
 * An admission time that is not a finite number of seconds
 */
export class InvalidTimestampError extends AdmissionError {
  constructor(public readonly now: number) {
    super(
      `Invalid admission time: ${now} is not a finite number of seconds`,
      'INVALID_TIMESTAMP',
      400,
      { now: String(now) },
    );
    this.name = 'InvalidTimestampError';
    Object.setPrototypeOf(this, InvalidTimestampError.prototype);
  }
}
