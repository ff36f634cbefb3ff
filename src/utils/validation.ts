import { InvalidConfigurationError } from '../errors/admission.errors';
import { AccountId } from '../interfaces/token-bucket.interface';

export function assertPositiveInteger(name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(
      `${name} must be a positive integer, got ${String(value)}`,
      { [name]: value },
    );
  }
  return value;
}

export function assertNonNegativeInteger(name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidConfigurationError(
      `${name} must be a non-negative integer, got ${String(value)}`,
      { [name]: value },
    );
  }
  return value;
}

export function isAccountId(value: unknown): value is AccountId {
  return (
    (typeof value === 'string' && value.trim().length > 0) ||
    (typeof value === 'number' && Number.isSafeInteger(value))
  );
}
