import { HttpException } from '@nestjs/common';
import { AdmissionError } from '../errors/admission.errors';

/**
 * Rethrow domain errors as HttpException carrying their status code.
 * Anything else is rethrown untouched.
 */
export function rethrowAsHttpException(error: unknown): never {
  if (error instanceof AdmissionError) {
    throw new HttpException(
      {
        statusCode: error.statusCode,
        error: error.code,
        message: error.message,
      },
      error.statusCode,
      { cause: error },
    );
  }
  throw error;
}
