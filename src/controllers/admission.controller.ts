import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
} from '@nestjs/common';
import { BucketRegistryService } from '../services/bucket-registry.service';
import {
  AccountBucketOptions,
  AccountBucketSummary,
  ITokenBucketSummary,
} from '../interfaces/token-bucket.interface';
import { rethrowAsHttpException } from '../utils/http-errors';
import { isAccountId } from '../utils/validation';

export interface AdmissionResponse {
  admitted: boolean;
  retryAfterSeconds: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Default HTTP surface over the bucket registry.
 * Disable it with `registerController: false` to expose your own.
 */
@Controller('admission')
export class AdmissionController {
  private readonly logger = new Logger(AdmissionController.name);

  constructor(private readonly registry: BucketRegistryService) {}

  @Post('accounts')
  registerAccount(@Body() body: unknown): AccountBucketSummary {
    const options = this.parseAccountBody(body);
    try {
      const bucket = this.registry.registerAccount(options);
      return { accountId: options.accountId, summary: bucket.summary() };
    } catch (error) {
      this.logger.warn(`Rejected bucket registration: ${String(error)}`);
      rethrowAsHttpException(error);
    }
  }

  @Get('accounts')
  listAccounts(): AccountBucketSummary[] {
    return this.registry.listSummaries();
  }

  @Get('accounts/:accountId')
  getAccount(@Param('accountId') accountId: string): ITokenBucketSummary {
    try {
      return this.registry.getSummary(this.registry.resolveAccountId(accountId));
    } catch (error) {
      rethrowAsHttpException(error);
    }
  }

  @Delete('accounts/:accountId')
  @HttpCode(HttpStatus.NO_CONTENT)
  deregisterAccount(@Param('accountId') accountId: string): void {
    try {
      this.registry.deregister(this.registry.resolveAccountId(accountId));
    } catch (error) {
      rethrowAsHttpException(error);
    }
  }

  /**
   * Ask for admission of one request. A rejection is a regular 200 response
   * with `admitted: false`.
   */
  @Post('accounts/:accountId/admit')
  @HttpCode(HttpStatus.OK)
  admit(@Param('accountId') rawAccountId: string): AdmissionResponse {
    const accountId = this.registry.resolveAccountId(rawAccountId);
    const now = this.registry.currentTime();
    try {
      const admitted = this.registry.admit(accountId, now, 'http');
      return {
        admitted,
        retryAfterSeconds: admitted
          ? 0
          : this.registry.retryAfterSeconds(accountId, now),
      };
    } catch (error) {
      rethrowAsHttpException(error);
    }
  }

  private parseAccountBody(body: unknown): AccountBucketOptions {
    if (!isRecord(body)) {
      throw new HttpException('Missing request body', HttpStatus.BAD_REQUEST);
    }

    const { accountId, capacity, refillIntervalSeconds } = body;
    if (!isAccountId(accountId)) {
      throw new HttpException(
        'accountId must be a non-empty string or a safe integer',
        HttpStatus.BAD_REQUEST,
      );
    }
    if (typeof capacity !== 'number') {
      throw new HttpException(
        'capacity must be a number',
        HttpStatus.BAD_REQUEST,
      );
    }
    if (typeof refillIntervalSeconds !== 'number') {
      throw new HttpException(
        'refillIntervalSeconds must be a number',
        HttpStatus.BAD_REQUEST,
      );
    }

    return { accountId, capacity, refillIntervalSeconds };
  }
}
