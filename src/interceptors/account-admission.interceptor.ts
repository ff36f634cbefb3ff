import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { BucketRegistryService } from '../services/bucket-registry.service';
import { AccountRateLimitedOptions } from '../decorators/account-rate-limited.decorator';
import {
  ACCOUNT_RATE_LIMITED_KEY,
  DEFAULT_ACCOUNT_HEADER,
} from '../utils/constants';
import { rethrowAsHttpException } from '../utils/http-errors';

/**
 * Interceptor that admits requests against the caller's account bucket
 * before the handler runs. Handlers without @AccountRateLimited pass through.
 */
@Injectable()
export class AccountAdmissionInterceptor implements NestInterceptor {
  private readonly logger = new Logger(AccountAdmissionInterceptor.name);

  constructor(
    private readonly registry: BucketRegistryService,
    private readonly reflector: Reflector,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const options = this.reflector.getAllAndOverride<
      AccountRateLimitedOptions | undefined
    >(ACCOUNT_RATE_LIMITED_KEY, [context.getHandler(), context.getClass()]);

    if (!options) {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const rawAccountId = this.extractAccountId(request, options);

    if (!rawAccountId) {
      throw new HttpException(
        'Missing account identifier',
        HttpStatus.BAD_REQUEST,
      );
    }

    const accountId = this.registry.resolveAccountId(rawAccountId);
    const now = this.registry.currentTime();
    const callerId = request.ip ?? 'http';

    let admitted: boolean;
    let retryAfterSeconds = 0;
    try {
      admitted = this.registry.admit(accountId, now, callerId);
      if (!admitted) {
        retryAfterSeconds = this.registry.retryAfterSeconds(accountId, now);
      }
    } catch (error) {
      rethrowAsHttpException(error);
    }

    if (!admitted) {
      this.logger.debug(
        `Rate limit exceeded for account '${accountId}', retry in ${retryAfterSeconds}s`,
      );
      http
        .getResponse<Response>()
        .setHeader('Retry-After', String(retryAfterSeconds));
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          message: `Rate limit exceeded for account ${accountId}. Try again in ${retryAfterSeconds} seconds.`,
          retryAfterSeconds,
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    return next.handle();
  }

  private extractAccountId(
    request: Request,
    options: AccountRateLimitedOptions,
  ): string | undefined {
    if (options.param) {
      const fromParam = request.params?.[options.param];
      if (fromParam) {
        return fromParam;
      }
    }

    const header = request.headers[options.header ?? DEFAULT_ACCOUNT_HEADER];
    const value = Array.isArray(header) ? header[0] : header;
    return value?.trim() || undefined;
  }
}
