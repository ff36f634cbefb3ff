import { applyDecorators, SetMetadata, UseInterceptors } from '@nestjs/common';
import { AccountAdmissionInterceptor } from '../interceptors/account-admission.interceptor';
import {
  ACCOUNT_RATE_LIMITED_KEY,
  DEFAULT_ACCOUNT_HEADER,
} from '../utils/constants';

export { ACCOUNT_RATE_LIMITED_KEY };

/**
 * Where the account identifier of a request is read from
 */
export interface AccountRateLimitedOptions {
  /**
   * Request header holding the account identifier
   * @default 'x-account-id'
   */
  header?: string;

  /**
   * Route parameter holding the account identifier.
   * Takes precedence over the header when both are present.
   */
  param?: string;
}

/**
 * Admits every request of the decorated controller or handler against the
 * bucket of the account that sent it. Rejected requests get a 429 with a
 * `Retry-After` header, unknown accounts a 404.
 *
 * @param options Where to find the account identifier
 *
 * @example
 * ```typescript
 * @Controller('reports')
 * export class ReportsController {
 *   @Get(':accountId')
 *   @AccountRateLimited({ param: 'accountId' })
 *   getReport(@Param('accountId') accountId: string) {
 *     return this.reports.build(accountId);
 *   }
 * }
 * ```
 */
export function AccountRateLimited(options: AccountRateLimitedOptions = {}) {
  const metadata: AccountRateLimitedOptions = {
    header: (options.header ?? DEFAULT_ACCOUNT_HEADER).toLowerCase(),
    param: options.param,
  };

  return applyDecorators(
    SetMetadata(ACCOUNT_RATE_LIMITED_KEY, metadata),
    UseInterceptors(AccountAdmissionInterceptor),
  );
}
