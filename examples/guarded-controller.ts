/**
 * Example of a controller whose handlers are admitted per account
 */
import { Controller, Get, Param } from '@nestjs/common';
import { AccountRateLimited, BucketRegistryService } from '../src';

@Controller('reports')
export class ReportsController {
  constructor(private readonly registry: BucketRegistryService) {}

  /**
   * The account is taken from the `x-account-id` header
   */
  @Get()
  @AccountRateLimited()
  listReports() {
    return { reports: [] };
  }

  /**
   * The account is taken from the route
   */
  @Get(':accountId/quota')
  @AccountRateLimited({ param: 'accountId' })
  getQuota(@Param('accountId') accountId: string) {
    return this.registry.getSummary(this.registry.resolveAccountId(accountId));
  }
}
