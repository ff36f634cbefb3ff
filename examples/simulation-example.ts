/**
 * Example of driving synthetic traffic through two account buckets:
 * two workers each send one request per account every 3 seconds for a minute.
 */
import { Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  AccountAdmissionModule,
  AdmissionSimulatorService,
  BucketRegistryService,
  formatBucketSummary,
} from '../src';

@Module({
  imports: [
    AccountAdmissionModule.forRoot({
      accounts: [
        { accountId: 1, capacity: 10, refillIntervalSeconds: 5 },
        { accountId: 2, capacity: 5, refillIntervalSeconds: 10 },
      ],
      registerController: false,
      simulation: { durationSeconds: 60, intervalMs: 3000, workers: 2 },
    }),
  ],
})
class SimulationModule {}

async function bootstrap(): Promise<void> {
  const logger = new Logger('Simulation');
  const app = await NestFactory.createApplicationContext(SimulationModule);

  try {
    const report = await app.get(AdmissionSimulatorService).run();
    for (const { accountId, admitted, rejected } of report.perAccount) {
      logger.log(
        `Account ${accountId}: ${admitted} admitted, ${rejected} rejected`,
      );
    }
    for (const error of report.errors) {
      logger.warn(`${error.callerId}: ${error.details}`);
    }
    for (const { accountId, summary } of app
      .get(BucketRegistryService)
      .listSummaries()) {
      logger.log(`Account ${accountId}\n${formatBucketSummary(summary).join('\n')}`);
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Simulation').error(error);
  process.exitCode = 1;
});
