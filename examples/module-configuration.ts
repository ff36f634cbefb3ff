/**
 * Example of how to configure and register the AccountAdmission module in a NestJS application
 */
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AccountAdmissionModule, createAdmissionConfigFromEnv } from '../src';
import { ReportsController } from './guarded-controller';

/**
 * Example module using static configuration
 */
@Module({
  imports: [
    AccountAdmissionModule.forRoot({
      accounts: [
        { accountId: 'free-tier', capacity: 10, refillIntervalSeconds: 6 },
        { accountId: 'partner', capacity: 100, refillIntervalSeconds: 1 },
      ],
    }),
  ],
  controllers: [ReportsController],
})
export class StaticConfigAdmissionModule {}

/**
 * Example module using async configuration (recommended for production)
 *
 * ADMISSION_ACCOUNTS=free-tier:10:6,partner:100:1
 */
@Module({
  imports: [
    ConfigModule.forRoot(),
    AccountAdmissionModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: createAdmissionConfigFromEnv,
      // Only the decorated ReportsController is exposed
      registerController: false,
    }),
  ],
  controllers: [ReportsController],
})
export class AsyncConfigAdmissionModule {}
