import { DynamicModule, Global, Module, Provider, Type } from '@nestjs/common';
import { BucketRegistryService } from './services/bucket-registry.service';
import { AdmissionSimulatorService } from './services/admission-simulator.service';
import { AdmissionController } from './controllers/admission.controller';
import { AccountAdmissionInterceptor } from './interceptors/account-admission.interceptor';
import {
  AccountAdmissionAsyncConfig,
  AccountAdmissionConfig,
  AccountAdmissionConfigFactory,
} from './interfaces/config.interface';
import { InvalidConfigurationError } from './errors/admission.errors';
import { ACCOUNT_ADMISSION_CONFIG } from './utils/constants';
import {
  assertNonNegativeInteger,
  assertPositiveInteger,
  isAccountId,
} from './utils/validation';

export function validateConfig(config: AccountAdmissionConfig): void {
  if (config.accounts !== undefined) {
    if (!Array.isArray(config.accounts)) {
      throw new InvalidConfigurationError('accounts must be an array');
    }

    const seen = new Set<unknown>();
    for (const account of config.accounts) {
      if (typeof account !== 'object' || account === null) {
        throw new InvalidConfigurationError(
          'Each account must be an object with accountId, capacity and refillIntervalSeconds',
        );
      }
      if (!isAccountId(account.accountId)) {
        throw new InvalidConfigurationError(
          'Each account must have a non-empty string or safe integer accountId',
        );
      }
      if (seen.has(account.accountId)) {
        throw new InvalidConfigurationError(
          `Account '${account.accountId}' is configured more than once`,
        );
      }
      seen.add(account.accountId);
      assertPositiveInteger('capacity', account.capacity);
      assertPositiveInteger(
        'refillIntervalSeconds',
        account.refillIntervalSeconds,
      );
    }
  }

  const { simulation } = config;
  if (simulation) {
    if (simulation.durationSeconds !== undefined) {
      assertNonNegativeInteger('durationSeconds', simulation.durationSeconds);
    }
    if (simulation.intervalMs !== undefined) {
      assertNonNegativeInteger('intervalMs', simulation.intervalMs);
    }
    if (simulation.workers !== undefined) {
      assertPositiveInteger('workers', simulation.workers);
    }
    if (simulation.maxRounds !== undefined) {
      assertPositiveInteger('maxRounds', simulation.maxRounds);
    }
  }
}

const SERVICES = [
  BucketRegistryService,
  AdmissionSimulatorService,
  AccountAdmissionInterceptor,
];

/**
 * Main module for AccountAdmission. Use forRoot or forRootAsync to configure and register.
 */
@Global()
@Module({})
export class AccountAdmissionModule {
  /**
   * Register the AccountAdmission module with static configuration
   *
   * @param config Configuration for the AccountAdmission module
   * @returns Dynamic module
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     AccountAdmissionModule.forRoot({
   *       accounts: [
   *         { accountId: 'free-tier', capacity: 10, refillIntervalSeconds: 6 },
   *         { accountId: 'partner', capacity: 100, refillIntervalSeconds: 1 },
   *       ],
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: AccountAdmissionConfig = {}): DynamicModule {
    validateConfig(config);

    const configProvider: Provider = {
      provide: ACCOUNT_ADMISSION_CONFIG,
      useValue: config,
    };

    return {
      module: AccountAdmissionModule,
      global: true,
      controllers:
        config.registerController === false ? [] : [AdmissionController],
      providers: [configProvider, ...SERVICES],
      exports: SERVICES,
    };
  }

  /**
   * Register the AccountAdmission module with async configuration
   *
   * @returns Dynamic module
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     AccountAdmissionModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: createAdmissionConfigFromEnv,
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   * @param asyncConfig
   */
  static forRootAsync(asyncConfig: AccountAdmissionAsyncConfig): DynamicModule {
    const providers: Provider[] = [
      AccountAdmissionModule.createAsyncConfigProvider(asyncConfig),
      ...SERVICES,
    ];

    if (asyncConfig.useClass) {
      providers.push({
        provide: asyncConfig.useClass,
        useClass: asyncConfig.useClass,
      });
    }

    return {
      module: AccountAdmissionModule,
      global: true,
      imports: asyncConfig.imports ?? [],
      controllers:
        asyncConfig.registerController === false ? [] : [AdmissionController],
      providers,
      exports: SERVICES,
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: AccountAdmissionAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    if (useFactory) {
      return {
        provide: ACCOUNT_ADMISSION_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          validateConfig(config);
          return config;
        },
        inject: options.inject ?? [],
      };
    }

    const factoryClass: Type<AccountAdmissionConfigFactory> | undefined =
      options.useClass ?? options.useExisting;
    if (factoryClass) {
      return {
        provide: ACCOUNT_ADMISSION_CONFIG,
        useFactory: async (configFactory: AccountAdmissionConfigFactory) => {
          const config = await configFactory.createAccountAdmissionConfig();
          validateConfig(config);
          return config;
        },
        inject: [factoryClass],
      };
    }

    throw new InvalidConfigurationError(
      'AccountAdmissionAsyncConfig must provide useFactory, useClass, or useExisting',
    );
  }
}
