import { FactoryProvider, ModuleMetadata, Type } from '@nestjs/common';
import {
  AccountBucketOptions,
  AccountId,
  Clock,
} from './token-bucket.interface';

/**
 * Options for the request simulation driver
 */
export interface SimulationOptions {
  /**
   * Accounts every worker sends requests to, in order.
   * Defaults to every account registered when the run starts.
   */
  accountIds?: AccountId[];

  /**
   * How long each worker keeps sending requests
   * @default 60
   */
  durationSeconds?: number;

  /**
   * Pause between two rounds of requests of the same worker.
   * 0 is only accepted together with `maxRounds`.
   * @default 3000
   */
  intervalMs?: number;

  /**
   * Number of workers sending requests concurrently
   * @default 2
   */
  workers?: number;

  /**
   * Stop a worker after this many rounds even if time is left
   */
  maxRounds?: number;
}

/**
 * Configuration for the AccountAdmission module
 */
export interface AccountAdmissionConfig {
  /**
   * Buckets registered when the module starts
   */
  accounts?: AccountBucketOptions[];

  /**
   * Time source in whole seconds since epoch, used when a caller does not pass `now`
   * @default () => Math.round(Date.now() / 1000)
   */
  clock?: Clock;

  /**
   * Log every admission decision at debug level
   * @default true
   */
  logAdmissions?: boolean;

  /**
   * Mount the built-in AdmissionController
   * @default true
   */
  registerController?: boolean;

  /**
   * Defaults for AdmissionSimulatorService.run
   */
  simulation?: SimulationOptions;
}

/**
 * Interface for async config factory
 */
export interface AccountAdmissionConfigFactory {
  createAccountAdmissionConfig():
    | Promise<AccountAdmissionConfig>
    | AccountAdmissionConfig;
}

/**
 * Options for async module configuration
 */
export interface AccountAdmissionAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Existing provider that implements the config factory interface
   */
  useExisting?: Type<AccountAdmissionConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<AccountAdmissionConfigFactory>;

  /**
   * Factory function for config
   */
  useFactory?: FactoryProvider<AccountAdmissionConfig>['useFactory'];

  /**
   * Dependencies to inject into factory function
   */
  inject?: FactoryProvider['inject'];

  /**
   * Mount the built-in AdmissionController. Decided before the config
   * factory runs, so it lives here rather than in the resolved config.
   * @default true
   */
  registerController?: boolean;
}
