import { Inject, Injectable, Logger } from '@nestjs/common';
import * as async from 'async';
import { setTimeout as delay } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import {
  AccountAdmissionConfig,
  SimulationOptions,
} from '../interfaces/config.interface';
import { AccountId } from '../interfaces/token-bucket.interface';
import {
  AccountNotFoundError,
  InvalidConfigurationError,
} from '../errors/admission.errors';
import { BucketRegistryService } from './bucket-registry.service';
import { ACCOUNT_ADMISSION_CONFIG } from '../utils/constants';
import { formatBucketSummary } from '../utils/bucket-summary';
import {
  assertNonNegativeInteger,
  assertPositiveInteger,
} from '../utils/validation';

export interface AccountSimulationResult {
  accountId: AccountId;
  admitted: number;
  rejected: number;
}

export interface SimulationError {
  callerId: string;
  accountId?: AccountId;
  details: string;
}

export interface SimulationReport {
  startedAt: number;
  finishedAt: number;
  perAccount: AccountSimulationResult[];
  errors: SimulationError[];
}

interface SimulationSettings {
  accountIds: AccountId[];
  durationSeconds: number;
  intervalMs: number;
  workers: number;
  maxRounds?: number;
}

const DEFAULT_DURATION_SECONDS = 60;
const DEFAULT_INTERVAL_MS = 3000;
const DEFAULT_WORKERS = 2;

/**
 * Drives synthetic traffic through the registry: a fixed number of workers
 * each send one request per account, pause, and repeat until the duration
 * has elapsed.
 */
@Injectable()
export class AdmissionSimulatorService {
  private readonly logger = new Logger(AdmissionSimulatorService.name);

  constructor(
    private readonly registry: BucketRegistryService,
    @Inject(ACCOUNT_ADMISSION_CONFIG)
    private readonly config: AccountAdmissionConfig,
  ) {}

  /**
   * Run a simulation. Options override the module's `simulation` defaults.
   *
   * @throws InvalidConfigurationError if a numeric option is out of range
   */
  async run(options: SimulationOptions = {}): Promise<SimulationReport> {
    const settings = this.resolveSettings(options);

    for (const { accountId, summary } of this.registry.listSummaries()) {
      if (settings.accountIds.includes(accountId)) {
        this.logger.log(
          `Summary of bucket '${accountId}': ${formatBucketSummary(summary).join(', ')}`,
        );
      }
    }

    const tally = new Map<AccountId, AccountSimulationResult>(
      settings.accountIds.map((accountId) => [
        accountId,
        { accountId, admitted: 0, rejected: 0 },
      ]),
    );
    const errors: SimulationError[] = [];
    const startedAt = this.registry.currentTime();
    const endTime = startedAt + settings.durationSeconds;
    const callerIds = Array.from(
      { length: settings.workers },
      (_, index) => `worker-${index + 1}-${uuidv4()}`,
    );

    this.logger.log(
      `Starting simulation with ${settings.workers} workers over ` +
        `${settings.accountIds.length} accounts for ${settings.durationSeconds}s`,
    );

    await new Promise<void>((resolve) => {
      async.eachOfLimit(
        callerIds,
        settings.workers,
        async (callerId: string) => {
          try {
            await this.runWorker(
              callerId,
              startedAt,
              endTime,
              settings,
              tally,
              errors,
            );
          } catch (error) {
            const details =
              error instanceof Error ? error.message : String(error);
            this.logger.error(`Worker ${callerId} stopped: ${details}`);
            errors.push({ callerId, details });
          }
        },
        () => resolve(),
      );
    });

    const report: SimulationReport = {
      startedAt,
      finishedAt: this.registry.currentTime(),
      perAccount: [...tally.values()],
      errors,
    };

    for (const result of report.perAccount) {
      this.logger.log(
        `Bucket '${result.accountId}': ${result.admitted} admitted, ${result.rejected} rejected`,
      );
    }

    return report;
  }

  private async runWorker(
    callerId: string,
    startedAt: number,
    endTime: number,
    settings: SimulationSettings,
    tally: Map<AccountId, AccountSimulationResult>,
    errors: SimulationError[],
  ): Promise<void> {
    let rounds = 0;

    for (
      let now = startedAt;
      now < endTime;
      now = this.registry.currentTime()
    ) {
      for (const accountId of settings.accountIds) {
        try {
          const admitted = this.registry.admit(accountId, now, callerId);
          const result = tally.get(accountId);
          if (result) {
            if (admitted) {
              result.admitted += 1;
            } else {
              result.rejected += 1;
            }
          }
        } catch (error) {
          // Accounts may be deregistered while the simulation runs
          if (!(error instanceof AccountNotFoundError)) {
            throw error;
          }
          errors.push({ callerId, accountId, details: error.message });
        }
      }

      rounds += 1;
      if (settings.maxRounds !== undefined && rounds >= settings.maxRounds) {
        return;
      }
      await delay(settings.intervalMs);
    }
  }

  private resolveSettings(options: SimulationOptions): SimulationSettings {
    const defaults = this.config.simulation ?? {};
    const maxRounds = options.maxRounds ?? defaults.maxRounds;
    const intervalMs = assertNonNegativeInteger(
      'intervalMs',
      options.intervalMs ?? defaults.intervalMs ?? DEFAULT_INTERVAL_MS,
    );

    // Without a pause or a round cap, a clock that stands still never ends the run
    if (intervalMs === 0 && maxRounds === undefined) {
      throw new InvalidConfigurationError(
        'intervalMs must be positive unless maxRounds is set',
      );
    }

    return {
      accountIds:
        options.accountIds ??
        defaults.accountIds ??
        this.registry.listSummaries().map(({ accountId }) => accountId),
      durationSeconds: assertNonNegativeInteger(
        'durationSeconds',
        options.durationSeconds ??
          defaults.durationSeconds ??
          DEFAULT_DURATION_SECONDS,
      ),
      intervalMs,
      workers: assertPositiveInteger(
        'workers',
        options.workers ?? defaults.workers ?? DEFAULT_WORKERS,
      ),
      maxRounds:
        maxRounds === undefined
          ? undefined
          : assertPositiveInteger('maxRounds', maxRounds),
    };
  }
}
