import { ConfigService } from '@nestjs/config';
import {
  AccountAdmissionConfig,
  SimulationOptions,
} from '../interfaces/config.interface';
import {
  AccountBucketOptions,
  AccountId,
} from '../interfaces/token-bucket.interface';
import { InvalidConfigurationError } from '../errors/admission.errors';

export const ADMISSION_ACCOUNTS = 'ADMISSION_ACCOUNTS';
export const ADMISSION_SIMULATION_DURATION_SECONDS =
  'ADMISSION_SIMULATION_DURATION_SECONDS';
export const ADMISSION_SIMULATION_INTERVAL_MS =
  'ADMISSION_SIMULATION_INTERVAL_MS';
export const ADMISSION_SIMULATION_WORKERS = 'ADMISSION_SIMULATION_WORKERS';

const parseInteger = (name: string, raw: string): number => {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidConfigurationError(`${name} must be an integer`, {
      [name]: raw,
    });
  }
  return parseInt(trimmed, 10);
};

const parseAccountId = (raw: string): AccountId => {
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : trimmed;
};

/**
 * Parse `id:capacity:refillIntervalSeconds` entries separated by commas,
 * e.g. `1:10:5,2:5:10`. Purely numeric ids become numbers.
 */
export function parseAccountList(raw: string): AccountBucketOptions[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const parts = entry.split(':');
      if (parts.length !== 3 || parts[0].trim() === '') {
        throw new InvalidConfigurationError(
          `${ADMISSION_ACCOUNTS} entry '${entry}' must look like id:capacity:refillIntervalSeconds`,
        );
      }
      const [id, capacity, interval] = parts;
      return {
        accountId: parseAccountId(id),
        capacity: parseInteger(`${ADMISSION_ACCOUNTS} capacity`, capacity),
        refillIntervalSeconds: parseInteger(
          `${ADMISSION_ACCOUNTS} refillIntervalSeconds`,
          interval,
        ),
      };
    });
}

/**
 * Build the module configuration from environment-backed ConfigService values.
 * Range checks happen later, when the module validates the config.
 *
 * @example
 * ```typescript
 * AccountAdmissionModule.forRootAsync({
 *   imports: [ConfigModule],
 *   inject: [ConfigService],
 *   useFactory: createAdmissionConfigFromEnv,
 * })
 * ```
 */
export function createAdmissionConfigFromEnv(
  configService: ConfigService,
): AccountAdmissionConfig {
  const config: AccountAdmissionConfig = {};

  const accounts = configService.get<string>(ADMISSION_ACCOUNTS);
  if (accounts !== undefined) {
    config.accounts = parseAccountList(accounts);
  }

  const simulation: SimulationOptions = {};
  const duration = configService.get<string>(
    ADMISSION_SIMULATION_DURATION_SECONDS,
  );
  if (duration !== undefined) {
    simulation.durationSeconds = parseInteger(
      ADMISSION_SIMULATION_DURATION_SECONDS,
      duration,
    );
  }
  const interval = configService.get<string>(ADMISSION_SIMULATION_INTERVAL_MS);
  if (interval !== undefined) {
    simulation.intervalMs = parseInteger(
      ADMISSION_SIMULATION_INTERVAL_MS,
      interval,
    );
  }
  const workers = configService.get<string>(ADMISSION_SIMULATION_WORKERS);
  if (workers !== undefined) {
    simulation.workers = parseInteger(ADMISSION_SIMULATION_WORKERS, workers);
  }
  if (Object.keys(simulation).length > 0) {
    config.simulation = simulation;
  }

  return config;
}
