import { ConfigService } from '@nestjs/config';
import {
  createAdmissionConfigFromEnv,
  parseAccountList,
} from '../env-config';
import { InvalidConfigurationError } from '../../errors/admission.errors';

describe('env-config', () => {
  describe('parseAccountList', () => {
    it('should parse id:capacity:interval entries', () => {
      expect(parseAccountList('1:10:5, partner:5:10,')).toEqual([
        { accountId: 1, capacity: 10, refillIntervalSeconds: 5 },
        { accountId: 'partner', capacity: 5, refillIntervalSeconds: 10 },
      ]);
    });

    it('should return no accounts for an empty list', () => {
      expect(parseAccountList('  ')).toEqual([]);
    });

    it.each(['1:10', ':10:5', '1:ten:5', '1:10:5:2', '1:10:2.5'])(
      'should reject %p',
      (raw) => {
        expect(() => parseAccountList(raw)).toThrow(InvalidConfigurationError);
      },
    );
  });

  describe('createAdmissionConfigFromEnv', () => {
    it('should build accounts and simulation settings', () => {
      const configService = new ConfigService({
        ADMISSION_ACCOUNTS: '1:10:5,2:5:10',
        ADMISSION_SIMULATION_DURATION_SECONDS: '30',
        ADMISSION_SIMULATION_INTERVAL_MS: '500',
        ADMISSION_SIMULATION_WORKERS: '4',
      });

      expect(createAdmissionConfigFromEnv(configService)).toEqual({
        accounts: [
          { accountId: 1, capacity: 10, refillIntervalSeconds: 5 },
          { accountId: 2, capacity: 5, refillIntervalSeconds: 10 },
        ],
        simulation: { durationSeconds: 30, intervalMs: 500, workers: 4 },
      });
    });

    it('should leave unset values out', () => {
      const configService = new ConfigService({});

      expect(createAdmissionConfigFromEnv(configService)).toEqual({});
    });

    it('should reject a malformed number', () => {
      const configService = new ConfigService({
        ADMISSION_SIMULATION_WORKERS: 'many',
      });

      expect(() => createAdmissionConfigFromEnv(configService)).toThrow(
        'Invalid configuration: ADMISSION_SIMULATION_WORKERS must be an integer',
      );
    });
  });
});
