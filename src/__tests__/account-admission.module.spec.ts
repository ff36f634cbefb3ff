import { Injectable } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  AccountAdmissionModule,
  validateConfig,
} from '../account-admission.module';
import { BucketRegistryService } from '../services/bucket-registry.service';
import { AdmissionSimulatorService } from '../services/admission-simulator.service';
import { AdmissionController } from '../controllers/admission.controller';
import {
  AccountAdmissionConfig,
  AccountAdmissionConfigFactory,
} from '../interfaces/config.interface';
import { InvalidConfigurationError } from '../errors/admission.errors';
import { createAdmissionConfigFromEnv } from '../utils/env-config';

@Injectable()
class StaticConfigFactory implements AccountAdmissionConfigFactory {
  createAccountAdmissionConfig(): AccountAdmissionConfig {
    return {
      accounts: [{ accountId: 'factory', capacity: 3, refillIntervalSeconds: 7 }],
    };
  }
}

describe('AccountAdmissionModule', () => {
  describe('forRoot', () => {
    it('should provide the registry with configured accounts', async () => {
      const module = await Test.createTestingModule({
        imports: [
          AccountAdmissionModule.forRoot({
            accounts: [
              { accountId: 1, capacity: 10, refillIntervalSeconds: 5 },
            ],
          }),
        ],
      }).compile();
      await module.init();

      const registry = module.get(BucketRegistryService);
      expect(registry.getSummary(1)).toEqual({
        capacity: 10,
        refillIntervalSeconds: 5,
        currentTokens: 10,
        lastAdmissionTime: null,
      });
      expect(module.get(AdmissionSimulatorService)).toBeInstanceOf(
        AdmissionSimulatorService,
      );
      expect(module.get(AdmissionController)).toBeInstanceOf(
        AdmissionController,
      );
      await module.close();
    });

    it('should leave the controller out when asked to', () => {
      const dynamicModule = AccountAdmissionModule.forRoot({
        registerController: false,
      });

      expect(dynamicModule.controllers).toEqual([]);
    });

    it('should validate the configuration eagerly', () => {
      expect(() =>
        AccountAdmissionModule.forRoot({
          accounts: [{ accountId: 'a', capacity: 0, refillIntervalSeconds: 5 }],
        }),
      ).toThrow(InvalidConfigurationError);
    });
  });

  describe('forRootAsync', () => {
    it('should build the config from ConfigService', async () => {
      const module = await Test.createTestingModule({
        imports: [
          ConfigModule.forRoot({
            ignoreEnvFile: true,
            load: [() => ({ ADMISSION_ACCOUNTS: 'async-acct:2:9' })],
          }),
          AccountAdmissionModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: createAdmissionConfigFromEnv,
          }),
        ],
      }).compile();
      await module.init();

      expect(module.get(BucketRegistryService).getSummary('async-acct')).toEqual({
        capacity: 2,
        refillIntervalSeconds: 9,
        currentTokens: 2,
        lastAdmissionTime: null,
      });
      await module.close();
    });

    it('should use a config factory class', async () => {
      const module = await Test.createTestingModule({
        imports: [
          AccountAdmissionModule.forRootAsync({
            useClass: StaticConfigFactory,
          }),
        ],
      }).compile();
      await module.init();

      expect(module.get(BucketRegistryService).has('factory')).toBe(true);
      await module.close();
    });

    it('should reject an invalid factory result', async () => {
      await expect(
        Test.createTestingModule({
          imports: [
            AccountAdmissionModule.forRootAsync({
              useFactory: () => ({
                simulation: { workers: 0 },
              }),
            }),
          ],
        }).compile(),
      ).rejects.toThrow(InvalidConfigurationError);
    });

    it('should require a way to build the config', () => {
      expect(() => AccountAdmissionModule.forRootAsync({})).toThrow(
        InvalidConfigurationError,
      );
    });
  });

  describe('validateConfig', () => {
    it('should reject duplicate account identifiers', () => {
      expect(() =>
        validateConfig({
          accounts: [
            { accountId: 'dup', capacity: 1, refillIntervalSeconds: 1 },
            { accountId: 'dup', capacity: 2, refillIntervalSeconds: 2 },
          ],
        }),
      ).toThrow("Invalid configuration: Account 'dup' is configured more than once");
    });

    it.each([null, 'acct', 7])(
      'should reject the account entry %p',
      (entry) => {
        // Shaped like untyped input from a config file
        const config: AccountAdmissionConfig = JSON.parse(
          JSON.stringify({ accounts: [entry] }),
        );

        expect(() => validateConfig(config)).toThrow(
          'Invalid configuration: Each account must be an object with accountId, capacity and refillIntervalSeconds',
        );
      },
    );

    it('should reject a fractional account id', () => {
      expect(() =>
        validateConfig({
          accounts: [{ accountId: 2.5, capacity: 1, refillIntervalSeconds: 1 }],
        }),
      ).toThrow(InvalidConfigurationError);
    });

    it('should accept an empty configuration', () => {
      expect(() => validateConfig({})).not.toThrow();
    });
  });
});
