// Module
export {
  AccountAdmissionModule,
  validateConfig,
} from './account-admission.module';

// Core
export { TokenBucket } from './models/token-bucket.model';
export { BucketRegistryService } from './services/bucket-registry.service';
export {
  AdmissionSimulatorService,
  AccountSimulationResult,
  SimulationError,
  SimulationReport,
} from './services/admission-simulator.service';

// Errors
export {
  AdmissionError,
  InvalidConfigurationError,
  AccountNotFoundError,
  InvalidTimestampError,
} from './errors/admission.errors';

// Interfaces
export {
  AccountAdmissionConfig,
  AccountAdmissionAsyncConfig,
  AccountAdmissionConfigFactory,
  SimulationOptions,
} from './interfaces/config.interface';
export {
  AccountId,
  Clock,
  ITokenBucketSummary,
  AccountBucketOptions,
  AccountBucketSummary,
} from './interfaces/token-bucket.interface';

// HTTP
export {
  AdmissionController,
  AdmissionResponse,
} from './controllers/admission.controller';
export { AccountAdmissionInterceptor } from './interceptors/account-admission.interceptor';
export {
  AccountRateLimited,
  AccountRateLimitedOptions,
  ACCOUNT_RATE_LIMITED_KEY,
} from './decorators/account-rate-limited.decorator';

// Utilities
export { formatBucketSummary } from './utils/bucket-summary';
export {
  createAdmissionConfigFromEnv,
  parseAccountList,
} from './utils/env-config';
export { currentTimeInSeconds } from './utils/clock';
export { ACCOUNT_ADMISSION_CONFIG } from './utils/constants';
