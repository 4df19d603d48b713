// Grid evaluation
export * from './sheets';

// Logging and configuration
export * from './logging';
export {
  envSchema,
  validateEnv,
  getEnvErrors,
  isEnvValid,
  getValidatedEnv,
  resetEnvCache,
} from './config/env-validation';
export type { GridEnv } from './config/env-validation';
