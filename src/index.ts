export * from './hash/index.js';
export * from './fingerprint/index.js';
export * from './image/index.js';
export * from './lib/errors.js';
export { isValidEncodedHash } from './lib/validation.js';
export { logger } from './lib/logger.js';
export {
  env,
  parseEnvironment,
  parseHashingSettings,
  parseRuntime
} from './config/index.js';
export type {
  AppEnvironment,
  HashingData,
  RuntimeEnvironment
} from './config/index.js';
export * from './types/index.js';
