export {
  env,
  parseEnvironment,
  parseHashingSettings,
  parseRuntime,
  hashAlgorithms,
  distanceStrategies
} from './env.js';
export type {
  AppEnvironment,
  HashingData,
  RuntimeEnvironment
} from './env.js';
