import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

export const hashAlgorithms = ['difference', 'average', 'perceptual'] as const;

export const distanceStrategies = ['popcount', 'bitwise'] as const;

// Read from the host process on import; unknown values never block loading
const runtimeSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(logLevels).catch('info')
});

// Validated strictly, but only when a hasher is built from the environment
const hashingSchema = z.object({
  IMAGE_HASH_MODE: z.enum(['hex', 'dec']).default('hex'),
  IMAGE_HASH_ALGORITHM: z.enum(hashAlgorithms).default('difference'),
  IMAGE_HASH_DISTANCE_STRATEGY: z.enum(distanceStrategies).default('popcount'),
  IMAGE_HASH_SIMILARITY_THRESHOLD: z
    .string()
    .default('10')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(0)
        .max(64)
        .describe('IMAGE_HASH_SIMILARITY_THRESHOLD must be within 0-64')
    )
});

export type RuntimeData = z.infer<typeof runtimeSchema>;

export type HashingData = z.infer<typeof hashingSchema>;

export interface RuntimeEnvironment extends RuntimeData {
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
}

export interface AppEnvironment extends RuntimeEnvironment, HashingData {}

export function parseRuntime(source: NodeJS.ProcessEnv): RuntimeEnvironment {
  const data = runtimeSchema.parse(source);

  return {
    ...data,
    isDevelopment: data.NODE_ENV === 'development',
    isProduction: data.NODE_ENV === 'production',
    isTest: data.NODE_ENV === 'test'
  };
}

/**
 * Validate the hashing settings of an environment
 *
 * @throws Error listing every invalid field
 */
export function parseHashingSettings(source: NodeJS.ProcessEnv): HashingData {
  const parseResult = hashingSchema.safeParse(source);

  if (!parseResult.success) {
    const formatted = parseResult.error.flatten();
    const errors = Object.entries(formatted.fieldErrors)
      .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return parseResult.data;
}

export function parseEnvironment(source: NodeJS.ProcessEnv): AppEnvironment {
  return {
    ...parseRuntime(source),
    ...parseHashingSettings(source)
  };
}

export const env = parseRuntime(process.env);
