// src/config/app.config.ts
import 'dotenv/config';
import { z } from 'zod';

export type StoreDriver = 'sqlite' | 'memory';

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  host: string;
  port: number;
  storeDriver: StoreDriver;
  databasePath: string;
  scanBatchSize: number;
  apiKey: string | null;
  graphiql: boolean;
}

function blankToUndefined(value: unknown) {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const positiveInt = (name: string) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a positive integer.`)
    .transform((value) => Number.parseInt(value, 10))
    .pipe(z.number().int().positive(`${name} must be a positive integer.`));

const envSchema = z.object({
  NODE_ENV: z.preprocess(blankToUndefined, z.string().default('development')),
  HOST: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),
  PORT: z.preprocess(blankToUndefined, positiveInt('PORT').default('3000')),
  STORE_DRIVER: z.preprocess(
    blankToUndefined,
    z
      .enum(['sqlite', 'memory'], {
        errorMap: () => ({ message: 'STORE_DRIVER must be "sqlite" or "memory".' }),
      })
      .default('sqlite'),
  ),
  DATABASE_PATH: z.preprocess(
    blankToUndefined,
    z.string().default('data/records.sqlite'),
  ),
  STORE_SCAN_BATCH_SIZE: z.preprocess(
    blankToUndefined,
    positiveInt('STORE_SCAN_BATCH_SIZE').default('64'),
  ),
  API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  GRAPHIQL: z.preprocess(
    blankToUndefined,
    z.enum(['true', 'false'], {
      errorMap: () => ({ message: 'GRAPHIQL must be "true" or "false".' }),
    }).optional(),
  ),
});

/**
 * Read and validate the process environment.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration (${details})`);
  }

  const vars = parsed.data;
  const isProduction = vars.NODE_ENV === 'production';

  if (isProduction && !vars.API_KEY) {
    throw new Error('API_KEY environment variable is required in production');
  }

  return {
    nodeEnv: vars.NODE_ENV,
    isProduction,
    host: vars.HOST,
    port: vars.PORT,
    storeDriver: vars.STORE_DRIVER,
    databasePath: vars.DATABASE_PATH,
    scanBatchSize: vars.STORE_SCAN_BATCH_SIZE,
    apiKey: vars.API_KEY ?? null,
    graphiql: vars.GRAPHIQL ? vars.GRAPHIQL === 'true' : !isProduction,
  };
}

export const APP_CONFIG = Symbol('APP_CONFIG');
