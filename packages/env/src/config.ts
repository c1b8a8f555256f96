import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TALLYVIEW_API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  TALLYVIEW_DATA_FILE: z.string().trim().min(1).default(path.join('data', 'transactions.csv')),
  TALLYVIEW_LOAD_PROGRESS_INTERVAL: positiveInt(10_000),
});

type ValidatedEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  /** Absolute path of the transactions CSV. */
  dataFile: string;
  nodeEnv: ValidatedEnv['NODE_ENV'];
  port: number;
  progressInterval: number;
}

/**
 * Parses application configuration from an environment map.
 * Relative data file paths resolve against `cwd`.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Result<AppConfig, Error> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new Error(`Environment validation failed:\n${errors}`));
  }

  const data = result.data;
  return ok({
    dataFile: path.resolve(cwd, data.TALLYVIEW_DATA_FILE),
    nodeEnv: data.NODE_ENV,
    port: data.TALLYVIEW_API_PORT,
    progressInterval: data.TALLYVIEW_LOAD_PROGRESS_INTERVAL,
  });
}

let validatedConfig: AppConfig | undefined;

/**
 * Validates the process environment on first access and caches the result.
 * @throws Error if validation fails
 */
export function getAppConfig(): AppConfig {
  if (!validatedConfig) {
    const result = loadAppConfig();
    if (result.isErr()) {
      throw result.error;
    }
    validatedConfig = result.value;
  }
  return validatedConfig;
}
