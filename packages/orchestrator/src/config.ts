import { integerVar, loadEnvConfig, stringVar, type EnvSource } from '@assetflow/shared';
import { z } from 'zod';

export const DEFAULT_DATABASE_PATH = 'assetflow.duckdb';

const LOG_LEVEL_PATTERN = /^(fatal|error|warn|info|debug|trace|silent)$/;

const envSchema = z.object({
  ASSETFLOW_ASSETS_DIR: stringVar({ description: 'ASSETFLOW_ASSETS_DIR' }),
  ASSETFLOW_DB_PATH: stringVar({ defaultValue: DEFAULT_DATABASE_PATH }),
  ASSETFLOW_MAX_CONCURRENCY: integerVar({ defaultValue: 1, min: 1, max: 64 }),
  ASSETFLOW_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true, pattern: LOG_LEVEL_PATTERN })
});

export type AssetflowConfig = {
  /** Null means: look for an `assets` directory upward from the working directory. */
  assetsDir: string | null;
  databasePath: string;
  maxConcurrency: number;
  logLevel: string;
};

export function loadAssetflowConfig(env: EnvSource = process.env): AssetflowConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'assetflow' });
  return {
    assetsDir: parsed.ASSETFLOW_ASSETS_DIR ?? null,
    databasePath: parsed.ASSETFLOW_DB_PATH ?? DEFAULT_DATABASE_PATH,
    maxConcurrency: parsed.ASSETFLOW_MAX_CONCURRENCY ?? 1,
    logLevel: parsed.ASSETFLOW_LOG_LEVEL ?? 'info'
  };
}
