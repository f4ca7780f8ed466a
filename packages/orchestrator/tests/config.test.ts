import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { EnvConfigError } from '@assetflow/shared';

import { DEFAULT_DATABASE_PATH, loadAssetflowConfig } from '../src/config';

describe('loadAssetflowConfig', () => {
  it('falls back to defaults', () => {
    assert.deepEqual(loadAssetflowConfig({}), {
      assetsDir: null,
      databasePath: DEFAULT_DATABASE_PATH,
      maxConcurrency: 1,
      logLevel: 'info'
    });
  });

  it('reads every variable', () => {
    assert.deepEqual(
      loadAssetflowConfig({
        ASSETFLOW_ASSETS_DIR: './pipeline/assets',
        ASSETFLOW_DB_PATH: 'warehouse.duckdb',
        ASSETFLOW_MAX_CONCURRENCY: '4',
        ASSETFLOW_LOG_LEVEL: 'DEBUG'
      }),
      {
        assetsDir: './pipeline/assets',
        databasePath: 'warehouse.duckdb',
        maxConcurrency: 4,
        logLevel: 'debug'
      }
    );
  });

  it('lists every invalid variable', () => {
    assert.throws(
      () => loadAssetflowConfig({ ASSETFLOW_MAX_CONCURRENCY: '0', ASSETFLOW_LOG_LEVEL: 'loud' }),
      (error: unknown) => {
        assert.ok(error instanceof EnvConfigError);
        assert.deepEqual(error.message.split('\n'), [
          '[assetflow] Invalid environment configuration',
          '  - ASSETFLOW_MAX_CONCURRENCY: ASSETFLOW_MAX_CONCURRENCY must be >= 1',
          '  - ASSETFLOW_LOG_LEVEL: ASSETFLOW_LOG_LEVEL does not match expected pattern'
        ]);
        return true;
      }
    );
  });
});
