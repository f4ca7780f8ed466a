import { stripTrailingTerminators, type AssetDatabase } from '../database';
import { describeError } from '../errors';
import type { AssetDescriptor } from '../types';
import type { AssetExecutionAdapter, ExecutionOutcome } from './types';

/** Replaces the target table with the result of the asset's query. */
export class QueryAdapter implements AssetExecutionAdapter {
  readonly kind = 'query';

  async execute(asset: AssetDescriptor, database: AssetDatabase): Promise<ExecutionOutcome> {
    if (asset.payload.type !== 'query') {
      return { ok: false, error: `Asset ${asset.name} has no query to run` };
    }
    const sql = stripTrailingTerminators(asset.payload.sql);
    if (sql.length === 0) {
      return { ok: false, error: `Query asset ${asset.relativePath} is empty` };
    }
    try {
      await database.replaceTableAsSelect(asset.schema, asset.table, sql);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }
}
