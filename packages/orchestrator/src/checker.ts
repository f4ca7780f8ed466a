import type { AssetDatabase } from './database';
import { describeError } from './errors';
import type { AssetDescriptor } from './types';

export type CheckOutcome = { ok: true } | { ok: false; error: string };

/**
 * Confirms the asset's target exists after a successful execution,
 * whichever way the asset wrote it. Declared columns and `non_empty` are
 * verified only when the asset declares them.
 */
export async function checkMaterialization(asset: AssetDescriptor, database: AssetDatabase): Promise<CheckOutcome> {
  try {
    if (!(await database.tableExists(asset.schema, asset.table))) {
      return { ok: false, error: `Asset ${asset.name} did not create ${asset.target}` };
    }

    const { columns, nonEmpty } = asset.expectations;
    if (columns.length > 0) {
      const present = new Set((await database.listColumns(asset.schema, asset.table)).map((column) => column.name));
      const missing = columns.filter((column) => !present.has(column));
      if (missing.length > 0) {
        return { ok: false, error: `${asset.target} is missing declared columns: ${missing.join(', ')}` };
      }
    }

    if (nonEmpty && (await database.countRows(asset.schema, asset.table)) === 0) {
      return { ok: false, error: `${asset.target} is empty but declares non_empty` };
    }
  } catch (error) {
    return { ok: false, error: `Materialization check for ${asset.target} failed: ${describeError(error)}` };
  }
  return { ok: true };
}
