import path from 'node:path';
import { all, qualifiedName, quoteIdentifier, run, toNumber, withDuckDb } from '@assetflow/shared';
import type { DuckDBConnection } from '@duckdb/node-api';

export type QueryParam = string | number | boolean | null;

export type QueryRow = Record<string, unknown>;

export type ColumnInfo = {
  name: string;
  type: string;
};

/**
 * The catalog and write operations the orchestrator needs from the
 * analytical store. Each asset writes only to its own `schema.table`.
 */
export interface AssetDatabase {
  /** Passed to script assets as `DB_PATH`. */
  readonly location: string;
  tableExists(schema: string, table: string): Promise<boolean>;
  execute(sql: string): Promise<void>;
  query(sql: string, params?: QueryParam[]): Promise<QueryRow[]>;
  ensureSchema(schema: string): Promise<void>;
  /** All-or-nothing: a failing query leaves any existing table untouched. */
  replaceTableAsSelect(schema: string, table: string, selectSql: string): Promise<void>;
  listColumns(schema: string, table: string): Promise<ColumnInfo[]>;
  countRows(schema: string, table: string): Promise<number>;
  /**
   * Runs `task` while no other operation holds the database, so an external
   * process can open it. `task` must not call back into this database.
   */
  withExclusiveAccess<T>(task: () => Promise<T>): Promise<T>;
}

export function stripTrailingTerminators(sql: string): string {
  return sql.replace(/[\s;]+$/, '');
}

/**
 * DuckDB lets a single process write a database file at a time, so every
 * operation opens the file, runs and closes it again, one at a time. Script
 * assets get the file to themselves through `withExclusiveAccess`.
 */
export class DuckDbAssetDatabase implements AssetDatabase {
  readonly location: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(location: string) {
    this.location = path.resolve(location);
  }

  withExclusiveAccess<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task, task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private withConnection<T>(fn: (connection: DuckDBConnection) => Promise<T>): Promise<T> {
    return this.withExclusiveAccess(() => withDuckDb(this.location, fn));
  }

  async tableExists(schema: string, table: string): Promise<boolean> {
    const rows = await this.query(
      'select 1 as found from information_schema.tables where table_schema = $1 and table_name = $2 limit 1',
      [schema, table]
    );
    return rows.length > 0;
  }

  execute(sql: string): Promise<void> {
    return this.withConnection((connection) => run(connection, sql));
  }

  query(sql: string, params: QueryParam[] = []): Promise<QueryRow[]> {
    return this.withConnection((connection) => all(connection, sql, params));
  }

  ensureSchema(schema: string): Promise<void> {
    return this.execute(`create schema if not exists ${quoteIdentifier(schema)}`);
  }

  replaceTableAsSelect(schema: string, table: string, selectSql: string): Promise<void> {
    return this.withConnection(async (connection) => {
      await run(connection, `create schema if not exists ${quoteIdentifier(schema)}`);
      await run(connection, `create or replace table ${qualifiedName(schema, table)} as\n${stripTrailingTerminators(selectSql)}`);
    });
  }

  async listColumns(schema: string, table: string): Promise<ColumnInfo[]> {
    const rows = await this.query(
      'select column_name, data_type from information_schema.columns ' +
        'where table_schema = $1 and table_name = $2 order by ordinal_position',
      [schema, table]
    );
    return rows.map((row) => ({
      name: String(row.column_name),
      type: String(row.data_type)
    }));
  }

  async countRows(schema: string, table: string): Promise<number> {
    return this.withConnection(async (connection) => {
      const rows = await all(connection, `select count(*) as row_count from ${qualifiedName(schema, table)}`);
      return toNumber(rows[0]?.row_count);
    });
  }
}
