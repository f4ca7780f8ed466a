import { DuckDBInstance, type DuckDBConnection, type DuckDBValue } from '@duckdb/node-api';

export type DuckDbRow = Record<string, DuckDBValue>;

export type DuckDbSession = {
  connection: DuckDBConnection;
  close: () => void;
};

/**
 * Opens a database file and a single connection on it. DuckDB allows one
 * writing process per file, so callers that hand the file to another process
 * must close the session first.
 */
export async function openDuckDb(location: string): Promise<DuckDbSession> {
  const instance = await DuckDBInstance.create(location);
  let connection: DuckDBConnection;
  try {
    connection = await instance.connect();
  } catch (error) {
    instance.closeSync();
    throw error;
  }
  return {
    connection,
    close: () => {
      connection.closeSync();
      instance.closeSync();
    }
  } satisfies DuckDbSession;
}

export async function withDuckDb<T>(location: string, fn: (connection: DuckDBConnection) => Promise<T>): Promise<T> {
  const session = await openDuckDb(location);
  try {
    return await fn(session.connection);
  } finally {
    session.close();
  }
}

function bindable(params: DuckDBValue[] | undefined): DuckDBValue[] | undefined {
  return params && params.length > 0 ? params : undefined;
}

export async function run(connection: DuckDBConnection, sql: string, params?: DuckDBValue[]): Promise<void> {
  await connection.run(sql, bindable(params));
}

export async function all(connection: DuckDBConnection, sql: string, params?: DuckDBValue[]): Promise<DuckDbRow[]> {
  const reader = await connection.runAndReadAll(sql, bindable(params));
  return reader.getRowObjects();
}

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

export function qualifiedName(schema: string, table: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

/** Row values as plain JSON-friendly data; BIGINT counts arrive as bigint. */
export function toNumber(value: DuckDBValue | undefined): number {
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    return Number.parseFloat(value);
  }
  return 0;
}
