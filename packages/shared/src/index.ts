export * from './envConfig';
export * from './duckdb';
