import path from 'node:path';

import { createDefaultAdapters, type AdapterRegistry, type ScriptAdapterOptions } from './adapters';
import { runChecks, type CheckReport } from './checks';
import { loadAssetflowConfig, type AssetflowConfig } from './config';
import { DuckDbAssetDatabase, type AssetDatabase } from './database';
import { DEFAULT_SAMPLE_ROWS, generateDocs as writeDocs } from './docs';
import { buildDependencyGraph, selectWithUpstream } from './graph';
import { createLogger, type Logger } from './logger';
import { discoverAssets, findAssetsRoot } from './registry';
import { runSchedule, type MaterializationCheck } from './scheduler';
import type { AssetKind, AssetStatusChange, RunReport } from './types';

export type OrchestratorOptions = {
  /** Defaults to `ASSETFLOW_ASSETS_DIR`, then the nearest `assets/` directory. */
  assetsDir?: string;
  /** Defaults to `ASSETFLOW_DB_PATH`. Ignored when `database` is given. */
  databasePath?: string;
  database?: AssetDatabase;
  logger?: Logger;
  config?: AssetflowConfig;
};

export type MaterializeOptions = OrchestratorOptions & {
  /** Asset names or `schema.table` targets; upstream assets are included. Empty means all. */
  assets?: string[];
  maxConcurrency?: number;
  adapters?: AdapterRegistry;
  script?: ScriptAdapterOptions;
  check?: MaterializationCheck;
  signal?: AbortSignal;
  onStatusChange?: (change: AssetStatusChange) => void;
};

export type AssetListing = {
  root: string;
  assets: {
    name: string;
    target: string;
    kind: AssetKind;
    relativePath: string;
    description: string | null;
    dependencies: string[];
  }[];
};

export type DocsOptions = OrchestratorOptions & {
  outPath: string;
  sampleRows?: number;
};

type RunContext = {
  config: AssetflowConfig;
  assetsDir: string;
  database: AssetDatabase;
  logger: Logger;
};

async function resolveContext(options: OrchestratorOptions): Promise<RunContext> {
  const config = options.config ?? loadAssetflowConfig();
  const configuredDir = options.assetsDir ?? config.assetsDir;
  const assetsDir = configuredDir ? path.resolve(configuredDir) : await findAssetsRoot();
  return {
    config,
    assetsDir,
    database: options.database ?? new DuckDbAssetDatabase(options.databasePath ?? config.databasePath),
    logger: options.logger ?? createLogger(config.logLevel)
  };
}

/**
 * Full-refresh materialization of every asset (or the selection and its
 * upstream). Per-asset failures land in the report; registry and graph
 * errors are thrown before anything runs.
 */
export async function materialize(options: MaterializeOptions = {}): Promise<RunReport> {
  const context = await resolveContext(options);
  const registry = await discoverAssets(context.assetsDir);
  context.logger.debug({ assetsDir: context.assetsDir, assets: registry.size }, 'Assets discovered');

  const graph = await buildDependencyGraph(registry, context.database);
  const selected = options.assets && options.assets.length > 0 ? selectWithUpstream(graph, options.assets) : graph;

  return runSchedule(selected, {
    database: context.database,
    adapters: options.adapters ?? createDefaultAdapters({ script: options.script }),
    logger: context.logger,
    maxConcurrency: options.maxConcurrency ?? context.config.maxConcurrency,
    signal: options.signal,
    onStatusChange: options.onStatusChange,
    check: options.check
  });
}

/** Check-only mode: parse and validate, never execute. */
export async function checkAssets(options: OrchestratorOptions = {}): Promise<CheckReport> {
  const context = await resolveContext(options);
  return runChecks(context.assetsDir, context.database);
}

export async function listAssets(options: OrchestratorOptions = {}): Promise<AssetListing> {
  const context = await resolveContext(options);
  const registry = await discoverAssets(context.assetsDir);
  return {
    root: registry.root,
    assets: registry.assets.map((asset) => ({
      name: asset.name,
      target: asset.target,
      kind: asset.kind,
      relativePath: asset.relativePath,
      description: asset.description,
      dependencies: [...asset.dependencies]
    }))
  };
}

export async function generateDocs(options: DocsOptions): Promise<string> {
  const context = await resolveContext(options);
  const registry = await discoverAssets(context.assetsDir);
  return writeDocs(registry, context.database, {
    outPath: options.outPath,
    sampleRows: options.sampleRows ?? DEFAULT_SAMPLE_ROWS
  });
}
