import { Command, InvalidArgumentError } from 'commander';
import pino from 'pino';
import type { EnvSource } from '@assetflow/shared';
import {
  DEFAULT_SAMPLE_ROWS,
  checkAssets,
  createLogger,
  generateDocs,
  listAssets,
  loadAssetflowConfig,
  materialize,
  type AssetflowConfig,
  type CheckReport,
  type Logger,
  type OrchestratorOptions,
  type RunReport
} from '@assetflow/orchestrator';

type GlobalOptions = {
  assetsDir?: string;
  db?: string;
  concurrency?: number;
  logLevel?: string;
  json?: boolean;
};

export type OrchestratorApi = {
  materialize: typeof materialize;
  checkAssets: typeof checkAssets;
  listAssets: typeof listAssets;
  generateDocs: typeof generateDocs;
};

type CliDependencies = {
  orchestrator?: OrchestratorApi;
  env?: EnvSource;
  /** Logger for run progress; defaults to pino on stderr so stdout stays parseable. */
  loggerFactory?: (level: string) => Logger;
  signal?: AbortSignal;
};

const defaultOrchestrator: OrchestratorApi = { materialize, checkAssets, listAssets, generateDocs };

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function formatOutput(payload: unknown, asJson: boolean | undefined, lines: () => string[]): void {
  if (asJson) {
    console.log(JSON.stringify(payload, null, 2));
    return;
  }
  for (const line of lines()) {
    console.log(line);
  }
}

function formatRunReport(report: RunReport): string[] {
  const lines = report.results.map((result) => {
    const detail = result.error ? `: ${result.error}` : '';
    return `${result.status} ${result.target}${detail}`;
  });
  const succeeded = report.results.length - report.failures.length;
  lines.push(`${succeeded} of ${report.results.length} assets materialized${report.cancelled ? ' (cancelled)' : ''}`);
  return lines;
}

function formatCheckReport(report: CheckReport): string[] {
  const lines = report.rules.map((result) => (result.ok ? `${result.rule}: OK` : `${result.rule}: FAIL - ${result.error ?? ''}`));
  lines.push(report.ok ? `All checks passed for ${report.assets} assets` : 'Checks failed');
  return lines;
}

export function createInterface(deps: CliDependencies = {}): Command {
  const orchestrator = deps.orchestrator ?? defaultOrchestrator;
  const loggerFactory = deps.loggerFactory ?? ((level: string) => createLogger(level, pino.destination(2)));
  const program = new Command();
  program
    .name('assetflow')
    .description('Materialize SQL and script assets into DuckDB in dependency order')
    .option('--assets-dir <dir>', 'Directory holding the asset files')
    .option('--db <path>', 'DuckDB database file')
    .option('--concurrency <n>', 'Maximum number of assets running at once', parsePositiveInteger)
    .option('--log-level <level>', 'pino log level')
    .option('--json', 'Output raw JSON reports');

  const resolveOptions = (): OrchestratorOptions & { config: AssetflowConfig } => {
    const options = program.opts<GlobalOptions>();
    const base = loadAssetflowConfig(deps.env ?? process.env);
    const config: AssetflowConfig = {
      assetsDir: options.assetsDir ?? base.assetsDir,
      databasePath: options.db ?? base.databasePath,
      maxConcurrency: options.concurrency ?? base.maxConcurrency,
      logLevel: options.logLevel ?? base.logLevel
    };
    return { config, logger: loggerFactory(config.logLevel) };
  };

  program
    .command('materialize')
    .description('Rebuild every asset, or the named assets and everything upstream of them')
    .argument('[assets...]', 'Asset names or schema.table targets')
    .action(async (assets: string[]) => {
      const options = program.opts<GlobalOptions>();
      const report = await orchestrator.materialize({ ...resolveOptions(), assets, signal: deps.signal });
      formatOutput(report, options.json, () => formatRunReport(report));
      if (!report.ok) {
        process.exitCode = 1;
      }
    });

  program
    .command('check')
    .description('Validate asset files and the dependency graph without running anything')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const report = await orchestrator.checkAssets(resolveOptions());
      formatOutput(report, options.json, () => formatCheckReport(report));
      if (!report.ok) {
        process.exitCode = 1;
      }
    });

  program
    .command('list')
    .description('List discovered assets')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const listing = await orchestrator.listAssets(resolveOptions());
      formatOutput(listing, options.json, () => {
        if (listing.assets.length === 0) {
          return ['No assets found.'];
        }
        return listing.assets.map((asset) => {
          const dependencies = asset.dependencies.length > 0 ? ` <- ${asset.dependencies.join(', ')}` : '';
          return `${asset.name} ${asset.target} (${asset.kind})${dependencies}`;
        });
      });
    });

  program
    .command('docs')
    .description('Write an HTML page describing every materialized asset')
    .option('--out <path>', 'Output file', 'index.html')
    .option('--sample-rows <n>', 'Sample rows per table', parsePositiveInteger, DEFAULT_SAMPLE_ROWS)
    .action(async (cmdOptions: { out: string; sampleRows: number }) => {
      const options = program.opts<GlobalOptions>();
      const outPath = await orchestrator.generateDocs({
        ...resolveOptions(),
        outPath: cmdOptions.out,
        sampleRows: cmdOptions.sampleRows
      });
      formatOutput({ outPath }, options.json, () => [`Wrote ${outPath}`]);
    });

  return program;
}
