import { AssetflowError, AssetGraphError, describeError } from './errors';
import { findDependencyCycle, resolveDependencies, type ResolvedDependencies, type TableCatalog } from './graph';
import { discoverAssets, type AssetRegistry } from './registry';

export type CheckRuleResult = {
  rule: string;
  ok: boolean;
  error?: string;
};

export type CheckReport = {
  ok: boolean;
  assets: number;
  rules: CheckRuleResult[];
};

type CheckContext = {
  root: string;
  catalog: TableCatalog;
  registry: AssetRegistry | null;
  resolved: ResolvedDependencies | null;
};

type CheckRule = {
  rule: string;
  run: (context: CheckContext) => Promise<void>;
};

function required<T>(value: T | null, what: string): T {
  if (value === null) {
    throw new AssetflowError('CHECK_ORDER', `${what} is not available; an earlier rule did not run`);
  }
  return value;
}

export const CHECK_RULES: readonly CheckRule[] = [
  {
    rule: 'Asset files parse and names match file names',
    run: async (context) => {
      context.registry = await discoverAssets(context.root);
    }
  },
  {
    rule: 'All dependencies resolve',
    run: async (context) => {
      const registry = required(context.registry, 'Asset registry');
      context.resolved = await resolveDependencies(registry.assets, context.catalog);
    }
  },
  {
    rule: 'No dependency cycles',
    run: async (context) => {
      const cycle = findDependencyCycle(required(context.resolved, 'Resolved dependencies').entries);
      if (cycle) {
        throw new AssetGraphError('cycle_detected', {
          message: `Dependency cycle detected: ${cycle.join(' -> ')}`,
          cycle
        });
      }
    }
  },
  {
    rule: 'Query asset files have content beyond metadata',
    run: async (context) => {
      const empty = required(context.registry, 'Asset registry')
        .assets.filter((asset) => asset.payload.type === 'query' && asset.payload.sql.trim().length === 0)
        .map((asset) => asset.relativePath);
      if (empty.length > 0) {
        throw new AssetflowError('ASSET_EMPTY', `Asset files without content: ${empty.join(', ')}`);
      }
    }
  },
  {
    rule: 'No duplicate dependencies',
    run: async (context) => {
      const duplicates: string[] = [];
      for (const asset of required(context.registry, 'Asset registry').assets) {
        const seen = new Set<string>();
        for (const dependency of asset.declaredDependencies) {
          if (seen.has(dependency)) {
            duplicates.push(`${asset.name} -> ${dependency}`);
          }
          seen.add(dependency);
        }
      }
      if (duplicates.length > 0) {
        throw new AssetflowError('ASSET_DUPLICATE_DEPENDENCY', `Duplicate dependencies: ${duplicates.join(', ')}`);
      }
    }
  }
];

/**
 * Validates the asset files and the dependency graph without executing
 * anything. Stops at the first failing rule.
 */
export async function runChecks(root: string, catalog: TableCatalog): Promise<CheckReport> {
  const context: CheckContext = { root, catalog, registry: null, resolved: null };
  const rules: CheckRuleResult[] = [];
  for (const { rule, run } of CHECK_RULES) {
    try {
      await run(context);
      rules.push({ rule, ok: true });
    } catch (error) {
      rules.push({ rule, ok: false, error: describeError(error) });
      break;
    }
  }
  return {
    ok: rules.length === CHECK_RULES.length && rules.every((result) => result.ok),
    assets: context.registry?.size ?? 0,
    rules
  };
}
