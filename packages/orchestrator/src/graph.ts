import { AssetGraphError, UnknownAssetError } from './errors';
import type { AssetRegistry } from './registry';
import type { AssetDescriptor } from './types';
import { compareNames, sortedNames } from './utils';

export interface TableCatalog {
  tableExists(schema: string, table: string): Promise<boolean>;
}

export type AssetGraphNode = {
  readonly index: number;
  readonly name: string;
  readonly asset: AssetDescriptor;
  /** Indices of the producing nodes, ascending by name. */
  readonly dependencies: readonly number[];
  /** Indices of the consuming nodes, ascending by name. */
  readonly dependents: readonly number[];
  /** Pre-existing tables this asset reads that no asset produces. */
  readonly externals: readonly string[];
};

export type AssetGraphEntry = {
  asset: AssetDescriptor;
  /** Names of the assets this one depends on. */
  dependencies: string[];
  externals: string[];
};

export type ResolvedDependencies = {
  entries: AssetGraphEntry[];
  externals: string[];
};

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Arena of asset nodes indexed by name. Built once per run and read-only
 * afterwards.
 */
export class AssetGraph {
  readonly nodes: readonly AssetGraphNode[];
  /** Topological order; ties broken by ascending asset name. */
  readonly order: readonly string[];
  readonly externals: readonly string[];
  private readonly indexByName: ReadonlyMap<string, number>;

  constructor(entries: AssetGraphEntry[]) {
    const sorted = [...entries].sort((left, right) => compareNames(left.asset.name, right.asset.name));
    const indexByName = new Map<string, number>();
    sorted.forEach((entry, index) => indexByName.set(entry.asset.name, index));

    const dependents: number[][] = sorted.map(() => []);
    const dependencies = sorted.map((entry, index) => {
      const indices = sortedNames(new Set(entry.dependencies)).map((name) => {
        const dependencyIndex = indexByName.get(name);
        if (dependencyIndex === undefined) {
          throw new AssetGraphError('unresolved_dependency', {
            message: `Asset "${entry.asset.name}" references asset "${name}" outside the graph`,
            assetName: entry.asset.name,
            dependency: name
          });
        }
        return dependencyIndex;
      });
      for (const dependencyIndex of indices) {
        dependents[dependencyIndex].push(index);
      }
      return indices;
    });

    this.indexByName = indexByName;
    this.nodes = Object.freeze(
      sorted.map((entry, index) =>
        Object.freeze({
          index,
          name: entry.asset.name,
          asset: entry.asset,
          dependencies: Object.freeze(dependencies[index]),
          dependents: Object.freeze(dependents[index]),
          externals: Object.freeze(sortedNames(new Set(entry.externals)))
        })
      )
    );
    this.externals = Object.freeze(sortedNames(new Set(sorted.flatMap((entry) => entry.externals))));
    this.order = Object.freeze(topologicalOrder(this.nodes));
  }

  get size(): number {
    return this.nodes.length;
  }

  has(name: string): boolean {
    return this.indexByName.has(name);
  }

  node(name: string): AssetGraphNode {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw new UnknownAssetError([name]);
    }
    return this.nodes[index];
  }

  dependenciesOf(name: string): string[] {
    return this.node(name).dependencies.map((index) => this.nodes[index].name);
  }

  dependentsOf(name: string): string[] {
    return this.node(name).dependents.map((index) => this.nodes[index].name);
  }

  /** Every asset reachable downstream of `name`, sorted by name. */
  descendantsOf(name: string): string[] {
    return this.reach(this.node(name).index, (node) => node.dependents);
  }

  /** Every asset `name` transitively depends on, sorted by name. */
  ancestorsOf(name: string): string[] {
    return this.reach(this.node(name).index, (node) => node.dependencies);
  }

  private reach(start: number, next: (node: AssetGraphNode) => readonly number[]): string[] {
    const visited = new Set<number>();
    const stack = [...next(this.nodes[start])];
    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined || visited.has(index)) {
        continue;
      }
      visited.add(index);
      stack.push(...next(this.nodes[index]));
    }
    return sortedNames(Array.from(visited, (index) => this.nodes[index].name));
  }

  /** A graph over `names`, which must be closed under dependencies. */
  subgraph(names: Iterable<string>): AssetGraph {
    const selected = new Set(names);
    return new AssetGraph(
      this.nodes
        .filter((node) => selected.has(node.name))
        .map((node) => ({
          asset: node.asset,
          dependencies: this.dependenciesOf(node.name),
          externals: [...node.externals]
        }))
    );
  }
}

function topologicalOrder(nodes: readonly AssetGraphNode[]): string[] {
  const remaining = nodes.map((node) => node.dependencies.length);
  const ready = nodes.filter((node) => node.dependencies.length === 0).map((node) => node.index);
  const order: string[] = [];

  while (ready.length > 0) {
    // indices follow name order, so the smallest index is the smallest name
    ready.sort((left, right) => right - left);
    const current = ready.pop();
    if (current === undefined) {
      break;
    }
    order.push(nodes[current].name);
    for (const dependent of nodes[current].dependents) {
      remaining[dependent] -= 1;
      if (remaining[dependent] === 0) {
        ready.push(dependent);
      }
    }
  }

  if (order.length !== nodes.length) {
    throw new AssetGraphError('cycle_detected', {
      message: 'Asset graph contains a cycle that prevented topological ordering'
    });
  }
  return order;
}

/**
 * Maps every declared `schema.table` to the asset producing it, or to an
 * existing table in the catalog. Anything else is an unresolved dependency.
 */
export async function resolveDependencies(
  assets: readonly AssetDescriptor[],
  catalog: TableCatalog
): Promise<ResolvedDependencies> {
  const producers = new Map<string, AssetDescriptor>();
  for (const asset of assets) {
    producers.set(asset.target, asset);
  }

  const existing = new Map<string, boolean>();
  const tableExists = async (reference: string): Promise<boolean> => {
    const cached = existing.get(reference);
    if (cached !== undefined) {
      return cached;
    }
    const [schema, table] = reference.split('.');
    const found = await catalog.tableExists(schema, table);
    existing.set(reference, found);
    return found;
  };

  const entries: AssetGraphEntry[] = [];
  const externals = new Set<string>();
  for (const asset of [...assets].sort((left, right) => compareNames(left.name, right.name))) {
    const entry: AssetGraphEntry = { asset, dependencies: [], externals: [] };
    for (const reference of asset.dependencies) {
      const producer = producers.get(reference);
      if (producer) {
        entry.dependencies.push(producer.name);
        continue;
      }
      if (await tableExists(reference)) {
        entry.externals.push(reference);
        externals.add(reference);
        continue;
      }
      throw new AssetGraphError('unresolved_dependency', {
        message: `Asset "${asset.name}" depends on ${reference}, which is neither produced by an asset nor present in the database`,
        assetName: asset.name,
        dependency: reference
      });
    }
    entries.push(entry);
  }

  return { entries, externals: sortedNames(externals) };
}

/**
 * Colour-marking depth-first search in ascending name order. Returns the
 * cycle as a path that starts and ends with the same asset, or null.
 */
export function findDependencyCycle(entries: readonly AssetGraphEntry[]): string[] | null {
  const dependenciesByName = new Map<string, string[]>();
  for (const entry of entries) {
    dependenciesByName.set(entry.asset.name, sortedNames(new Set(entry.dependencies)));
  }

  const colour = new Map<string, number>();
  const stack: string[] = [];

  const visit = (name: string): string[] | null => {
    colour.set(name, GRAY);
    stack.push(name);
    for (const dependency of dependenciesByName.get(name) ?? []) {
      const state = colour.get(dependency) ?? WHITE;
      if (state === GRAY) {
        return [...stack.slice(stack.indexOf(dependency)), dependency];
      }
      if (state === WHITE && dependenciesByName.has(dependency)) {
        const cycle = visit(dependency);
        if (cycle) {
          return cycle;
        }
      }
    }
    stack.pop();
    colour.set(name, BLACK);
    return null;
  };

  for (const name of sortedNames(dependenciesByName.keys())) {
    if ((colour.get(name) ?? WHITE) === WHITE) {
      const cycle = visit(name);
      if (cycle) {
        return cycle;
      }
    }
  }
  return null;
}

export async function buildDependencyGraph(
  registry: AssetRegistry | readonly AssetDescriptor[],
  catalog: TableCatalog
): Promise<AssetGraph> {
  const assets = 'assets' in registry ? registry.assets : registry;
  const { entries } = await resolveDependencies(assets, catalog);
  const cycle = findDependencyCycle(entries);
  if (cycle) {
    throw new AssetGraphError('cycle_detected', {
      message: `Dependency cycle detected: ${cycle.join(' -> ')}`,
      cycle
    });
  }
  return new AssetGraph(entries);
}

/**
 * The requested assets (by name or `schema.table`) plus everything they
 * depend on.
 */
export function selectWithUpstream(graph: AssetGraph, requested: readonly string[]): AssetGraph {
  const byTarget = new Map(graph.nodes.map((node) => [node.asset.target, node.name]));
  const unknown: string[] = [];
  const selected = new Set<string>();
  for (const reference of requested) {
    const name = graph.has(reference) ? reference : byTarget.get(reference);
    if (!name) {
      unknown.push(reference);
      continue;
    }
    selected.add(name);
    for (const ancestor of graph.ancestorsOf(name)) {
      selected.add(ancestor);
    }
  }
  if (unknown.length > 0) {
    throw new UnknownAssetError(sortedNames(new Set(unknown)));
  }
  return graph.subgraph(selected);
}
