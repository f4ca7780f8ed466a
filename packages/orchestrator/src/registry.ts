import { promises as fs } from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import {
  AssetNameMismatchError,
  AssetsRootNotFoundError,
  DuplicateAssetNameError,
  DuplicateAssetTargetError
} from './errors';
import { parseAssetSource } from './metadata';
import type { AssetDescriptor, AssetPayload } from './types';
import { compareNames } from './utils';

type AssetFileType =
  | {
      kind: 'query';
      commentPrefix: string;
    }
  | {
      kind: 'script';
      commentPrefix: string;
      interpreter: readonly string[];
    };

const NODE_SCRIPT: AssetFileType = { kind: 'script', commentPrefix: '//', interpreter: [process.execPath] };

export const ASSET_FILE_TYPES: Readonly<Record<string, AssetFileType>> = {
  '.sql': { kind: 'query', commentPrefix: '--' },
  '.sh': { kind: 'script', commentPrefix: '#', interpreter: ['bash'] },
  '.js': NODE_SCRIPT,
  '.cjs': NODE_SCRIPT,
  '.mjs': NODE_SCRIPT
};

const ASSET_GLOB = `**/*.{${Object.keys(ASSET_FILE_TYPES)
  .map((extension) => extension.slice(1))
  .join(',')}}`;

export const DEFAULT_ASSETS_DIRNAME = 'assets';

export class AssetRegistry {
  readonly root: string;
  readonly assets: readonly AssetDescriptor[];
  private readonly byName = new Map<string, AssetDescriptor>();
  private readonly byTarget = new Map<string, AssetDescriptor>();

  constructor(root: string, assets: AssetDescriptor[]) {
    this.root = root;
    this.assets = Object.freeze([...assets].sort((left, right) => compareNames(left.name, right.name)));
    for (const asset of this.assets) {
      this.byName.set(asset.name, asset);
      this.byTarget.set(asset.target, asset);
    }
  }

  get size(): number {
    return this.assets.length;
  }

  get(name: string): AssetDescriptor | undefined {
    return this.byName.get(name);
  }

  getByTarget(target: string): AssetDescriptor | undefined {
    return this.byTarget.get(target);
  }
}

export async function findAssetFiles(root: string): Promise<string[]> {
  const cwd = path.resolve(root);
  const matches = await fg(ASSET_GLOB, {
    cwd,
    onlyFiles: true,
    ignore: ['**/node_modules/**']
  });
  return matches
    .filter((relativePath) => !path.basename(relativePath).startsWith('_'))
    .map((relativePath) => path.resolve(cwd, relativePath))
    .sort();
}

export function parseAssetDescriptor(filePath: string, source: string, root: string): AssetDescriptor {
  const extension = path.extname(filePath);
  const fileType = ASSET_FILE_TYPES[extension];
  if (!fileType) {
    throw new Error(`Unsupported asset file type: ${filePath}`);
  }

  const { metadata, entries, body } = parseAssetSource(filePath, source, fileType.commentPrefix);
  const expectedName = path.basename(filePath, extension);
  if (metadata.name !== expectedName) {
    throw new AssetNameMismatchError(filePath, metadata.name, expectedName);
  }

  const table = metadata.table ?? metadata.name;
  const payload: AssetPayload =
    fileType.kind === 'query'
      ? { type: 'query', sql: body }
      : { type: 'executable', path: filePath, command: Object.freeze([...fileType.interpreter, filePath]) };

  const frozenEntries: Record<string, readonly string[]> = {};
  for (const [key, values] of Object.entries(entries)) {
    frozenEntries[key] = Object.freeze([...values]);
  }

  return Object.freeze({
    name: metadata.name,
    schema: metadata.schema,
    table,
    target: `${metadata.schema}.${table}`,
    kind: fileType.kind,
    filePath,
    relativePath: path.relative(root, filePath).split(path.sep).join('/'),
    description: metadata.description ?? null,
    dependencies: Object.freeze(Array.from(new Set(metadata.depends)).sort()),
    declaredDependencies: Object.freeze([...metadata.depends]),
    expectations: Object.freeze({
      columns: Object.freeze([...metadata.columns]),
      nonEmpty: metadata.non_empty ?? false
    }),
    metadata: Object.freeze(frozenEntries),
    payload: Object.freeze(payload)
  }) satisfies AssetDescriptor;
}

export async function readAssetDescriptor(filePath: string, root: string): Promise<AssetDescriptor> {
  const source = await fs.readFile(filePath, 'utf8');
  return parseAssetDescriptor(filePath, source, root);
}

/**
 * Parses every asset file below `root`. The first malformed file, name
 * mismatch or duplicate aborts the scan.
 */
export async function discoverAssets(root: string): Promise<AssetRegistry> {
  const absoluteRoot = path.resolve(root);
  const stats = await fs.stat(absoluteRoot).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new AssetsRootNotFoundError(`Assets directory ${absoluteRoot} does not exist`);
  }

  const byName = new Map<string, AssetDescriptor>();
  const byTarget = new Map<string, AssetDescriptor>();
  for (const filePath of await findAssetFiles(absoluteRoot)) {
    const asset = await readAssetDescriptor(filePath, absoluteRoot);
    const sameName = byName.get(asset.name);
    if (sameName) {
      throw new DuplicateAssetNameError(asset.name, sameName.filePath, asset.filePath);
    }
    const sameTarget = byTarget.get(asset.target);
    if (sameTarget) {
      throw new DuplicateAssetTargetError(asset.target, sameTarget.filePath, asset.filePath);
    }
    byName.set(asset.name, asset);
    byTarget.set(asset.target, asset);
  }

  return new AssetRegistry(absoluteRoot, Array.from(byName.values()));
}

export async function findAssetsRoot(startDir: string = process.cwd(), dirName = DEFAULT_ASSETS_DIRNAME): Promise<string> {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, dirName);
    const stats = await fs.stat(candidate).catch(() => null);
    if (stats?.isDirectory()) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new AssetsRootNotFoundError(`No ${dirName} directory found in ${path.resolve(startDir)} or any parent directory`);
    }
    current = parent;
  }
}
