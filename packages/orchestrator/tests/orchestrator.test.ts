import assert from 'node:assert/strict';
import { cp, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, it, type TestContext } from 'node:test';

import type { AssetflowConfig } from '../src/config';
import { DuckDbAssetDatabase } from '../src/database';
import { checkAssets, generateDocs, listAssets, materialize } from '../src/orchestrator';
import { createAssetsDir } from './helpers/assetsDir';

const NUMBERS = path.join(__dirname, 'fixtures/numbers');
const SCRIPTED = path.join(__dirname, 'fixtures/scripted');
const QUIET_SCRIPTS = { stdout: null, stderr: null };

async function workspace(t: TestContext): Promise<{ dir: string; config: AssetflowConfig; database: DuckDbAssetDatabase }> {
  const dir = await createAssetsDir(t, {});
  const config: AssetflowConfig = {
    assetsDir: null,
    databasePath: path.join(dir, 'warehouse.duckdb'),
    maxConcurrency: 1,
    logLevel: 'silent'
  };
  return { dir, config, database: new DuckDbAssetDatabase(config.databasePath) };
}

async function filteredValues(database: DuckDbAssetDatabase): Promise<number[]> {
  const rows = await database.query('select value::INTEGER as value from mart.filtered order by value');
  return rows.map((row) => Number(row.value));
}

describe('materialize', () => {
  it('builds every table of a chain', async (t) => {
    const { config, database } = await workspace(t);
    const report = await materialize({ assetsDir: NUMBERS, config });

    assert.equal(report.ok, true);
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status]),
      [
        ['base', 'succeeded'],
        ['doubled', 'succeeded'],
        ['filtered', 'succeeded']
      ]
    );
    assert.deepEqual(await filteredValues(database), [4, 6]);
  });

  it('gives the same tables when run again', async (t) => {
    const { config, database } = await workspace(t);
    await materialize({ assetsDir: NUMBERS, config });
    const second = await materialize({ assetsDir: NUMBERS, config, maxConcurrency: 2 });
    assert.equal(second.ok, true);
    assert.deepEqual(await filteredValues(database), [4, 6]);
    assert.equal(await database.countRows('raw', 'base'), 3);
  });

  it('leaves downstream tables unbuilt when an asset fails', async (t) => {
    const { dir, config, database } = await workspace(t);
    const assetsDir = path.join(dir, 'assets');
    await cp(NUMBERS, assetsDir, { recursive: true });
    await writeFile(
      path.join(assetsDir, 'doubled.sql'),
      '-- asset.name = doubled\n-- asset.schema = mart\n-- asset.depends = raw.base\nselect missing_column from raw.base\n',
      'utf8'
    );

    const report = await materialize({ assetsDir, config });
    assert.equal(report.ok, false);
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status]),
      [
        ['base', 'succeeded'],
        ['doubled', 'failed-execution'],
        ['filtered', 'skipped-dependency-failed']
      ]
    );
    assert.equal(await database.tableExists('raw', 'base'), true);
    assert.equal(await database.tableExists('mart', 'doubled'), false);
    assert.equal(await database.tableExists('mart', 'filtered'), false);
  });

  it('keeps the previous table when its query fails on a later run', async (t) => {
    const { dir, config, database } = await workspace(t);
    const assetsDir = path.join(dir, 'assets');
    await cp(NUMBERS, assetsDir, { recursive: true });
    assert.equal((await materialize({ assetsDir, config })).ok, true);

    await writeFile(
      path.join(assetsDir, 'doubled.sql'),
      "-- asset.name = doubled\n-- asset.schema = mart\n-- asset.depends = raw.base\nselect error('source unavailable') as value from raw.base\n",
      'utf8'
    );
    const report = await materialize({ assetsDir, config });
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status]),
      [
        ['base', 'succeeded'],
        ['doubled', 'failed-execution'],
        ['filtered', 'skipped-dependency-failed']
      ]
    );
    assert.equal(await database.countRows('mart', 'doubled'), 3);
    assert.deepEqual(await filteredValues(database), [4, 6]);
  });

  it('runs only the selection and its upstream', async (t) => {
    const { config, database } = await workspace(t);
    const report = await materialize({ assetsDir: NUMBERS, config, assets: ['mart.doubled'] });
    assert.deepEqual(
      report.results.map((result) => result.name),
      ['base', 'doubled']
    );
    assert.equal(await database.tableExists('mart', 'filtered'), false);
  });

  it('hands the database file to script assets', async (t) => {
    const { config, database } = await workspace(t);
    const report = await materialize({ assetsDir: SCRIPTED, config, script: QUIET_SCRIPTS });
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status]),
      [
        ['seed', 'succeeded'],
        ['total', 'succeeded']
      ]
    );
    const rows = await database.query('select total from mart.total');
    assert.deepEqual(rows, [{ total: 15 }]);
  });
});

describe('checkAssets', () => {
  it('validates without creating tables', async (t) => {
    const { config, database } = await workspace(t);
    const report = await checkAssets({ assetsDir: NUMBERS, config });
    assert.equal(report.ok, true);
    assert.equal(report.assets, 3);
    assert.equal(await database.tableExists('raw', 'base'), false);
  });
});

describe('listAssets', () => {
  it('lists assets by name', async (t) => {
    const { config } = await workspace(t);
    const listing = await listAssets({ assetsDir: NUMBERS, config });
    assert.equal(listing.root, NUMBERS);
    assert.deepEqual(listing.assets[0], {
      name: 'base',
      target: 'raw.base',
      kind: 'query',
      relativePath: 'base.sql',
      description: 'The numbers one to three',
      dependencies: []
    });
    assert.deepEqual(
      listing.assets.map((asset) => [asset.name, asset.dependencies]),
      [
        ['base', []],
        ['doubled', ['raw.base']],
        ['filtered', ['mart.doubled']]
      ]
    );
  });
});

describe('generateDocs', () => {
  it('documents materialized tables', async (t) => {
    const { dir, config } = await workspace(t);
    await materialize({ assetsDir: NUMBERS, config });
    const outPath = await generateDocs({ assetsDir: NUMBERS, config, outPath: path.join(dir, 'docs/index.html') });
    const html = await readFile(outPath, 'utf8');
    assert.ok(html.includes('      <li><a href="#mart.filtered">mart.filtered</a></li>\n'));
    assert.ok(html.includes('  <div class="small">Rows: 2</div>\n'));
  });
});
