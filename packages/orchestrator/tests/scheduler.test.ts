import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';

import type { AssetExecutionAdapter, ExecutionOutcome } from '../src/adapters/types';
import type { AssetDatabase } from '../src/database';
import { buildDependencyGraph } from '../src/graph';
import { createLogger } from '../src/logger';
import { runSchedule, type ScheduleOptions } from '../src/scheduler';
import type { AssetDescriptor, AssetKind, AssetStatusChange } from '../src/types';
import { MemoryDatabase, queryAsset } from './helpers/memoryDatabase';

type Behaviour = 'fail' | 'throw' | 'noop';

class RecordingAdapter implements AssetExecutionAdapter {
  readonly kind: AssetKind;
  readonly calls: string[] = [];
  readonly behaviours = new Map<string, Behaviour>();
  active = 0;
  maxActive = 0;
  delayMs = 0;

  constructor(kind: AssetKind = 'query') {
    this.kind = kind;
  }

  async execute(asset: AssetDescriptor, database: AssetDatabase): Promise<ExecutionOutcome> {
    this.calls.push(asset.name);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) {
        await delay(this.delayMs);
      }
      const behaviour = this.behaviours.get(asset.name);
      if (behaviour === 'throw') {
        throw new Error('adapter exploded');
      }
      if (behaviour === 'fail') {
        return { ok: false, error: `boom ${asset.name}` };
      }
      if (behaviour !== 'noop') {
        await database.replaceTableAsSelect(asset.schema, asset.table, 'select 1 as value');
      }
      return { ok: true };
    } finally {
      this.active -= 1;
    }
  }
}

const logger = createLogger('silent');

async function schedule(
  assets: AssetDescriptor[],
  adapter: RecordingAdapter,
  options: Partial<ScheduleOptions> = {}
) {
  const database = new MemoryDatabase();
  const graph = await buildDependencyGraph(assets, database);
  return runSchedule(graph, {
    database,
    adapters: { query: adapter, script: new RecordingAdapter('script') },
    logger,
    ...options
  });
}

const diamondWithBranch = () => [
  queryAsset('a'),
  queryAsset('b', ['raw.a']),
  queryAsset('c', ['raw.a']),
  queryAsset('d', ['raw.b', 'raw.c']),
  queryAsset('x'),
  queryAsset('e', ['raw.x'])
];

describe('runSchedule', () => {
  it('runs every asset once in dependency order', async () => {
    const adapter = new RecordingAdapter();
    const report = await schedule(diamondWithBranch(), adapter, { runId: 'run-1' });
    assert.equal(report.runId, 'run-1');
    assert.equal(report.ok, true);
    assert.equal(report.cancelled, false);
    assert.deepEqual(adapter.calls, ['a', 'b', 'c', 'd', 'x', 'e']);
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status]),
      [
        ['a', 'succeeded'],
        ['b', 'succeeded'],
        ['c', 'succeeded'],
        ['d', 'succeeded'],
        ['x', 'succeeded'],
        ['e', 'succeeded']
      ]
    );
    assert.deepEqual(report.failures, []);
    assert.equal(typeof report.results[0].durationMs, 'number');
  });

  it('skips only the descendants of a failed asset', async () => {
    const adapter = new RecordingAdapter();
    adapter.behaviours.set('b', 'fail');
    const report = await schedule(diamondWithBranch(), adapter);

    assert.equal(report.ok, false);
    assert.deepEqual(adapter.calls, ['a', 'b', 'c', 'x', 'e']);
    const byName = new Map(report.results.map((result) => [result.name, result]));
    assert.equal(byName.get('b')?.status, 'failed-execution');
    assert.equal(byName.get('b')?.error, 'boom b');
    assert.equal(byName.get('c')?.status, 'succeeded');
    assert.equal(byName.get('e')?.status, 'succeeded');
    assert.deepEqual(
      { status: byName.get('d')?.status, blockedBy: byName.get('d')?.blockedBy, error: byName.get('d')?.error },
      { status: 'skipped-dependency-failed', blockedBy: 'b', error: 'Upstream asset b ended as failed-execution' }
    );
    assert.deepEqual(
      report.failures.map((result) => result.name),
      ['b', 'd']
    );
  });

  it('records an adapter exception as an execution failure', async () => {
    const adapter = new RecordingAdapter();
    adapter.behaviours.set('a', 'throw');
    const report = await schedule([queryAsset('a'), queryAsset('b', ['raw.a'])], adapter);
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status, result.error]),
      [
        ['a', 'failed-execution', 'adapter exploded'],
        ['b', 'skipped-dependency-failed', 'Upstream asset a ended as failed-execution']
      ]
    );
  });

  it('fails the check when the asset did not create its table', async () => {
    const adapter = new RecordingAdapter();
    adapter.behaviours.set('a', 'noop');
    const report = await schedule([queryAsset('a'), queryAsset('b', ['raw.a'])], adapter);
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status, result.error]),
      [
        ['a', 'failed-check', 'Asset a did not create raw.a'],
        ['b', 'skipped-dependency-failed', 'Upstream asset a ended as failed-check']
      ]
    );
    assert.deepEqual(adapter.calls, ['a']);
  });

  it('fails the check when declared columns are missing', async () => {
    const adapter = new RecordingAdapter();
    const report = await schedule([queryAsset('a', [], { columns: ['value', 'label'] })], adapter);
    assert.equal(report.results[0].status, 'failed-check');
    assert.equal(report.results[0].error, 'raw.a is missing declared columns: label');
  });

  it('uses a custom check when given one', async () => {
    const adapter = new RecordingAdapter();
    const report = await schedule([queryAsset('a')], adapter, {
      check: async (asset) => ({ ok: false, error: `rejected ${asset.target}` })
    });
    assert.equal(report.results[0].status, 'failed-check');
    assert.equal(report.results[0].error, 'rejected raw.a');
  });

  it('keeps at most maxConcurrency assets in flight', async () => {
    const assets = () => [queryAsset('a'), queryAsset('b'), queryAsset('c'), queryAsset('d', ['raw.a'])];

    const parallel = new RecordingAdapter();
    parallel.delayMs = 10;
    const report = await schedule(assets(), parallel, { maxConcurrency: 2 });
    assert.equal(report.ok, true);
    assert.equal(parallel.maxActive, 2);
    assert.equal(parallel.calls.length, 4);

    const sequential = new RecordingAdapter();
    sequential.delayMs = 5;
    await schedule(assets(), sequential, { maxConcurrency: 1 });
    assert.equal(sequential.maxActive, 1);
    assert.deepEqual(sequential.calls, ['a', 'b', 'c', 'd']);
  });

  it('lets running assets finish and cancels the rest on abort', async () => {
    const controller = new AbortController();
    const adapter = new RecordingAdapter();
    const report = await schedule([queryAsset('a'), queryAsset('b'), queryAsset('c', ['raw.a'])], adapter, {
      signal: controller.signal,
      onStatusChange: (change) => {
        if (change.name === 'a' && change.to === 'running') {
          controller.abort();
        }
      }
    });

    assert.equal(report.cancelled, true);
    assert.equal(report.ok, false);
    assert.deepEqual(adapter.calls, ['a']);
    assert.deepEqual(
      report.results.map((result) => [result.name, result.status]),
      [
        ['a', 'succeeded'],
        ['b', 'cancelled'],
        ['c', 'cancelled']
      ]
    );
    assert.equal(report.results[1].error, 'Run cancelled before the asset started');
  });

  it('starts nothing when already aborted', async () => {
    const adapter = new RecordingAdapter();
    const report = await schedule([queryAsset('a')], adapter, { signal: AbortSignal.abort() });
    assert.deepEqual(adapter.calls, []);
    assert.equal(report.results[0].status, 'cancelled');
  });

  it('reports status transitions and survives a throwing listener', async () => {
    const changes: AssetStatusChange[] = [];
    const report = await schedule([queryAsset('a')], new RecordingAdapter(), {
      onStatusChange: (change) => {
        changes.push(change);
        throw new Error('listener failed');
      }
    });
    assert.equal(report.ok, true);
    assert.deepEqual(
      changes.map((change) => [change.from, change.to]),
      [
        ['pending', 'running'],
        ['running', 'succeeded']
      ]
    );
  });

  it('returns an empty successful report for an empty graph', async () => {
    const report = await schedule([], new RecordingAdapter());
    assert.equal(report.ok, true);
    assert.deepEqual(report.results, []);
  });
});
