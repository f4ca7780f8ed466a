import { randomUUID } from 'node:crypto';

import type { AdapterRegistry, ExecutionOutcome } from './adapters/types';
import { checkMaterialization, type CheckOutcome } from './checker';
import type { AssetDatabase } from './database';
import { describeError } from './errors';
import type { AssetGraph } from './graph';
import type { Logger } from './logger';
import type { AssetDescriptor, AssetRunResult, AssetRunStatus, AssetStatusChange, RunReport } from './types';
import { FAILED_STATUSES } from './types';
import { compareNames } from './utils';

export type MaterializationCheck = (asset: AssetDescriptor, database: AssetDatabase) => Promise<CheckOutcome>;

export type ScheduleOptions = {
  database: AssetDatabase;
  adapters: AdapterRegistry;
  logger: Logger;
  /** In-flight asset limit; 1 runs everything sequentially. */
  maxConcurrency?: number;
  /** Aborting lets running assets finish and cancels the rest. */
  signal?: AbortSignal;
  onStatusChange?: (change: AssetStatusChange) => void;
  check?: MaterializationCheck;
  runId?: string;
};

type StatusDetail = Pick<AssetRunResult, 'error' | 'blockedBy'>;

/**
 * Executes every node of `graph` at most once, producers first. A failed
 * node takes its descendants with it and nothing else.
 */
export async function runSchedule(graph: AssetGraph, options: ScheduleOptions): Promise<RunReport> {
  const runId = options.runId ?? randomUUID();
  const maxConcurrency = Math.max(1, Math.trunc(options.maxConcurrency ?? 1));
  const check = options.check ?? checkMaterialization;
  const logger = options.logger.child({ runId });
  const startedAt = new Date();

  const results = new Map<string, AssetRunResult>();
  const startTimes = new Map<string, number>();
  for (const name of graph.order) {
    results.set(name, { name, target: graph.node(name).asset.target, status: 'pending' });
  }
  const remainingDependencies = new Map(graph.nodes.map((node) => [node.name, node.dependencies.length]));
  const ready = graph.nodes.filter((node) => node.dependencies.length === 0).map((node) => node.name);
  const inFlight = new Map<string, Promise<void>>();

  const statusOf = (name: string): AssetRunStatus => results.get(name)?.status ?? 'pending';

  const transition = (name: string, to: AssetRunStatus, detail: StatusDetail = {}): void => {
    const current = results.get(name);
    if (!current) {
      return;
    }
    const from = current.status;
    const next: AssetRunResult = { ...current, ...detail, status: to };
    const now = Date.now();
    if (to === 'running') {
      startTimes.set(name, now);
      next.startedAt = new Date(now).toISOString();
    } else if (from === 'running') {
      next.finishedAt = new Date(now).toISOString();
      next.durationMs = now - (startTimes.get(name) ?? now);
    }
    results.set(name, next);

    const fields = { asset: name, target: next.target, status: to, ...detail };
    if (FAILED_STATUSES.has(to)) {
      logger.error(fields, 'Asset failed');
    } else if (to === 'skipped-dependency-failed' || to === 'cancelled') {
      logger.warn(fields, 'Asset not run');
    } else if (to === 'running') {
      logger.info(fields, 'Asset started');
    } else {
      logger.info({ ...fields, durationMs: next.durationMs }, 'Asset materialized');
    }

    if (options.onStatusChange) {
      try {
        options.onStatusChange({ name, target: next.target, from, to, error: detail.error });
      } catch (error) {
        logger.warn({ asset: name, err: error }, 'Status listener threw');
      }
    }
  };

  const skipDescendants = (name: string, status: AssetRunStatus): void => {
    for (const descendant of graph.descendantsOf(name)) {
      if (statusOf(descendant) === 'pending') {
        transition(descendant, 'skipped-dependency-failed', {
          blockedBy: name,
          error: `Upstream asset ${name} ended as ${status}`
        });
      }
    }
  };

  const complete = (name: string, status: AssetRunStatus, error?: string): void => {
    transition(name, status, error === undefined ? {} : { error });
    if (status !== 'succeeded') {
      skipDescendants(name, status);
      return;
    }
    for (const dependent of graph.dependentsOf(name)) {
      const remaining = (remainingDependencies.get(dependent) ?? 0) - 1;
      remainingDependencies.set(dependent, remaining);
      if (remaining === 0 && statusOf(dependent) === 'pending') {
        ready.push(dependent);
      }
    }
  };

  const execute = async (name: string): Promise<void> => {
    const { asset } = graph.node(name);
    transition(name, 'running');

    let outcome: ExecutionOutcome;
    try {
      outcome = await options.adapters[asset.kind].execute(asset, options.database);
    } catch (error) {
      outcome = { ok: false, error: describeError(error) };
    }
    if (!outcome.ok) {
      complete(name, 'failed-execution', outcome.error);
      return;
    }

    const checked = await check(asset, options.database).catch(
      (error: unknown): CheckOutcome => ({ ok: false, error: describeError(error) })
    );
    if (checked.ok) {
      complete(name, 'succeeded');
    } else {
      complete(name, 'failed-check', checked.error);
    }
  };

  logger.info({ assets: graph.size, maxConcurrency }, 'Run started');

  for (;;) {
    if (!options.signal?.aborted) {
      ready.sort(compareNames);
      while (ready.length > 0 && inFlight.size < maxConcurrency) {
        const name = ready.shift();
        if (name === undefined) {
          break;
        }
        const task = execute(name).finally(() => {
          inFlight.delete(name);
        });
        inFlight.set(name, task);
      }
    }
    if (inFlight.size === 0) {
      break;
    }
    await Promise.race(inFlight.values());
  }

  const cancelled = options.signal?.aborted ?? false;
  for (const name of graph.order) {
    if (statusOf(name) === 'pending') {
      transition(name, 'cancelled', { error: 'Run cancelled before the asset started' });
    }
  }

  const ordered = graph.order.map((name) => results.get(name)).filter((result): result is AssetRunResult => Boolean(result));
  const failures = ordered.filter((result) => result.status !== 'succeeded');
  const report: RunReport = {
    runId,
    startedAt: startedAt.toISOString(),
    finishedAt: new Date().toISOString(),
    ok: failures.length === 0,
    cancelled,
    results: ordered,
    failures
  };

  logger.info(
    { ok: report.ok, succeeded: ordered.length - failures.length, failed: failures.length, cancelled },
    'Run finished'
  );
  return report;
}
