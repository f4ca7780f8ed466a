import { spawn } from 'node:child_process';
import path from 'node:path';

import type { AssetDatabase } from '../database';
import { describeError } from '../errors';
import type { AssetDescriptor } from '../types';
import type { AssetExecutionAdapter, ExecutionOutcome } from './types';

const STDERR_TAIL_LENGTH = 2_000;

export type ScriptResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderrTail: string;
  spawnError?: string;
};

export type RunScriptOptions = {
  env: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: NodeJS.WritableStream | null;
  stderr?: NodeJS.WritableStream | null;
};

export function runScript(command: readonly string[], options: RunScriptOptions): Promise<ScriptResult> {
  const [executable, ...args] = command;
  return new Promise((resolve) => {
    let stderrTail = '';
    let spawnError: string | undefined;

    const child = spawn(executable, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    child.stdout.on('data', (chunk: Buffer) => {
      options.stdout?.write(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      options.stderr?.write(chunk);
      stderrTail = `${stderrTail}${chunk.toString()}`.slice(-STDERR_TAIL_LENGTH);
    });

    child.on('error', (err) => {
      spawnError = err.message;
    });

    child.on('close', (code, signal) => {
      resolve({ exitCode: code, signal, stderrTail: stderrTail.trim(), spawnError });
    });
  });
}

export type ScriptAdapterOptions = {
  /** Base environment for scripts; defaults to the orchestrator's own. */
  env?: NodeJS.ProcessEnv;
  /** Passthrough targets for script output; `null` discards it. */
  stdout?: NodeJS.WritableStream | null;
  stderr?: NodeJS.WritableStream | null;
};

/**
 * Runs a self-materializing executable with `DB_PATH`, `SCHEMA` and `TABLE`
 * in its environment. Only the exit status is interpreted.
 */
export class ScriptAdapter implements AssetExecutionAdapter {
  readonly kind = 'script';
  private readonly env: NodeJS.ProcessEnv;
  private readonly stdout: NodeJS.WritableStream | null;
  private readonly stderr: NodeJS.WritableStream | null;

  constructor(options: ScriptAdapterOptions = {}) {
    this.env = options.env ?? process.env;
    this.stdout = options.stdout === undefined ? process.stdout : options.stdout;
    this.stderr = options.stderr === undefined ? process.stderr : options.stderr;
  }

  async execute(asset: AssetDescriptor, database: AssetDatabase): Promise<ExecutionOutcome> {
    const { payload } = asset;
    if (payload.type !== 'executable') {
      return { ok: false, error: `Asset ${asset.name} has no executable to run` };
    }

    try {
      await database.ensureSchema(asset.schema);
    } catch (error) {
      return { ok: false, error: `Failed to create schema ${asset.schema}: ${describeError(error)}` };
    }

    const env: NodeJS.ProcessEnv = {
      ...this.env,
      DB_PATH: database.location,
      SCHEMA: asset.schema,
      TABLE: asset.table
    };
    const result = await database.withExclusiveAccess(() =>
      runScript(payload.command, {
        env,
        cwd: path.dirname(payload.path),
        stdout: this.stdout,
        stderr: this.stderr
      })
    );

    if (result.spawnError) {
      return { ok: false, error: `Failed to start ${payload.command[0]}: ${result.spawnError}` };
    }
    if (result.exitCode === 0) {
      return { ok: true };
    }
    const status = result.exitCode === null ? `was terminated by ${result.signal ?? 'a signal'}` : `exited with code ${result.exitCode}`;
    const detail = result.stderrTail ? `: ${result.stderrTail}` : '';
    return { ok: false, error: `Script ${asset.relativePath} ${status}${detail}` };
  }
}
