import { QueryAdapter } from './query';
import { ScriptAdapter, type ScriptAdapterOptions } from './script';
import type { AdapterRegistry } from './types';

export * from './types';
export { QueryAdapter } from './query';
export { ScriptAdapter, runScript } from './script';
export type { ScriptAdapterOptions, ScriptResult, RunScriptOptions } from './script';

export function createDefaultAdapters(options: { script?: ScriptAdapterOptions } = {}): AdapterRegistry {
  return {
    query: new QueryAdapter(),
    script: new ScriptAdapter(options.script)
  };
}
