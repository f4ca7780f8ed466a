import type { AssetDatabase } from '../database';
import type { AssetDescriptor, AssetKind } from '../types';

export type ExecutionOutcome = { ok: true } | { ok: false; error: string };

/**
 * Runs one asset kind. The scheduler only ever talks to this capability, so a
 * new kind needs an implementation here and nothing else.
 */
export interface AssetExecutionAdapter {
  readonly kind: AssetKind;
  execute(asset: AssetDescriptor, database: AssetDatabase): Promise<ExecutionOutcome>;
}

export type AdapterRegistry = Readonly<Record<AssetKind, AssetExecutionAdapter>>;
