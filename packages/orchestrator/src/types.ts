export type AssetKind = 'query' | 'script';

export type AssetPayload =
  | {
      type: 'query';
      sql: string;
    }
  | {
      type: 'executable';
      path: string;
      command: readonly string[];
    };

export type AssetExpectations = {
  columns: readonly string[];
  nonEmpty: boolean;
};

export type AssetDescriptor = {
  readonly name: string;
  readonly schema: string;
  readonly table: string;
  /** `schema.table` */
  readonly target: string;
  readonly kind: AssetKind;
  readonly filePath: string;
  readonly relativePath: string;
  readonly description: string | null;
  /** Sorted and deduplicated. */
  readonly dependencies: readonly string[];
  /** As written in the file, repeats included. */
  readonly declaredDependencies: readonly string[];
  readonly expectations: AssetExpectations;
  readonly metadata: Readonly<Record<string, readonly string[]>>;
  readonly payload: AssetPayload;
};

export type AssetRunStatus =
  | 'pending'
  | 'running'
  | 'succeeded'
  | 'failed-execution'
  | 'failed-check'
  | 'skipped-dependency-failed'
  | 'cancelled';

export type AssetRunResult = {
  name: string;
  target: string;
  status: AssetRunStatus;
  error?: string;
  blockedBy?: string;
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
};

export type RunReport = {
  runId: string;
  startedAt: string;
  finishedAt: string;
  ok: boolean;
  cancelled: boolean;
  /** Topological order. */
  results: AssetRunResult[];
  failures: AssetRunResult[];
};

export type AssetStatusChange = {
  name: string;
  target: string;
  from: AssetRunStatus;
  to: AssetRunStatus;
  error?: string;
};

export const FAILED_STATUSES: ReadonlySet<AssetRunStatus> = new Set([
  'failed-execution',
  'failed-check'
]);
