import { z } from 'zod';

const BOOLEAN_SPELLINGS: ReadonlyMap<string, boolean> = new Map([
  ['1', true],
  ['true', true],
  ['yes', true],
  ['on', true],
  ['0', false],
  ['false', false],
  ['no', false],
  ['off', false]
]);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  /** Prefix of the error header, usually the program name. */
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(context: string, issues: string[]) {
    super([`[${context}] Invalid environment configuration`, ...issues.map((issue) => `  - ${issue}`)].join('\n'));
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

/** Parses `env` with `schema`; every invalid variable is listed in one error. */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: LoadEnvConfigOptions = {}): T {
  const result = schema.safeParse({ ...(options.env ?? process.env) });
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`
  );
  throw new EnvConfigError(options.context ?? 'assetflow', issues);
}

type VarOptions<T> = {
  defaultValue?: T;
  /** Name used in messages; defaults to the variable's key. */
  description?: string;
};

function nameOf(ctx: z.RefinementCtx, description: string | undefined): string {
  const key = ctx.path[ctx.path.length - 1];
  return description ?? (key === undefined ? 'value' : String(key));
}

function reject(ctx: z.RefinementCtx, message: string): typeof z.NEVER {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message });
  return z.NEVER;
}

/** Unset and blank values both fall back to `defaultValue`. */
function envVar<T>(options: VarOptions<T>, parse: (value: string, name: string, ctx: z.RefinementCtx) => T) {
  return z
    .string()
    .optional()
    .transform((value, ctx): T | undefined => {
      const trimmed = value?.trim() ?? '';
      if (trimmed.length === 0) {
        return options.defaultValue;
      }
      return parse(trimmed, nameOf(ctx, options.description), ctx);
    });
}

export function booleanVar(options: VarOptions<boolean> = {}) {
  return envVar(options, (value, name, ctx) => {
    const parsed = BOOLEAN_SPELLINGS.get(value.toLowerCase());
    if (parsed !== undefined) {
      return parsed;
    }
    const accepted = Array.from(BOOLEAN_SPELLINGS.keys(), (spelling) => `'${spelling}'`).join(', ');
    return reject(ctx, `Invalid ${name}. Accepted boolean values: ${accepted}`);
  });
}

export type IntegerVarOptions = VarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options: IntegerVarOptions = {}) {
  return envVar(options, (value, name, ctx) => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed)) {
      return reject(ctx, `Expected ${name} to be an integer`);
    }
    if (options.min !== undefined && parsed < options.min) {
      return reject(ctx, `${name} must be >= ${options.min}`);
    }
    if (options.max !== undefined && parsed > options.max) {
      return reject(ctx, `${name} must be <= ${options.max}`);
    }
    return parsed;
  });
}

export type StringVarOptions = VarOptions<string> & {
  lowercase?: boolean;
  pattern?: RegExp;
};

export function stringVar(options: StringVarOptions = {}) {
  const defaultValue = options.lowercase ? options.defaultValue?.toLowerCase() : options.defaultValue;
  return envVar({ defaultValue, description: options.description }, (value, name, ctx) => {
    const normalized = options.lowercase ? value.toLowerCase() : value;
    if (options.pattern && !options.pattern.test(normalized)) {
      return reject(ctx, `${name} does not match expected pattern`);
    }
    return normalized;
  });
}
