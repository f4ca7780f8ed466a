export class AssetflowError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'AssetflowError';
    this.code = code;
  }
}

export class AssetParseError extends AssetflowError {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, message: string, issues: string[] = []) {
    super('ASSET_PARSE_FAILED', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'AssetParseError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

export class AssetNameMismatchError extends AssetflowError {
  readonly filePath: string;
  readonly declaredName: string;
  readonly expectedName: string;

  constructor(filePath: string, declaredName: string, expectedName: string) {
    super(
      'ASSET_NAME_MISMATCH',
      `Asset name "${declaredName}" in ${filePath} does not match file name "${expectedName}"`
    );
    this.name = 'AssetNameMismatchError';
    this.filePath = filePath;
    this.declaredName = declaredName;
    this.expectedName = expectedName;
  }
}

export class DuplicateAssetNameError extends AssetflowError {
  readonly assetName: string;
  readonly files: [string, string];

  constructor(assetName: string, firstFile: string, secondFile: string) {
    super('ASSET_DUPLICATE_NAME', `Duplicate asset name "${assetName}" in ${firstFile} and ${secondFile}`);
    this.name = 'DuplicateAssetNameError';
    this.assetName = assetName;
    this.files = [firstFile, secondFile];
  }
}

export class DuplicateAssetTargetError extends AssetflowError {
  readonly target: string;
  readonly files: [string, string];

  constructor(target: string, firstFile: string, secondFile: string) {
    super('ASSET_DUPLICATE_TARGET', `Duplicate target table ${target} declared by ${firstFile} and ${secondFile}`);
    this.name = 'DuplicateAssetTargetError';
    this.target = target;
    this.files = [firstFile, secondFile];
  }
}

export type AssetGraphErrorReason = 'unresolved_dependency' | 'cycle_detected';

export type AssetGraphErrorDetail = {
  message: string;
  assetName?: string;
  dependency?: string;
  cycle?: string[];
};

export class AssetGraphError extends AssetflowError {
  readonly reason: AssetGraphErrorReason;
  readonly detail: AssetGraphErrorDetail;

  constructor(reason: AssetGraphErrorReason, detail: AssetGraphErrorDetail) {
    super('ASSET_GRAPH_INVALID', detail.message);
    this.name = 'AssetGraphError';
    this.reason = reason;
    this.detail = detail;
  }
}

export class UnknownAssetError extends AssetflowError {
  readonly names: string[];

  constructor(names: string[]) {
    super('ASSET_UNKNOWN', `Unknown assets: ${names.join(', ')}`);
    this.name = 'UnknownAssetError';
    this.names = names;
  }
}

export class AssetsRootNotFoundError extends AssetflowError {
  constructor(message: string) {
    super('ASSETS_ROOT_NOT_FOUND', message);
    this.name = 'AssetsRootNotFoundError';
  }
}

export class MissingTableError extends AssetflowError {
  readonly target: string;

  constructor(target: string) {
    super('ASSET_TABLE_MISSING', `Missing table ${target}. Run \`assetflow materialize\` first.`);
    this.name = 'MissingTableError';
    this.target = target;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
