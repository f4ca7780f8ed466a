import { booleanVar } from '@assetflow/shared';
import { z } from 'zod';

import { AssetParseError } from './errors';

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TABLE_REFERENCE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*\.[A-Za-z_][A-Za-z0-9_]*$/;
const METADATA_LINE_PATTERN = /^asset\.(?<key>[A-Za-z_][A-Za-z0-9_]*)\s*=\s*(?<value>.*)$/;
const METADATA_MARKER = 'asset.';

const SINGLE_VALUE_KEYS = ['name', 'schema', 'table', 'description', 'columns', 'non_empty'] as const;

const identifier = (key: string) =>
  z
    .string({ required_error: `asset.${key} is required` })
    .regex(IDENTIFIER_PATTERN, `asset.${key} must match ${IDENTIFIER_PATTERN.source}`);

export const assetMetadataSchema = z.object({
  name: identifier('name'),
  schema: identifier('schema'),
  table: identifier('table').optional(),
  description: z.string().min(1, 'asset.description must not be empty').optional(),
  depends: z
    .array(z.string().regex(TABLE_REFERENCE_PATTERN, 'asset.depends entries must be schema.table'))
    .default([]),
  columns: z.array(z.string().min(1)).default([]),
  non_empty: booleanVar({ defaultValue: false, description: 'asset.non_empty' })
});

export type AssetMetadata = z.infer<typeof assetMetadataSchema>;

export type MetadataEntries = Record<string, string[]>;

export type ParsedAssetSource = {
  metadata: AssetMetadata;
  entries: MetadataEntries;
  /** Everything after the leading comment block. */
  body: string;
};

export type MetadataBlock = {
  lines: string[];
  body: string;
};

export function extractMetadataBlock(source: string, commentPrefix: string): MetadataBlock {
  const sourceLines = source.split(/\r?\n/);
  const lines: string[] = [];
  let index = 0;
  if (sourceLines[0]?.startsWith('#!')) {
    index = 1;
  }
  for (; index < sourceLines.length; index += 1) {
    const stripped = sourceLines[index].trimStart();
    if (stripped.length === 0) {
      continue;
    }
    if (!stripped.startsWith(commentPrefix)) {
      break;
    }
    const content = stripped.slice(commentPrefix.length).trim();
    if (content.length > 0) {
      lines.push(content);
    }
  }
  return {
    lines,
    body: sourceLines.slice(index).join('\n').trim()
  };
}

export function parseMetadataLines(lines: string[], filePath: string): MetadataEntries {
  const entries: MetadataEntries = {};
  for (const line of lines) {
    if (!line.includes(METADATA_MARKER)) {
      continue;
    }
    const match = METADATA_LINE_PATTERN.exec(line);
    const key = match?.groups?.key;
    if (!match || !key) {
      throw new AssetParseError(filePath, `Invalid asset metadata line in ${filePath}: ${line}`);
    }
    const value = (match.groups?.value ?? '').trim();
    (entries[key] ??= []).push(value);
  }
  return entries;
}

export function splitList(values: string[] | undefined): string[] {
  if (!values) {
    return [];
  }
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

export function parseAssetSource(filePath: string, source: string, commentPrefix: string): ParsedAssetSource {
  const block = extractMetadataBlock(source, commentPrefix);
  if (block.lines.length === 0) {
    throw new AssetParseError(filePath, `Missing asset metadata in ${filePath}`);
  }
  const entries = parseMetadataLines(block.lines, filePath);

  for (const key of SINGLE_VALUE_KEYS) {
    const values = entries[key];
    if (values && values.length > 1) {
      throw new AssetParseError(filePath, `asset.${key} must appear once in ${filePath}`);
    }
  }

  const result = assetMetadataSchema.safeParse({
    name: entries.name?.[0],
    schema: entries.schema?.[0],
    table: entries.table?.[0],
    description: entries.description?.[0],
    depends: splitList(entries.depends),
    columns: splitList(entries.columns),
    non_empty: entries.non_empty?.[0]
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new AssetParseError(filePath, `Invalid asset metadata in ${filePath}`, issues);
  }

  return {
    metadata: result.data,
    entries,
    body: block.body
  };
}
