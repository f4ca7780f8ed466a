import { promises as fs } from 'node:fs';
import path from 'node:path';
import { qualifiedName } from '@assetflow/shared';

import type { AssetDatabase, ColumnInfo, QueryRow } from './database';
import { AssetflowError, MissingTableError } from './errors';
import type { AssetRegistry } from './registry';
import type { AssetDescriptor } from './types';
import { compareNames } from './utils';

export const DEFAULT_SAMPLE_ROWS = 10;

const PREFERRED_METADATA_KEYS = ['name', 'schema', 'table', 'description', 'depends'];

export type AssetDocsPage = {
  asset: AssetDescriptor;
  columns: ColumnInfo[];
  rowCount: number;
  sample: QueryRow[];
};

export type GenerateDocsOptions = {
  outPath: string;
  sampleRows?: number;
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'object' && value.toString === Object.prototype.toString) {
    return JSON.stringify(value);
  }
  return String(value);
}

function renderTable(headers: string[], rows: string[][]): string {
  const head = headers.map((header) => `<th>${header}</th>`).join('');
  const body = rows.map((cells) => `      <tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`);
  return [
    '  <table>',
    `    <thead><tr>${head}</tr></thead>`,
    '    <tbody>',
    ...body,
    '    </tbody>',
    '  </table>'
  ].join('\n');
}

function renderMetadata(asset: AssetDescriptor): string {
  const keys = Object.keys(asset.metadata);
  if (keys.length === 0) {
    return '<div class="small">No metadata.</div>';
  }
  const remaining = keys.filter((key) => !PREFERRED_METADATA_KEYS.includes(key)).sort();
  const ordered = [...PREFERRED_METADATA_KEYS.filter((key) => keys.includes(key)), ...remaining];
  const rows = ordered.map((key) => {
    const values = asset.metadata[key] ?? [];
    const rendered =
      key === 'depends'
        ? asset.dependencies.map((dependency) => {
            const escaped = escapeHtml(dependency);
            return `<a href="#${escaped}">${escaped}</a>`;
          }).join(', ')
        : escapeHtml(values.join(', '));
    return [`<code>asset.${escapeHtml(key)}</code>`, rendered];
  });
  return renderTable(['Key', 'Value'], rows);
}

export function renderAssetSection(page: AssetDocsPage): string {
  const { asset } = page;
  const id = escapeHtml(asset.target);
  const description = asset.description
    ? `<p>${escapeHtml(asset.description)}</p>`
    : '<div class="small">No description.</div>';
  const columns =
    page.columns.length > 0
      ? renderTable(
          ['Column', 'Type'],
          page.columns.map((column) => [escapeHtml(column.name), escapeHtml(column.type)])
        )
      : '<div class="small">No columns.</div>';
  const sample =
    page.sample.length > 0
      ? renderTable(
          page.columns.map((column) => escapeHtml(column.name)),
          page.sample.map((row) => page.columns.map((column) => escapeHtml(formatCell(row[column.name]))))
        )
      : '<div class="small">No rows.</div>';

  return [
    `<section id="${id}">`,
    `  <h2>${id}</h2>`,
    `  <div class="small">${escapeHtml(asset.kind)} &middot; ${escapeHtml(asset.relativePath)}</div>`,
    `  ${description}`,
    '  <h3>Metadata</h3>',
    renderMetadata(asset),
    '  <h3>Columns</h3>',
    columns,
    `  <div class="small">Rows: ${page.rowCount}</div>`,
    '  <h3>Sample</h3>',
    sample,
    '</section>'
  ].join('\n');
}

export function renderDocsHtml(pages: AssetDocsPage[]): string {
  const index = pages
    .map((page) => {
      const target = escapeHtml(page.asset.target);
      return `      <li><a href="#${target}">${target}</a></li>`;
    })
    .join('\n');
  return [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1">',
    '  <title>Asset docs</title>',
    '  <style>',
    '    body { font-family: ui-monospace, Menlo, Consolas, monospace; margin: 0; padding: 24px; color: #111; line-height: 1.5 }',
    '    .layout { display: grid; grid-template-columns: 240px 1fr; gap: 24px; align-items: start }',
    '    aside { position: sticky; top: 24px }',
    '    ul { list-style: none; padding: 0 }',
    '    section { background: #fafafa; border: 1px solid #eee; border-radius: 6px; padding: 16px; margin: 0 0 16px }',
    '    table { border-collapse: collapse; width: 100%; margin: 8px 0 16px }',
    '    th, td { text-align: left; padding: 4px 6px; border-bottom: 1px solid #eee; vertical-align: top }',
    '    .small { color: #666; font-size: 12px }',
    '  </style>',
    '</head>',
    '<body>',
    '<div class="layout">',
    '  <aside>',
    '    <div class="small">Assets</div>',
    '    <ul>',
    index,
    '    </ul>',
    '  </aside>',
    '  <main>',
    '    <h1>Asset docs</h1>',
    ...pages.map(renderAssetSection),
    '  </main>',
    '</div>',
    '</body>',
    '</html>',
    ''
  ].join('\n');
}

export async function collectDocsPages(
  registry: AssetRegistry,
  database: AssetDatabase,
  sampleRows = DEFAULT_SAMPLE_ROWS
): Promise<AssetDocsPage[]> {
  const limit = Math.max(0, Math.trunc(sampleRows));
  const pages: AssetDocsPage[] = [];
  for (const asset of [...registry.assets].sort((left, right) => compareNames(left.target, right.target))) {
    if (!(await database.tableExists(asset.schema, asset.table))) {
      throw new MissingTableError(asset.target);
    }
    const columns = await database.listColumns(asset.schema, asset.table);
    const rowCount = await database.countRows(asset.schema, asset.table);
    const sample =
      limit > 0 ? await database.query(`select * from ${qualifiedName(asset.schema, asset.table)} limit ${limit}`) : [];
    pages.push({ asset, columns, rowCount, sample });
  }
  return pages;
}

export async function generateDocs(
  registry: AssetRegistry,
  database: AssetDatabase,
  options: GenerateDocsOptions
): Promise<string> {
  if (registry.size === 0) {
    throw new AssetflowError('ASSETS_EMPTY', 'No assets found.');
  }
  const pages = await collectDocsPages(registry, database, options.sampleRows);
  const outPath = path.resolve(options.outPath);
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, renderDocsHtml(pages), 'utf8');
  return outPath;
}
