export * from './types';
export * from './errors';
export * from './metadata';
export * from './registry';
export * from './graph';
export * from './database';
export * from './adapters';
export * from './checker';
export * from './scheduler';
export * from './checks';
export * from './config';
export * from './logger';
export {
  checkAssets,
  generateDocs,
  listAssets,
  materialize,
  type AssetListing,
  type DocsOptions,
  type MaterializeOptions,
  type OrchestratorOptions
} from './orchestrator';
export {
  DEFAULT_SAMPLE_ROWS,
  collectDocsPages,
  escapeHtml,
  formatCell,
  renderAssetSection,
  renderDocsHtml,
  type AssetDocsPage,
  type GenerateDocsOptions
} from './docs';
