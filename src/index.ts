export * from './types.js';
export { extractTags, renderTagSections, humanizeName } from './tag-extractor.js';
export { buildFrontMatter, renderFrontMatter, stripMarkup } from './metadata-mapper.js';
export { translateBBCode, type TranslateResult } from './bbcode.js';
export {
  buildReferenceIndex,
  resolveReferences,
  resolveRelationItem,
  normalizeTitle,
  slugifyTitle,
  formatWikiLink,
  type IndexOptions,
  type ResolveResult
} from './references.js';
export { AssetPipeline, type AssetOptions } from './assets.js';
export { convertDocument, type ConversionContext } from './converter.js';
export { loadExport, toSourceDocument, type LoadResult } from './loader.js';
export { runExport, type ExportSummary, type SkippedDocument } from './walker.js';
export { loadConfig, parseConfig, type ConverterConfig } from './config.js';
export { Diagnostics, type ConversionWarning, type WarningKind } from './diagnostics.js';
export { createLogger, createMemoryLogger, type Logger } from './logger.js';
export { ConfigError, DocumentConversionError, ExportAbortError } from './errors.js';
