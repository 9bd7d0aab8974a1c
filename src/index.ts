// src/index.ts - Library entry point

export { Md2Po, md2po, type Md2PoResult, type Md2poRunOptions } from './md2po.js';
export { Po2Md, po2md, type Po2MdResult, type Po2mdRunOptions } from './po2md.js';
export { md2po2md, type Md2po2mdOptions, type Md2po2mdFileResult } from './md2po2md.js';
export {
  mdpo2html,
  renderTranslatedHtml,
  type Mdpo2htmlOptions,
  type Mdpo2htmlResult,
  type Mdpo2htmlRunOptions,
} from './mdpo2html.js';
export {
  buildCatalog,
  buildTranslationMap,
  createCatalog,
  isFuzzy,
  loadCatalog,
  loadCatalogs,
  messageKey,
  parseCatalog,
  saveCatalog,
  type BuildCatalogOptions,
  type Catalog,
  type CatalogItem,
  type TranslationMap,
} from './po/catalog.js';
export * from './markdown/index.js';
export { UsageError, getErrorMessage } from './errorHelpers.js';
export { packageInfo } from './version.js';
export {
  DEFAULT_EXTENSIONS,
  DEFAULT_MARKUP,
  DEFAULT_WRAPWIDTH,
  MARKDOWN_EXTENSIONS,
  type CatalogBuildOptions,
  type CommandAliases,
  type ExtractedMessage,
  type LinkReference,
  type MarkdownExtension,
  type MarkdownSource,
  type MarkupStrings,
  type Md2PoOptions,
  type Po2MdOptions,
} from './types.js';
