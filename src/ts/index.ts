// index.ts - Public API

export * from './core/catalogTypes.js';
export {
  CatalogConfigSchema,
  ConfigError,
  DEFAULT_CONFIG_FILE,
  ReportFormatSchema,
  resolveCatalogConfig,
  type CatalogConfig,
  type CatalogConfigOverrides,
  type ResolveOptions,
} from './core/configSchema.js';
export { loadCatalog, LoadError, type CatalogLoadResult } from './initialization/catalogLoader.js';
export {
  extractHeadings,
  splitArticle,
  FrontMatterParseError,
  FrontMatterValidationError,
} from './initialization/frontMatter.js';
export { runCatalogPipeline, type CatalogRunResult } from './initialization/catalogOrchestrator.js';
export {
  collectWarnings,
  normalizeSectionName,
  validateCatalog,
  validateDocument,
} from './validation/principleValidator.js';
export {
  buildCatalogIndex,
  renderCatalog,
  RenderError,
  type RenderOptions,
  type ReportFormat,
} from './rendering/catalogRenderer.js';
export { runCli } from './cli.js';
