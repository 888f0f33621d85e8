/**
 * Municipal Site Converter - Main Entry Point
 *
 * Converts a mirrored municipal website into a canonical site record (twelve
 * page slots, an overflow list and site metadata) and renders one HTML page
 * per slot through five interchangeable layouts.
 *
 * Architecture:
 * - Each module is callable independently
 * - The SiteRecord (site.json) is the canonical artifact; pages are views of it
 * - Artifacts are written through an OutputAdapter (filesystem or memory)
 */

// Core Types
export type * from './types/index.js';
export {
  CANONICAL_PAGE_TYPES,
  OVERFLOW_PAGE_TYPE,
  PAGE_TITLES,
  SOCIAL_PLATFORMS,
  LAYOUT_IDS,
  isCanonicalPageType,
} from './types/index.js';

// Observability
export {
  defaultLogger,
  defaultMetrics,
  silentLogger,
  errorMessage,
  type Logger,
  type Metrics,
} from './observability/index.js';

// Configuration
export {
  resolveConfig,
  readEnvOverrides,
  ConverterConfigSchema,
  DEFAULT_CONCURRENCY,
  DEFAULT_TEMPLATE_DIR,
  ENV_PREFIX,
  type ConverterConfig,
  type ConverterConfigInput,
} from './config/index.js';

// Content Cleaner
export {
  cleanDocument,
  rewriteImageSources,
  extractVisibleText,
  extractTitle,
  toLocalImagePath,
  BOILERPLATE_PATTERNS,
  type CleanOptions,
} from './cleaner/index.js';

// Page Classifier
export {
  classifyPage,
  scoreContent,
  PATH_HINTS,
  KEYWORD_RULES,
  CONTENT_KEYWORDS,
  DEFAULT_CONTENT_SCORE_THRESHOLD,
  type ClassifierInput,
  type ClassifierOptions,
  type KeywordRule,
  type PathHint,
} from './classifier/index.js';

// Metadata Extractor
export {
  extractDocumentMetadata,
  extractSiteMetadata,
  mergeMetadata,
  resolveSiteMetadata,
  deriveNameFromTitle,
  deriveNameFromSource,
  emptyCandidate,
  DEFAULT_METADATA_SCAN_LIMIT,
  type MetadataCandidate,
  type SiteMetadataOptions,
} from './metadata/index.js';

// Markdown Normalizer
export { toMarkdown, markdownToHtml, normalizeMarkdown } from './markdown/index.js';

// Page Aggregator
export {
  aggregatePages,
  createEmptyPages,
  extractEventHighlights,
  splitSections,
  SECTION_BREAK,
  MAX_EVENT_HIGHLIGHTS,
} from './aggregator/index.js';

// Layout Renderer
export {
  renderLayout,
  renderPage,
  renderRedirectIndex,
  resolveLayout,
  isLayoutId,
  escapeHtml,
  emptyPageContent,
  DEFAULT_LAYOUT_MAP,
  DEFAULT_SITE_NAME,
  type LayoutInput,
  type LayoutOverrides,
  type LayoutResolution,
  type RenderPageOptions,
} from './renderers/index.js';

// Ingest
export {
  discoverDocuments,
  readDocument,
  decodeDocument,
  processDocument,
  processDocuments,
  findEntryDocument,
  type DiscoveredFile,
  type DirectoryReader,
  type DiscoveryOptions,
  type DiscoveryResult,
  type IngestOptions,
  type IngestResult,
} from './ingest/index.js';

// Run Manager
export {
  generateRunId,
  createRunArtifact,
  completeRun,
  failRun,
  type RunArtifact,
  type RunStatus,
  type SkippedDocument,
} from './run-manager/index.js';

// Validator
export {
  validateSiteRecord,
  SiteRecordSchema,
  type SiteRecordValidation,
} from './validator/index.js';

// Storage
export {
  FileSystemOutputAdapter,
  MemoryOutputAdapter,
  createOutputAdapter,
  copyAssets,
  STATIC_ASSET_FILES,
} from './storage/index.js';

// Pipeline
export {
  convertSite,
  renderSite,
  PIPELINE_ERROR_CODES,
  SITE_RECORD_FILE,
  type ConversionResult,
  type PipelineDependencies,
  type RenderSiteOptions,
  type RenderSiteResult,
} from './pipeline/index.js';
