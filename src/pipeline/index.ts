/**
 * Pipeline Module
 *
 * Orchestrates a conversion:
 * 1. Resolve configuration
 * 2. Discover documents (nothing discovered: NO_DOCUMENTS)
 * 3. Clean, convert and classify each document with bounded concurrency
 *    (nothing usable: NO_USABLE_DOCUMENTS)
 * 4. Fold site metadata from the entry document and the first N documents
 * 5. Aggregate records into the canonical page set
 * 6. Write site.json, the twelve pages, index.html, static assets and run.json
 *
 * Nothing is written unless at least one document was processed.
 */

import { aggregatePages } from '../aggregator/index.js';
import { resolveConfig, type ConverterConfig, type ConverterConfigInput } from '../config/index.js';
import { discoverDocuments, findEntryDocument, processDocuments } from '../ingest/index.js';
import { extractSiteMetadata } from '../metadata/index.js';
import {
  defaultLogger,
  defaultMetrics,
  errorMessage,
  type Logger,
  type Metrics,
} from '../observability/index.js';
import {
  DEFAULT_LAYOUT_MAP,
  renderPage,
  renderRedirectIndex,
  resolveLayout,
  type LayoutOverrides,
} from '../renderers/index.js';
import {
  completeRun,
  countByPageType,
  createRunArtifact,
  failRun,
  generateRunId,
  persistRunArtifact,
  recordSkippedDocument,
  recordWarning,
  startRun,
  type RunArtifact,
} from '../run-manager/index.js';
import { copyAssets, FileSystemOutputAdapter } from '../storage/index.js';
import {
  CANONICAL_PAGE_TYPES,
  type ArtifactMetadata,
  type CanonicalPageType,
  type LayoutId,
  type ModuleResult,
  type OutputAdapter,
  type RunId,
  type SiteRecord,
} from '../types/index.js';
import { validateSiteRecord } from '../validator/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export const SITE_RECORD_FILE = 'site.json';
export const INDEX_FILE = 'index.html';

export const PIPELINE_ERROR_CODES = {
  NO_DOCUMENTS: 'NO_DOCUMENTS',
  NO_USABLE_DOCUMENTS: 'NO_USABLE_DOCUMENTS',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_SITE_RECORD: 'INVALID_SITE_RECORD',
  CONVERSION_ERROR: 'CONVERSION_ERROR',
} as const;

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[keyof typeof PIPELINE_ERROR_CODES];

export interface PipelineDependencies {
  logger?: Logger;
  metrics?: Metrics;
  /** Destination for every artifact; defaults to a filesystem adapter on config.outputDir */
  output?: OutputAdapter;
  /** Clock used for generated_at, the copyright year and run timestamps */
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
}

export interface ConversionResult {
  runId: RunId;
  record: SiteRecord;
  layouts: Record<CanonicalPageType, LayoutId>;
  artifacts: ArtifactMetadata[];
  run: RunArtifact;
}

export interface RenderSiteOptions {
  output: OutputAdapter;
  layoutOverrides?: LayoutOverrides;
  rewriteImages?: boolean;
  /** Copy style.css and layout_switcher.js from this directory when given */
  templateDir?: string;
  year?: number;
  logger?: Logger;
}

export interface RenderSiteResult {
  layouts: Record<CanonicalPageType, LayoutId>;
  artifacts: ArtifactMetadata[];
  warnings: string[];
}

// ============================================================================
// Helpers
// ============================================================================

function moduleFailure<T>(
  code: PipelineErrorCode,
  message: string,
  runId: RunId,
  startTime: number,
  details?: unknown
): ModuleResult<T> {
  return {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details },
    metadata: {
      runId,
      module: 'pipeline',
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function moduleSuccess<T>(data: T, runId: RunId, startTime: number): ModuleResult<T> {
  return {
    success: true,
    data,
    metadata: {
      runId,
      module: 'pipeline',
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

/**
 * Render and write the twelve pages plus index.html
 */
async function writePages(
  record: SiteRecord,
  output: OutputAdapter,
  options: { layoutOverrides: LayoutOverrides; rewriteImages: boolean; year: number; logger: Logger }
): Promise<RenderSiteResult> {
  const artifacts: ArtifactMetadata[] = [];
  const warnings: string[] = [];
  const layouts: Record<CanonicalPageType, LayoutId> = { ...DEFAULT_LAYOUT_MAP };

  for (const pageType of CANONICAL_PAGE_TYPES) {
    const resolution = resolveLayout(pageType, options.layoutOverrides);
    if (resolution.fallback) {
      const warning = `Unknown layout "${resolution.requested ?? ''}" for ${pageType}; using ${resolution.layout}`;
      options.logger.warn('Layout override ignored', {
        pageType,
        requested: resolution.requested,
        layout: resolution.layout,
      });
      warnings.push(warning);
    }
    layouts[pageType] = resolution.layout;

    const html = renderPage(pageType, record, {
      layout: resolution.layout,
      year: options.year,
      rewriteImages: options.rewriteImages,
    });
    artifacts.push(await output.write(`${pageType}.html`, html));
  }

  artifacts.push(await output.write(INDEX_FILE, renderRedirectIndex()));

  return { layouts, artifacts, warnings };
}

// ============================================================================
// Conversion
// ============================================================================

async function runConversion(
  config: ConverterConfig,
  output: OutputAdapter,
  deps: { logger: Logger; metrics: Metrics; now: () => Date },
  startTime: number
): Promise<ModuleResult<ConversionResult>> {
  const { logger, metrics } = deps;

  const discovery = await discoverDocuments(config.sourceDir, { logger, metrics });
  const files = discovery.files;
  if (files.length === 0) {
    logger.error('No HTML documents found', { source: config.sourceDir });
    return moduleFailure(
      PIPELINE_ERROR_CODES.NO_DOCUMENTS,
      `No HTML documents found under ${config.sourceDir}`,
      '',
      startTime,
      discovery.skipped
    );
  }

  const runId = generateRunId(
    config.sourceDir,
    files.map((file) => file.sourceId)
  );
  let run = startRun(createRunArtifact(runId, config.sourceDir, deps.now().toISOString()), files.length);
  logger.info('Conversion started', { runId, source: config.sourceDir, documents: files.length });

  const ingest = await processDocuments(files, {
    concurrency: config.concurrency,
    documentTimeoutMs: config.documentTimeoutMs,
    rewriteImages: config.rewriteImages,
    contentScoreThreshold: config.contentScoreThreshold,
    logger,
    metrics,
  });

  const skippedSources = [...discovery.skipped, ...ingest.skipped];
  for (const skipped of skippedSources) {
    run = recordSkippedDocument(run, skipped);
  }

  if (ingest.records.length === 0) {
    logger.error('Every document was skipped', { runId, skipped: skippedSources.length });
    return moduleFailure(
      PIPELINE_ERROR_CODES.NO_USABLE_DOCUMENTS,
      'No document could be processed',
      runId,
      startTime,
      skippedSources
    );
  }

  const metadata = extractSiteMetadata(ingest.documents, {
    scanLimit: config.metadataScanLimit,
    entryDocument: findEntryDocument(ingest.documents),
    fallbackName: config.fallbackName ?? config.sourceDir,
    logger,
  });

  const generatedAt = deps.now();
  const record: SiteRecord = {
    metadata,
    pages: aggregatePages(ingest.records),
    generated_at: generatedAt.toISOString(),
    source: config.sourceDir,
  };

  const artifacts: ArtifactMetadata[] = [];
  let rendered: RenderSiteResult;
  try {
    artifacts.push(
      await output.write(SITE_RECORD_FILE, JSON.stringify(record, null, 2), 'application/json')
    );
    rendered = await writePages(record, output, {
      layoutOverrides: config.layoutOverrides,
      rewriteImages: config.rewriteImages,
      year: generatedAt.getFullYear(),
      logger,
    });
    artifacts.push(...rendered.artifacts);
    artifacts.push(...(await copyAssets(config.templateDir, output)));
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Writing output failed', { runId, error: message });
    run = failRun(run, message, deps.now().toISOString());
    await persistRunArtifact(output, run);
    return moduleFailure(PIPELINE_ERROR_CODES.CONVERSION_ERROR, message, runId, startTime, {
      errors: run.errors,
    });
  }

  for (const warning of rendered.warnings) {
    run = recordWarning(run, warning);
  }

  run = completeRun(
    run,
    {
      processed: ingest.records.length,
      classification: countByPageType(ingest.records.map((item) => item.pageType)),
      layouts: rendered.layouts,
      artifacts,
    },
    deps.now().toISOString()
  );
  artifacts.push(await persistRunArtifact(output, run));

  metrics.gauge('pages.overflow', record.pages.additional_content.length);
  metrics.timing('conversion.duration', Date.now() - startTime);
  logger.info('Conversion completed', {
    runId,
    processed: ingest.records.length,
    skipped: skippedSources.length,
    overflow: record.pages.additional_content.length,
  });

  return moduleSuccess({ runId, record, layouts: rendered.layouts, artifacts, run }, runId, startTime);
}

/**
 * Convert a mirrored site into the canonical site record and rendered pages
 *
 * @param input - Converter configuration; env overrides and defaults fill the rest
 * @param deps - Logger, metrics, output adapter and clock
 */
export async function convertSite(
  input: ConverterConfigInput,
  deps: PipelineDependencies = {}
): Promise<ModuleResult<ConversionResult>> {
  const startTime = Date.now();
  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? defaultMetrics;
  const now = deps.now ?? (() => new Date());

  const configResult = resolveConfig(input, deps.env ?? process.env);
  if (!configResult.success || !configResult.data) {
    logger.error('Invalid configuration', { details: configResult.error?.details });
    return moduleFailure(
      PIPELINE_ERROR_CODES.VALIDATION_ERROR,
      configResult.error?.message ?? 'Configuration validation failed',
      '',
      startTime,
      configResult.error?.details
    );
  }
  const config = configResult.data;

  const output = deps.output ?? (config.outputDir ? new FileSystemOutputAdapter(config.outputDir) : null);
  if (!output) {
    return moduleFailure(
      PIPELINE_ERROR_CODES.VALIDATION_ERROR,
      'Either an output adapter or outputDir is required',
      '',
      startTime,
      ['outputDir: Required']
    );
  }

  try {
    return await runConversion(config, output, { logger, metrics, now }, startTime);
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Conversion failed', { source: config.sourceDir, error: message });
    metrics.increment('conversion.failed');
    return moduleFailure(PIPELINE_ERROR_CODES.CONVERSION_ERROR, message, '', startTime);
  }
}

// ============================================================================
// Re-rendering
// ============================================================================

/**
 * Re-render the pages of an existing site record, e.g. a hand-edited site.json
 * with different layout overrides
 *
 * @param input - Parsed site.json of unknown shape
 */
export async function renderSite(
  input: unknown,
  options: RenderSiteOptions
): Promise<ModuleResult<RenderSiteResult>> {
  const startTime = Date.now();
  const logger = options.logger ?? defaultLogger;

  const validation = validateSiteRecord(input);
  if (!validation.valid || !validation.record) {
    logger.error('Site record failed validation', { errors: validation.errors.length });
    return moduleFailure(
      PIPELINE_ERROR_CODES.INVALID_SITE_RECORD,
      'Site record failed validation',
      '',
      startTime,
      validation.errors
    );
  }

  for (const warning of validation.warnings) {
    logger.debug('Site record warning', { field: warning.field, message: warning.message });
  }

  try {
    const rendered = await writePages(validation.record, options.output, {
      layoutOverrides: options.layoutOverrides ?? {},
      rewriteImages: options.rewriteImages ?? false,
      year: options.year ?? new Date().getFullYear(),
      logger,
    });
    if (options.templateDir) {
      rendered.artifacts.push(...(await copyAssets(options.templateDir, options.output)));
    }
    return moduleSuccess(rendered, '', startTime);
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Rendering failed', { error: message });
    return moduleFailure(PIPELINE_ERROR_CODES.CONVERSION_ERROR, message, '', startTime);
  }
}
