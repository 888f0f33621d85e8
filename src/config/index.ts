/**
 * Configuration Module
 *
 * Resolves the converter configuration from explicit input, SITE_CONVERTER_*
 * environment variables and defaults, in that order of precedence, and
 * validates the result with zod.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONTENT_SCORE_THRESHOLD } from '../classifier/index.js';
import { DEFAULT_METADATA_SCAN_LIMIT } from '../metadata/index.js';
import type { ModuleResult } from '../types/index.js';

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_CONCURRENCY = 8;

/** Bundled stylesheet and switcher script */
export const DEFAULT_TEMPLATE_DIR = path.resolve(__dirname, '..', '..', 'templates', 'assets');

export const ConverterConfigSchema = z.object({
  /** Root of the mirrored site */
  sourceDir: z.string().min(1, 'sourceDir is required'),
  /** Output directory for the filesystem adapter */
  outputDir: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).max(64).default(DEFAULT_CONCURRENCY),
  /** Per-document deadline in milliseconds; 0 disables it */
  documentTimeoutMs: z.coerce.number().int().min(0).default(0),
  metadataScanLimit: z.coerce.number().int().min(0).default(DEFAULT_METADATA_SCAN_LIMIT),
  contentScoreThreshold: z.coerce.number().min(0).default(DEFAULT_CONTENT_SCORE_THRESHOLD),
  templateDir: z.string().min(1).default(DEFAULT_TEMPLATE_DIR),
  rewriteImages: z.boolean().default(false),
  /** Page type -> layout id; unknown ids fall back at render time */
  layoutOverrides: z.record(z.string()).default({}),
  /** Folder or domain used for the site name when no page provides one */
  fallbackName: z.string().optional(),
});

export type ConverterConfigInput = z.input<typeof ConverterConfigSchema>;
export type ConverterConfig = z.output<typeof ConverterConfigSchema>;

// ============================================================================
// Environment
// ============================================================================

export const ENV_PREFIX = 'SITE_CONVERTER_';

const ENV_KEYS = {
  CONCURRENCY: 'concurrency',
  DOCUMENT_TIMEOUT_MS: 'documentTimeoutMs',
  METADATA_SCAN_LIMIT: 'metadataScanLimit',
  CONTENT_SCORE_THRESHOLD: 'contentScoreThreshold',
  TEMPLATE_DIR: 'templateDir',
  REWRITE_IMAGES: 'rewriteImages',
} as const satisfies Record<string, keyof ConverterConfig>;

function parseBooleanFlag(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return value;
}

/**
 * Collect the configuration values present in the environment
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value === undefined || value.trim() === '') {
      continue;
    }
    overrides[key] = key === 'rewriteImages' ? parseBooleanFlag(value) : value;
  }
  return overrides;
}

function definedEntries(input: ConverterConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve and validate the converter configuration
 */
export function resolveConfig(
  input: ConverterConfigInput,
  env: NodeJS.ProcessEnv = process.env
): ModuleResult<ConverterConfig> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = ConverterConfigSchema.safeParse({
    ...readEnvOverrides(env),
    ...definedEntries(input),
  });

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Configuration validation failed',
        details: errors,
      },
      metadata: {
        runId: '',
        module: 'config',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  return {
    success: true,
    data: parseResult.data,
    metadata: {
      runId: '',
      module: 'config',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
