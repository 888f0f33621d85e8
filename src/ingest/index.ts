/**
 * Ingest Module
 *
 * Responsibilities:
 * - Discover .html/.htm files under the source root; an unreadable
 *   subdirectory is skipped and reported, only the root itself is fatal
 * - Read bytes permissively (UTF-8 with replacement characters, BOM stripped)
 * - Turn each document into one PageRecord: clean, convert to markdown, classify
 * - Bound concurrency with p-limit and apply an optional per-document deadline
 *
 * Documents are independent; one that fails or times out is skipped and
 * reported, and never affects another. Results come back in discovery order
 * whatever order the work completed in.
 */

import * as cheerio from 'cheerio';
import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import pLimit from 'p-limit';
import { classifyPage } from '../classifier/index.js';
import { cleanDocument, extractTitle } from '../cleaner/index.js';
import { toMarkdown } from '../markdown/index.js';
import {
  defaultLogger,
  defaultMetrics,
  errorMessage,
  type Logger,
  type Metrics,
} from '../observability/index.js';
import type { SkippedDocument } from '../run-manager/index.js';
import type { PageRecord, SourceDocument } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * A discovered file, not yet read
 */
export interface DiscoveredFile {
  sourceId: string;
  absolutePath: string;
  order: number;
}

export type DirectoryReader = (absolutePath: string) => Promise<Dirent[]>;

export interface DiscoveryOptions {
  /** Directory listing used by the walk (default: fs readdir with file types) */
  readDirectory?: DirectoryReader;
  logger?: Logger;
  metrics?: Metrics;
}

export interface DiscoveryResult {
  /** HTML documents ordered by relative path */
  files: DiscoveredFile[];
  /** Subdirectories that could not be listed, by relative path */
  skipped: SkippedDocument[];
}

export interface ProcessOptions {
  rewriteImages?: boolean;
  contentScoreThreshold?: number;
}

export interface IngestOptions extends ProcessOptions {
  /** Maximum documents in flight (default: 8) */
  concurrency?: number;
  /**
   * Per-document deadline in milliseconds; 0 or absent disables it. Parsing is
   * synchronous and cannot be interrupted, so a document whose read and
   * processing together finish after the deadline is skipped once it completes.
   */
  documentTimeoutMs?: number;
  logger?: Logger;
  metrics?: Metrics;
}

export interface IngestResult {
  /** Documents that were read and processed, in discovery order */
  documents: SourceDocument[];
  /** One record per processed document, in discovery order */
  records: PageRecord[];
  skipped: SkippedDocument[];
}

// ============================================================================
// Constants
// ============================================================================

const HTML_EXTENSION = /\.html?$/i;

/** Root-level files scanned first for site metadata, by priority */
const ENTRY_DOCUMENT_NAMES: ReadonlyArray<string> = ['index.html', 'index.htm', 'home.html', 'home.htm'];

const DEFAULT_CONCURRENCY = 8;

const utf8Decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false });

// ============================================================================
// Discovery and Reading
// ============================================================================

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

const readDirectoryEntries: DirectoryReader = (absolutePath) =>
  readdir(absolutePath, { withFileTypes: true });

interface WalkState {
  rootDir: string;
  readDirectory: DirectoryReader;
  logger: Logger;
  metrics: Metrics;
  found: string[];
  skipped: SkippedDocument[];
}

async function walk(state: WalkState, relativeDir: string): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await state.readDirectory(path.join(state.rootDir, ...relativeDir.split('/')));
  } catch (error) {
    if (!relativeDir) {
      throw error;
    }
    const reason = errorMessage(error);
    state.metrics.increment('directories.skipped');
    state.logger.warn('Skipping unreadable directory', { source: relativeDir, reason });
    state.skipped.push({ sourceId: relativeDir, reason });
    return;
  }

  for (const entry of entries) {
    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      await walk(state, relativePath);
    } else if (entry.isFile() && HTML_EXTENSION.test(entry.name)) {
      state.found.push(relativePath);
    }
  }
}

/**
 * Find every HTML document under the root, ordered by relative path.
 * Rejects only when the root itself cannot be listed.
 */
export async function discoverDocuments(
  rootDir: string,
  options: DiscoveryOptions = {}
): Promise<DiscoveryResult> {
  const state: WalkState = {
    rootDir,
    readDirectory: options.readDirectory ?? readDirectoryEntries,
    logger: options.logger ?? defaultLogger,
    metrics: options.metrics ?? defaultMetrics,
    found: [],
    skipped: [],
  };
  await walk(state, '');

  const files = state.found.sort(compareCodeUnits).map((sourceId, order) => ({
    sourceId,
    absolutePath: path.join(rootDir, ...sourceId.split('/')),
    order,
  }));
  const skipped = state.skipped.sort((a, b) => compareCodeUnits(a.sourceId, b.sourceId));

  return { files, skipped };
}

/**
 * Decode bytes as UTF-8, replacing malformed sequences and dropping a BOM
 */
export function decodeDocument(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

export async function readDocument(file: DiscoveredFile): Promise<SourceDocument> {
  const bytes = await readFile(file.absolutePath);
  return { ...file, raw: decodeDocument(bytes) };
}

/**
 * Pick the document scanned first for site metadata
 */
export function findEntryDocument<T extends { sourceId: string }>(documents: ReadonlyArray<T>): T | null {
  for (const name of ENTRY_DOCUMENT_NAMES) {
    const entry = documents.find((document) => document.sourceId.toLowerCase() === name);
    if (entry) {
      return entry;
    }
  }
  return null;
}

// ============================================================================
// Processing
// ============================================================================

function fallbackTitle(sourceId: string): string {
  const stem = (sourceId.split('/').pop() ?? sourceId).replace(HTML_EXTENSION, '');
  return stem.replace(/[-_]+/g, ' ').trim();
}

/**
 * Clean, convert and classify one document
 */
export function processDocument(document: SourceDocument, options: ProcessOptions = {}): PageRecord {
  const $ = cheerio.load(document.raw);
  const title =
    extractTitle($) || $('h1').first().text().replace(/\s+/g, ' ').trim() || fallbackTitle(document.sourceId);

  const cleaned = cleanDocument(document.raw, { rewriteImages: options.rewriteImages ?? false });

  const classification = classifyPage(
    {
      filename: document.sourceId.split('/').pop() ?? document.sourceId,
      path: document.sourceId,
      title,
      text: cleaned.text,
    },
    options.contentScoreThreshold === undefined
      ? {}
      : { contentScoreThreshold: options.contentScoreThreshold }
  );

  return {
    order: document.order,
    sourceId: document.sourceId,
    pageType: classification.pageType,
    title,
    content: toMarkdown(cleaned.html),
    text: cleaned.text,
    classification,
  };
}

/**
 * Reject when `work` has not settled within `ms` milliseconds, or settles
 * after it. Synchronous work holds the timer back, so the elapsed time is
 * checked again once the work resolves.
 */
export function withDeadline<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  if (ms <= 0) {
    return work;
  }
  const startTime = Date.now();
  const timedOut = (): Error => new Error(`${label} timed out after ${ms}ms`);
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(timedOut()), ms);
  });
  const checked = work.then((value) => {
    if (Date.now() - startTime > ms) {
      throw timedOut();
    }
    return value;
  });
  return Promise.race([checked, deadline]).finally(() => clearTimeout(timer));
}

type UnitOutcome =
  | { ok: true; document: SourceDocument; record: PageRecord }
  | { ok: false; skipped: SkippedDocument };

/**
 * Read and process every discovered file with bounded concurrency
 */
export async function processDocuments(
  files: ReadonlyArray<DiscoveredFile>,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const logger = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? defaultMetrics;
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);
  const timeoutMs = options.documentTimeoutMs ?? 0;

  const runUnit = async (file: DiscoveredFile): Promise<UnitOutcome> => {
    const startTime = Date.now();
    try {
      const work = readDocument(file).then((document) => ({
        document,
        record: processDocument(document, options),
      }));
      const { document, record } = await withDeadline(work, timeoutMs, file.sourceId);

      metrics.increment('documents.processed', { pageType: record.pageType });
      metrics.timing('documents.duration', Date.now() - startTime);
      logger.debug('Document classified', {
        source: file.sourceId,
        pageType: record.pageType,
        tier: record.classification.tier,
      });
      return { ok: true, document, record };
    } catch (error) {
      const reason = errorMessage(error);
      metrics.increment('documents.skipped');
      logger.warn('Skipping document', { source: file.sourceId, reason });
      return { ok: false, skipped: { sourceId: file.sourceId, reason } };
    }
  };

  const outcomes = await Promise.all(files.map((file) => limit(() => runUnit(file))));

  const documents: SourceDocument[] = [];
  const records: PageRecord[] = [];
  const skipped: SkippedDocument[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      documents.push(outcome.document);
      records.push(outcome.record);
    } else {
      skipped.push(outcome.skipped);
    }
  }

  documents.sort((a, b) => a.order - b.order);
  records.sort((a, b) => a.order - b.order);

  return { documents, records, skipped };
}
