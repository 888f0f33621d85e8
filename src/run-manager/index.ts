/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Generate deterministic RunIDs using SHA-256
 * - Track run state: discovered, processed and skipped documents
 * - Collect warnings (layout fallbacks, skipped documents) and errors
 * - Persist the run artifact as run.json
 *
 * RunID algorithm:
 * 1. Sort the discovered source ids
 * 2. Construct input: source_root | id_1,id_2,...
 * 3. Hash using SHA-256
 * 4. Prefix with "run_" and keep 16 hex characters
 *
 * Run artifacts are immutable values; every helper returns a new artifact.
 */

import { createHash } from 'crypto';
import type {
  ArtifactMetadata,
  CanonicalPageType,
  LayoutId,
  OutputAdapter,
  PageType,
  RunId,
} from '../types/index.js';

/**
 * Run status tracking
 */
export type RunStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const RUN_ARTIFACT_FILE = 'run.json';

/**
 * A document that was discovered but could not be processed
 */
export interface SkippedDocument {
  sourceId: string;
  reason: string;
}

/**
 * Run artifact structure for storage
 */
export interface RunArtifact {
  run_id: RunId;
  status: RunStatus;
  created_at: string;
  completed_at: string | null;
  source: string;
  documents: {
    discovered: number;
    processed: number;
    skipped: SkippedDocument[];
  };
  /** Number of records per page type */
  classification: Partial<Record<PageType, number>>;
  layouts: Partial<Record<CanonicalPageType, LayoutId>>;
  artifacts: string[];
  warnings: string[];
  errors: string[];
}

export interface RunCompletion {
  processed: number;
  classification: Partial<Record<PageType, number>>;
  layouts: Partial<Record<CanonicalPageType, LayoutId>>;
  artifacts: ReadonlyArray<ArtifactMetadata>;
}

/**
 * Generate deterministic run ID using SHA-256
 *
 * The same source root and set of documents always yield the same id,
 * independent of discovery order.
 *
 * @param sourceRoot - Source directory as configured
 * @param sourceIds - Relative paths of the discovered documents
 * @returns Deterministic run ID prefixed with "run_"
 */
export function generateRunId(sourceRoot: string, sourceIds: ReadonlyArray<string>): RunId {
  const hashInput = [sourceRoot, [...sourceIds].sort().join(',')].join('|');
  const hash = createHash('sha256').update(hashInput).digest('hex');
  return `run_${hash.substring(0, 16)}`;
}

/**
 * Create a pending run artifact
 */
export function createRunArtifact(
  runId: RunId,
  source: string,
  now: string = new Date().toISOString()
): RunArtifact {
  return {
    run_id: runId,
    status: 'pending',
    created_at: now,
    completed_at: null,
    source,
    documents: { discovered: 0, processed: 0, skipped: [] },
    classification: {},
    layouts: {},
    artifacts: [],
    warnings: [],
    errors: [],
  };
}

/**
 * Mark the run as processing the discovered documents
 */
export function startRun(artifact: RunArtifact, discovered: number): RunArtifact {
  return {
    ...artifact,
    status: 'processing',
    documents: { ...artifact.documents, discovered },
  };
}

/**
 * Record a skipped document; it is also listed as a warning
 */
export function recordSkippedDocument(artifact: RunArtifact, skipped: SkippedDocument): RunArtifact {
  return {
    ...artifact,
    documents: {
      ...artifact.documents,
      skipped: [...artifact.documents.skipped, skipped],
    },
    warnings: [...artifact.warnings, `Skipped ${skipped.sourceId}: ${skipped.reason}`],
  };
}

export function recordWarning(artifact: RunArtifact, warning: string): RunArtifact {
  return { ...artifact, warnings: [...artifact.warnings, warning] };
}

/**
 * Count records per page type
 */
export function countByPageType(pageTypes: ReadonlyArray<PageType>): Partial<Record<PageType, number>> {
  const counts: Partial<Record<PageType, number>> = {};
  for (const pageType of pageTypes) {
    counts[pageType] = (counts[pageType] ?? 0) + 1;
  }
  return counts;
}

/**
 * Mark the run completed
 */
export function completeRun(
  artifact: RunArtifact,
  completion: RunCompletion,
  now: string = new Date().toISOString()
): RunArtifact {
  return {
    ...artifact,
    status: 'completed',
    completed_at: now,
    documents: { ...artifact.documents, processed: completion.processed },
    classification: { ...completion.classification },
    layouts: { ...completion.layouts },
    artifacts: completion.artifacts.map((item) => item.path),
  };
}

/**
 * Mark the run failed
 */
export function failRun(
  artifact: RunArtifact,
  error: string,
  now: string = new Date().toISOString()
): RunArtifact {
  return {
    ...artifact,
    status: 'failed',
    completed_at: now,
    errors: [...artifact.errors, error],
  };
}

/**
 * Write the run artifact as run.json
 */
export async function persistRunArtifact(
  output: OutputAdapter,
  artifact: RunArtifact
): Promise<ArtifactMetadata> {
  return output.write(RUN_ARTIFACT_FILE, JSON.stringify(artifact, null, 2), 'application/json');
}
