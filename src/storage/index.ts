/**
 * Storage Module
 *
 * Responsibilities:
 * - Implement OutputAdapter on the local filesystem
 * - Implement MemoryOutputAdapter for testing
 * - Manage artifact metadata and checksums
 * - Copy the static assets (stylesheet, switcher script) verbatim
 *
 * Output layout:
 * - site.json
 * - <page type>.html for each canonical page
 * - index.html
 * - style.css, layout_switcher.js
 * - run.json
 */

import { createHash } from 'crypto';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { ArtifactMetadata, OutputAdapter } from '../types/index.js';

export type { OutputAdapter };

/** Assets copied from the template directory into every output */
export const STATIC_ASSET_FILES: ReadonlyArray<string> = ['style.css', 'layout_switcher.js'];

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.html': 'text/html; charset=utf-8',
  '.json': 'application/json',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
};

/**
 * Calculate MD5 checksum for content
 *
 * @param content - String or Buffer content
 * @returns MD5 hash as hex string
 */
export function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

/**
 * Get content size in bytes
 */
function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

/**
 * Content type from the file extension, application/octet-stream when unknown
 */
export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Reject paths that would escape the output root
 */
function assertRelativePath(filePath: string): string {
  const normalized = filePath.replace(/\\/g, '/');
  if (!normalized || path.posix.isAbsolute(normalized) || normalized.split('/').includes('..')) {
    throw new Error(`Invalid output path: ${filePath}`);
  }
  return normalized;
}

function buildMetadata(
  filePath: string,
  content: string | Buffer,
  contentType: string | undefined
): ArtifactMetadata {
  return {
    path: filePath,
    createdAt: new Date().toISOString(),
    contentType: contentType ?? contentTypeFor(filePath),
    size: getContentSize(content),
    checksum: calculateChecksum(content),
  };
}

/**
 * Filesystem implementation of OutputAdapter
 *
 * Writes artifacts under a root directory, creating parent directories as needed.
 */
export class FileSystemOutputAdapter implements OutputAdapter {
  private readonly rootDir: string;
  private readonly written: Map<string, ArtifactMetadata> = new Map();

  /**
   * @param rootDir - Directory that receives every artifact
   */
  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  private resolve(filePath: string): string {
    return path.join(this.rootDir, ...assertRelativePath(filePath).split('/'));
  }

  /**
   * Write an artifact, replacing any existing file
   */
  async write(filePath: string, content: string | Buffer, contentType?: string): Promise<ArtifactMetadata> {
    const target = this.resolve(filePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);

    const metadata = buildMetadata(assertRelativePath(filePath), content, contentType);
    this.written.set(metadata.path, metadata);
    return metadata;
  }

  /**
   * Read an artifact back
   *
   * @throws Error if the file does not exist
   */
  async read(filePath: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const target = this.resolve(filePath);
    const [content, stats] = await Promise.all([readFile(target), stat(target)]);
    const normalized = assertRelativePath(filePath);

    return {
      content,
      metadata: {
        ...buildMetadata(normalized, content, this.written.get(normalized)?.contentType),
        createdAt: stats.mtime.toISOString(),
      },
    };
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await stat(this.resolve(filePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * List the artifacts written through this adapter, sorted by path
   */
  async list(): Promise<ArtifactMetadata[]> {
    return Array.from(this.written.values()).sort((a, b) => a.path.localeCompare(b.path));
  }
}

/**
 * In-memory implementation of OutputAdapter for testing
 */
export class MemoryOutputAdapter implements OutputAdapter {
  private store: Map<string, { content: string | Buffer; metadata: ArtifactMetadata }> = new Map();

  async write(filePath: string, content: string | Buffer, contentType?: string): Promise<ArtifactMetadata> {
    const key = assertRelativePath(filePath);
    const metadata = buildMetadata(key, content, contentType);
    this.store.set(key, { content, metadata });
    return metadata;
  }

  /**
   * @throws Error if artifact not found
   */
  async read(filePath: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(assertRelativePath(filePath));

    if (!item) {
      throw new Error(`Artifact not found: ${filePath}`);
    }

    return item;
  }

  async exists(filePath: string): Promise<boolean> {
    return this.store.has(assertRelativePath(filePath));
  }

  async list(): Promise<ArtifactMetadata[]> {
    return Array.from(this.store.values())
      .map((item) => item.metadata)
      .sort((a, b) => a.path.localeCompare(b.path));
  }

  /**
   * Read an artifact as UTF-8 text (useful for testing)
   */
  readText(filePath: string): string {
    const item = this.store.get(assertRelativePath(filePath));
    if (!item) {
      throw new Error(`Artifact not found: ${filePath}`);
    }
    return typeof item.content === 'string' ? item.content : item.content.toString('utf-8');
  }

  /**
   * Clear all stored artifacts (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Get all stored paths, sorted (useful for debugging)
   */
  keys(): string[] {
    return Array.from(this.store.keys()).sort();
  }
}

/**
 * Copy the static assets byte-for-byte from the template directory
 *
 * @throws Error if an asset is missing from the template directory
 */
export async function copyAssets(
  templateDir: string,
  output: OutputAdapter,
  files: ReadonlyArray<string> = STATIC_ASSET_FILES
): Promise<ArtifactMetadata[]> {
  const written: ArtifactMetadata[] = [];
  for (const file of files) {
    const content = await readFile(path.join(templateDir, file));
    written.push(await output.write(file, content));
  }
  return written;
}

/**
 * Factory function to create an output adapter
 */
export function createOutputAdapter(
  config: { type: 'filesystem'; rootDir: string } | { type: 'memory' }
): OutputAdapter {
  if (config.type === 'memory') {
    return new MemoryOutputAdapter();
  }
  return new FileSystemOutputAdapter(config.rootDir);
}
