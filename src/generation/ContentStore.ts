/**
 * ContentStore - Local file storage for generated artifacts
 *
 * Features:
 * - Save images and 3D models under timestamped, collision-free names
 * - Read artifacts back by stored path (missing files are not an error)
 * - Storage statistics per file type
 */

import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import mime from 'mime-types';
import { createLogger } from '../utils/logger.js';
import type { GenerationStage } from '../types/generation.js';

const logger = createLogger('ContentStore');

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * File extension written for each stage
 */
export const STAGE_EXTENSIONS: Record<GenerationStage, string> = {
  image: 'png',
  model: 'obj'
};

/**
 * ContentStore configuration
 */
export interface ContentStoreConfig {
  /** Directory artifacts are written to (supports ~ for home directory) */
  basePath: string;
}

/**
 * Saved artifact metadata
 */
export interface SavedArtifact {
  /** Absolute path to the saved file */
  absolutePath: string;
  /** Path as handed to callers and stored in history */
  relativePath: string;
  filename: string;
  sizeBytes: number;
  createdAt: Date;
}

/**
 * Artifact read back from the store
 */
export interface StoredArtifact {
  path: string;
  bytes: Buffer;
  mimeType: string;
  sizeBytes: number;
}

/**
 * Storage statistics
 */
export interface ContentStats {
  totalFiles: number;
  totalSizeBytes: number;
  filesPerExtension: Record<string, number>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in the form YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * `{stage}_{timestamp}_{token}.{ext}`; the token keeps runs finishing in the
 * same second apart
 */
export function buildArtifactFilename(stage: string, extension: string, date: Date, token: string): string {
  return `${stage}_${formatTimestamp(date)}_${token}.${extension}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class ContentStore {
  private basePath: string;
  private initialized: boolean = false;

  constructor(config: ContentStoreConfig) {
    this.basePath = config.basePath.replace(/^~/, process.env.HOME || '');

    logger.debug('ContentStore configured', { basePath: this.basePath });
  }

  /**
   * Create the storage directory if it does not exist
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      await fs.mkdir(this.basePath, { recursive: true });
      this.initialized = true;
      logger.debug('Storage directory created/verified', { basePath: this.basePath });
    } catch (error) {
      logger.error('Failed to create storage directory', {
        error: error instanceof Error ? error.message : String(error),
        basePath: this.basePath
      });
      throw error;
    }
  }

  /**
   * Write artifact bytes under a fresh name
   *
   * @param stage - Stage prefix for the filename
   * @param extension - File extension without the dot
   * @param bytes - Artifact contents
   * @param date - Date for the filename (defaults to now)
   */
  async save(
    stage: string,
    extension: string,
    bytes: Buffer,
    date: Date = new Date()
  ): Promise<SavedArtifact> {
    await this.initialize();

    const token = randomUUID().replace(/-/g, '').slice(0, 8);
    const filename = buildArtifactFilename(stage, extension, date, token);
    const relativePath = path.join(this.basePath, filename);
    const absolutePath = path.resolve(relativePath);

    try {
      // wx: never overwrite an existing artifact
      await fs.writeFile(absolutePath, bytes, { flag: 'wx' });

      logger.info('Artifact saved', {
        path: relativePath,
        sizeBytes: bytes.length
      });

      return {
        absolutePath,
        relativePath,
        filename,
        sizeBytes: bytes.length,
        createdAt: date
      };
    } catch (error) {
      logger.error('Failed to save artifact', {
        error: error instanceof Error ? error.message : String(error),
        path: relativePath
      });
      throw error;
    }
  }

  /**
   * Read an artifact by stored path
   * @returns null when the file no longer exists
   */
  async read(storedPath: string): Promise<StoredArtifact | null> {
    try {
      const bytes = await fs.readFile(storedPath);
      return {
        path: storedPath,
        bytes,
        mimeType: mime.lookup(storedPath) || 'application/octet-stream',
        sizeBytes: bytes.length
      };
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.debug('Artifact missing', { path: storedPath });
        return null;
      }
      throw error;
    }
  }

  /**
   * Check if an artifact exists
   */
  async exists(storedPath: string): Promise<boolean> {
    try {
      await fs.access(storedPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Get storage statistics
   */
  async getStats(): Promise<ContentStats> {
    const stats: ContentStats = {
      totalFiles: 0,
      totalSizeBytes: 0,
      filesPerExtension: {}
    };

    let entries: string[];
    try {
      entries = await fs.readdir(this.basePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return stats;
      }
      throw error;
    }

    for (const entry of entries) {
      const fileStat = await fs.stat(path.join(this.basePath, entry));
      if (!fileStat.isFile()) continue;

      const extension = path.extname(entry).replace(/^\./, '') || '(none)';
      stats.totalFiles++;
      stats.totalSizeBytes += fileStat.size;
      stats.filesPerExtension[extension] = (stats.filesPerExtension[extension] ?? 0) + 1;
    }

    return stats;
  }

  /**
   * Get the base storage path
   */
  getBasePath(): string {
    return this.basePath;
  }
}

/**
 * Create a ContentStore instance
 */
export function createContentStore(config: ContentStoreConfig): ContentStore {
  return new ContentStore(config);
}

export default ContentStore;
