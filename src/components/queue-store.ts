/**
 * Queue Store Component
 *
 * File-system backed issue queue. Pending items are Markdown files in the
 * pending directory; promotion moves them into the processed directory.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import * as path from 'path';
import type { ProcessedEntry, QueueCategory, QueueItem, QueueItemContent } from '../types';
import { QueueItemError } from '../errors';
import { logger } from '../utils/logger';

export interface QueueStore {
  readonly pendingDir: string;
  listPending(): Promise<QueueItem[]>;
  readItem(item: QueueItem): Promise<QueueItemContent>;
  movePendingToProcessed(itemPath: string): Promise<string>;
  countProcessed(): Promise<number>;
  latestProcessed(): Promise<ProcessedEntry | undefined>;
}

export interface QueueStoreConfig {
  readonly pendingDir: string;
  readonly processedDir: string;
}

/**
 * Derives the queue category from a file name
 */
export function categorizeQueueFile(name: string): QueueCategory {
  const lowered = name.toLowerCase();

  if (lowered.startsWith('.') || lowered.startsWith('_') || !lowered.endsWith('.md')) {
    return 'excluded';
  }
  if (lowered.startsWith('cap-') || lowered.startsWith('capability-')) {
    return 'capability';
  }
  return 'development';
}

/**
 * Reads the creation timestamp embedded in a queue file name, if any.
 *
 * Accepted forms after the first `-`: `YYYYMMDDTHHMMSS`, `YYYYMMDDHHMMSS`,
 * epoch seconds (10 digits) and epoch milliseconds (13 digits).
 */
export function parseFilenameTimestamp(name: string): Date | undefined {
  const stem = name.replace(/\.[^.]*$/, '');
  const dash = stem.indexOf('-');
  if (dash === -1) {
    return undefined;
  }
  const rest = stem.slice(dash + 1);

  const compact = /^(\d{4})(\d{2})(\d{2})T?(\d{2})(\d{2})(\d{2})/.exec(rest);
  if (compact) {
    const [year, month, day, hour, minute, second] = compact.slice(1).map(Number);
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    // Date.UTC rolls impossible fields over into the next unit
    const exact =
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day &&
      date.getUTCHours() === hour &&
      date.getUTCMinutes() === minute &&
      date.getUTCSeconds() === second;
    return exact ? date : undefined;
  }

  const epoch = /^(\d{10}|\d{13})(?:\D|$)/.exec(rest);
  if (epoch) {
    const value = Number(epoch[1]);
    return new Date(epoch[1].length === 10 ? value * 1000 : value);
  }

  return undefined;
}

/**
 * Oldest first; equal timestamps fall back to lexical file name order
 */
export function compareQueueItems(a: QueueItem, b: QueueItem): number {
  const delta = a.createdAt.getTime() - b.createdAt.getTime();
  if (delta !== 0) {
    return delta;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

/**
 * Splits queue file text into an issue title (first line) and body (the rest)
 */
export function parseQueueContent(raw: string, queuePath: string): QueueItemContent {
  const lines = raw.replace(/\r\n/g, '\n').split('\n');
  const first = lines[0] ?? '';

  if (!first.trim()) {
    throw new QueueItemError(`Queue file has an empty first line (title): ${queuePath}`, queuePath);
  }

  const title = first.trim().replace(/^#+/, '').trim();
  if (!title) {
    throw new QueueItemError(`Queue file title is empty after removing heading marks: ${queuePath}`, queuePath);
  }

  return {
    title,
    body: lines.slice(1).join('\n').trim()
  };
}

export class FileSystemQueueStore implements QueueStore {
  private readonly config: QueueStoreConfig;

  constructor(config: QueueStoreConfig) {
    this.config = config;
  }

  get pendingDir(): string {
    return this.config.pendingDir;
  }

  /**
   * Lists every file in the pending directory, sorted oldest first.
   * Excluded files are returned with category `excluded`.
   */
  async listPending(): Promise<QueueItem[]> {
    const names = await this.listFiles(this.config.pendingDir);
    const items: QueueItem[] = [];

    for (const name of names) {
      const itemPath = path.join(this.config.pendingDir, name);
      const createdAt = parseFilenameTimestamp(name) ?? (await fs.stat(itemPath)).mtime;
      items.push({
        path: itemPath,
        name,
        category: categorizeQueueFile(name),
        createdAt
      });
    }

    return items.sort(compareQueueItems);
  }

  async readItem(item: QueueItem): Promise<QueueItemContent> {
    let raw: string;
    try {
      raw = await fs.readFile(item.path, 'utf-8');
    } catch (error) {
      throw new QueueItemError(
        `Cannot read queue file: ${item.path}`,
        item.path,
        error instanceof Error ? error : undefined
      );
    }
    return parseQueueContent(raw, item.path);
  }

  /**
   * Moves a pending file into the processed directory with a single rename.
   * Falls back to an exclusive copy followed by unlink across devices.
   *
   * @returns The destination path
   * @throws {QueueItemError} If the destination already exists or the move fails
   */
  async movePendingToProcessed(itemPath: string): Promise<string> {
    const destination = path.join(this.config.processedDir, path.basename(itemPath));

    await fs.mkdir(this.config.processedDir, { recursive: true });

    if (await this.exists(destination)) {
      throw new QueueItemError(`Processed destination already exists: ${destination}`, itemPath);
    }

    try {
      await fs.rename(itemPath, destination);
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw new QueueItemError(
          `Failed to move queue file to ${destination}`,
          itemPath,
          error instanceof Error ? error : undefined
        );
      }

      logger.debug('Rename crossed devices, copying queue file instead', { itemPath, destination });
      await fs.copyFile(itemPath, destination, fsConstants.COPYFILE_EXCL);
      await fs.unlink(itemPath);
    }

    logger.info('Queue file moved to processed', { from: itemPath, to: destination });
    return destination;
  }

  async countProcessed(): Promise<number> {
    const names = await this.listFiles(this.config.processedDir);
    return names.filter(name => categorizeQueueFile(name) !== 'excluded').length;
  }

  async latestProcessed(): Promise<ProcessedEntry | undefined> {
    const names = await this.listFiles(this.config.processedDir);
    let latest: ProcessedEntry | undefined;

    for (const name of names) {
      if (categorizeQueueFile(name) === 'excluded') {
        continue;
      }
      const entryPath = path.join(this.config.processedDir, name);
      const { mtime } = await fs.stat(entryPath);
      if (!latest || mtime.getTime() > latest.movedAt.getTime()) {
        latest = { name, path: entryPath, movedAt: mtime };
      }
    }

    return latest;
  }

  private async listFiles(dir: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries.filter(entry => entry.isFile()).map(entry => entry.name);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  private async exists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
