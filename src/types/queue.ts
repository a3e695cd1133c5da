/**
 * Issue queue types
 */

export type QueueCategory = 'development' | 'capability' | 'excluded';

export interface QueueItem {
  /** Absolute path of the file inside the pending directory */
  readonly path: string;
  /** File name, used as the queue id */
  readonly name: string;
  readonly category: QueueCategory;
  readonly createdAt: Date;
}

export interface QueueItemContent {
  readonly title: string;
  readonly body: string;
}

export interface ProcessedEntry {
  readonly name: string;
  readonly path: string;
  readonly movedAt: Date;
}
