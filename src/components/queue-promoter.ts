/**
 * Queue Promoter Component
 *
 * Turns the next pending queue file into a GitHub issue: the oldest
 * capability update first, then the oldest development item. The file is moved
 * to processed only after the issue exists, and the issue carries a hidden
 * marker naming the file, so a retry after a failed move finds the issue
 * instead of creating a second one.
 */

import type { ActionWarning, IssueCategory, LabelConfig, PromotionResult, QueueItem } from '../types';
import { EmptyQueueError } from '../errors';
import { logger } from '../utils/logger';
import type { IssueRepository } from './github-repository-client';
import type { QueueStore } from './queue-store';
import { type AssignmentOptions, assignAutomationActor } from './assignment';
import { categoryLabel, selectNextQueueItem } from './pipeline-rules';

export function queueMarker(queueFileName: string): string {
  return `<!-- issue-loop-queue-id: ${queueFileName} -->`;
}

export function buildIssueBody(body: string, queueFileName: string): string {
  const marker = queueMarker(queueFileName);
  return body ? `${body}\n\n${marker}` : marker;
}

export interface QueuePromoterOptions extends AssignmentOptions {
  readonly labels: LabelConfig;
}

export class QueuePromoter {
  private readonly queueStore: QueueStore;
  private readonly repository: IssueRepository;
  private readonly options: QueuePromoterOptions;

  constructor(queueStore: QueueStore, repository: IssueRepository, options: QueuePromoterOptions) {
    this.queueStore = queueStore;
    this.repository = repository;
    this.options = options;
  }

  /**
   * Promotes the single pending item the stage snapshot reports as next
   *
   * @throws {EmptyQueueError} If nothing is pending
   * @throws {QueueItemError} If the file is unreadable, has no title or cannot be moved
   */
  async promoteNext(): Promise<PromotionResult> {
    const items = await this.queueStore.listPending();
    const item = selectNextQueueItem(items);
    if (!item) {
      throw new EmptyQueueError('No pending queue items to promote', this.queueStore.pendingDir);
    }

    logger.info('Promoting queue item', { name: item.name, category: item.category });

    const content = await this.queueStore.readItem(item);
    const marker = queueMarker(item.name);
    const existing = await this.repository.findIssueByBodyMarker(marker);

    let issueNumber: number;
    let issueUrl: string;
    let currentAssignees: string[] = [];
    if (existing) {
      logger.info('Reusing issue already created for queue item', { name: item.name, issueNumber: existing.number });
      issueNumber = existing.number;
      issueUrl = existing.url;
      currentAssignees = existing.assignees;
    } else {
      const created = await this.repository.createIssue({
        title: content.title,
        body: buildIssueBody(content.body, item.name),
        labels: [categoryLabel(this.issueCategory(item), this.options.labels)]
      });
      issueNumber = created.number;
      issueUrl = created.url;
    }

    const warnings: ActionWarning[] = await assignAutomationActor(
      this.repository,
      issueNumber,
      this.options,
      currentAssignees
    );

    const processedPath = await this.queueStore.movePendingToProcessed(item.path);

    logger.info('Queue item promoted', { name: item.name, issueNumber, created: !existing });

    return {
      issueNumber,
      issueUrl,
      queuePath: item.path,
      processedPath,
      created: !existing,
      warnings
    };
  }

  private issueCategory(item: QueueItem): IssueCategory {
    return item.category === 'capability' ? 'capability' : 'development';
  }
}
