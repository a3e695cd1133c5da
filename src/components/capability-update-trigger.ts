/**
 * Capability Update Trigger Component
 *
 * After a development PR merges, opens an issue asking for the system
 * capabilities document to be updated from the PR's description and
 * discussion, so the update is grounded in what reviewers actually saw.
 */

import type { CapabilityUpdateResult, DiscussionItem, LabelConfig, PullRequest } from '../types';
import { logger } from '../utils/logger';
import type { IssueRepository } from './github-repository-client';
import type { TemplateStore } from './template-store';
import { type AssignmentOptions, assignAutomationActor } from './assignment';
import { capabilityUpdateTitle } from './pipeline-rules';

const PLACEHOLDER = /\{\{(PR_NUMBER|PR_TITLE|PR_URL|PR_DESCRIPTION|PR_COMMENTS)\}\}/g;

/**
 * Renders discussion items as a Markdown list, oldest first
 */
export function renderDiscussion(items: DiscussionItem[]): string {
  if (items.length === 0) {
    return '(no PR comments)';
  }

  const ordered = [...items].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  const parts: string[] = [];
  for (const item of ordered) {
    const body = item.body.trim() || '(empty)';
    parts.push(`- **${item.createdAt.toISOString()}** *(${item.kind} by ${item.author})*`);
    parts.push(...body.split('\n').map(line => `  ${line}`));
    if (item.url) {
      parts.push(`  URL: ${item.url}`);
    }
  }
  return parts.join('\n');
}

/**
 * Fills the template in one pass, so text inside the PR description is never
 * treated as a placeholder
 */
export function renderCapabilityUpdateBody(template: string, pullRequest: PullRequest, discussion: DiscussionItem[]): string {
  const values: Record<string, string> = {
    PR_NUMBER: String(pullRequest.number),
    PR_TITLE: pullRequest.title,
    PR_URL: pullRequest.url,
    PR_DESCRIPTION: pullRequest.body.trim() || '(no PR description)',
    PR_COMMENTS: renderDiscussion(discussion)
  };
  return template.replace(PLACEHOLDER, (match: string, key: string) => values[key] ?? match);
}

export interface CapabilityUpdateTriggerOptions extends AssignmentOptions {
  readonly labels: LabelConfig;
}

export class CapabilityUpdateTrigger {
  private readonly repository: IssueRepository;
  private readonly templates: TemplateStore;
  private readonly options: CapabilityUpdateTriggerOptions;

  constructor(repository: IssueRepository, templates: TemplateStore, options: CapabilityUpdateTriggerOptions) {
    this.repository = repository;
    this.templates = templates;
    this.options = options;
  }

  /**
   * Creates the follow-up issue for a merged development PR, or returns the
   * open one that already exists for it
   */
  async onMerge(pullRequest: PullRequest): Promise<CapabilityUpdateResult> {
    const title = capabilityUpdateTitle(pullRequest.number);
    const open = await this.repository.listIssues({ state: 'open' });
    const existing = open.filter(issue => issue.title === title).sort((a, b) => a.number - b.number)[0];

    if (existing) {
      logger.info('Capability update issue already open', { issueNumber: existing.number, pullNumber: pullRequest.number });
      const warnings = await assignAutomationActor(this.repository, existing.number, this.options, existing.assignees);
      return { issueNumber: existing.number, issueUrl: existing.url, created: false, warnings };
    }

    const template = await this.templates.loadCapabilityUpdateTemplate();
    const discussion = await this.repository.listPullRequestDiscussion(pullRequest.number);
    const created = await this.repository.createIssue({
      title,
      body: renderCapabilityUpdateBody(template, pullRequest, discussion),
      labels: [this.options.labels.capabilityUpdate]
    });
    logger.info('Capability update issue created', { issueNumber: created.number, pullNumber: pullRequest.number });

    const warnings = await assignAutomationActor(this.repository, created.number, this.options);
    return { issueNumber: created.number, issueUrl: created.url, created: true, warnings };
  }
}
