/**
 * Unit tests for CapabilityUpdateTrigger
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as path from 'path';
import { CapabilityUpdateTrigger, renderCapabilityUpdateBody, renderDiscussion } from './capability-update-trigger';
import { LocalTemplateStore } from './template-store';
import type { DiscussionItem } from '../types';
import { InMemoryIssueRepository } from '../testing/in-memory-issue-repository';
import { TEST_LABELS, makePullRequest } from '../testing/fixtures';

vi.mock('../utils/logger');

const discussion: DiscussionItem[] = [
  {
    kind: 'REVIEW_COMMENT',
    author: 'carol',
    body: 'Rename this\nplease',
    createdAt: new Date('2025-01-02T00:00:00Z'),
    url: 'https://github.com/acme/widgets/pull/5#r1'
  },
  {
    kind: 'ISSUE_COMMENT',
    author: 'alice',
    body: '  ',
    createdAt: new Date('2025-01-01T00:00:00Z')
  }
];

describe('renderDiscussion', () => {
  it('should render items oldest first with indented bodies', () => {
    expect(renderDiscussion(discussion)).toBe(
      [
        '- **2025-01-01T00:00:00.000Z** *(ISSUE_COMMENT by alice)*',
        '  (empty)',
        '- **2025-01-02T00:00:00.000Z** *(REVIEW_COMMENT by carol)*',
        '  Rename this',
        '  please',
        '  URL: https://github.com/acme/widgets/pull/5#r1'
      ].join('\n')
    );
  });

  it('should say when there is no discussion', () => {
    expect(renderDiscussion([])).toBe('(no PR comments)');
  });
});

describe('renderCapabilityUpdateBody', () => {
  it('should fill every placeholder', () => {
    const pull = makePullRequest({ number: 5, title: 'Add retry logic', body: 'Retries uploads.\n' });

    expect(
      renderCapabilityUpdateBody('#{{PR_NUMBER}} {{PR_TITLE}} {{PR_URL}}\n{{PR_DESCRIPTION}}\n{{PR_COMMENTS}}', pull, [])
    ).toBe('#5 Add retry logic https://github.com/acme/widgets/pull/5\nRetries uploads.\n(no PR comments)');
  });

  it('should not expand placeholders or replacement patterns inside the PR description', () => {
    const pull = makePullRequest({ number: 5, body: 'Costs $& and mentions {{PR_COMMENTS}}' });

    expect(renderCapabilityUpdateBody('{{PR_DESCRIPTION}}|{{PR_COMMENTS}}', pull, [])).toBe(
      'Costs $& and mentions {{PR_COMMENTS}}|(no PR comments)'
    );
  });

  it('should note a missing description', () => {
    expect(renderCapabilityUpdateBody('{{PR_DESCRIPTION}}', makePullRequest({ number: 5 }), [])).toBe(
      '(no PR description)'
    );
  });
});

describe('CapabilityUpdateTrigger', () => {
  let repository: InMemoryIssueRepository;
  let trigger: CapabilityUpdateTrigger;

  beforeEach(() => {
    repository = new InMemoryIssueRepository();
    trigger = new CapabilityUpdateTrigger(repository, new LocalTemplateStore(path.resolve(__dirname, '../../templates')), {
      automationAssignee: 'copilot-swe-agent',
      labels: TEST_LABELS
    });
  });

  it('should create a labelled, assigned issue from the bundled template', async () => {
    repository.addPullRequest({ number: 5, title: 'Add retry logic', body: 'Retries uploads.', discussion });
    const pull = makePullRequest({ number: 5, title: 'Add retry logic', body: 'Retries uploads.' });

    const result = await trigger.onMerge(pull);

    expect(result).toEqual({
      issueNumber: 100,
      issueUrl: 'https://github.com/acme/widgets/issues/100',
      created: true,
      warnings: []
    });
    const issue = repository.issues.get(100);
    expect(issue?.title).toBe('Update system capabilities based on merged PR #5');
    expect(issue?.labels).toEqual(['Update Capability']);
    expect(issue?.assignees).toEqual(['copilot-swe-agent']);
    expect(issue?.body).toContain('Pull request #5 (Add retry logic) was merged: https://github.com/acme/widgets/pull/5');
    expect(issue?.body).toContain('Retries uploads.');
    expect(issue?.body).toContain('  Rename this\n  please');
    expect(issue?.body).not.toContain('{{');
  });

  it('should reuse an open issue with the same title', async () => {
    repository.addIssue({
      number: 60,
      title: 'Update system capabilities based on merged PR #5',
      assignees: ['copilot-swe-agent']
    });
    const createSpy = vi.spyOn(repository, 'createIssue');

    const result = await trigger.onMerge(makePullRequest({ number: 5 }));

    expect(result).toMatchObject({ issueNumber: 60, created: false, warnings: [] });
    expect(createSpy).not.toHaveBeenCalled();
  });
});
