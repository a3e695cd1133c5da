/**
 * Unit tests for the pipeline rule tables
 */

import { describe, it, expect } from 'vitest';
import {
  MERGE_PRIORITY,
  STAGE_LABELS,
  STAGE_RULES,
  capabilityUpdateTitle,
  categorizeIssue,
  categoryLabel,
  selectNextQueueItem,
  stageStep
} from './pipeline-rules';
import { STAGES } from '../types';
import type { IssueRecord } from '../types';
import { TEST_LABELS, makeQueueItem } from '../testing/fixtures';

function record(title: string, labels: string[] = []): IssueRecord {
  return {
    number: 1,
    title,
    body: '',
    url: 'https://github.com/acme/widgets/issues/1',
    state: 'open',
    labels,
    assignees: [],
    createdAt: new Date('2025-01-01T00:00:00Z')
  };
}

describe('categorizeIssue', () => {
  it('should categorise by label, ignoring case', () => {
    expect(categorizeIssue(record('Anything', ['gap analysis']), TEST_LABELS)).toBe('gapAnalysis');
    expect(categorizeIssue(record('Anything', ['Update Capability']), TEST_LABELS)).toBe('capability');
    expect(categorizeIssue(record('Anything', ['bug', 'Development']), TEST_LABELS)).toBe('development');
  });

  it('should fall back to the fixed titles', () => {
    expect(categorizeIssue(record('Identify the next most important development gap'), TEST_LABELS)).toBe(
      'gapAnalysis'
    );
    expect(categorizeIssue(record('Update system capabilities based on merged PR #5'), TEST_LABELS)).toBe(
      'capability'
    );
  });

  it('should ignore issues outside the loop', () => {
    expect(categorizeIssue(record('Typo in README', ['documentation']), TEST_LABELS)).toBeUndefined();
  });
});

describe('categoryLabel', () => {
  it('should map each category to its configured label', () => {
    expect(categoryLabel('gapAnalysis', TEST_LABELS)).toBe('Gap Analysis');
    expect(categoryLabel('capability', TEST_LABELS)).toBe('Update Capability');
    expect(categoryLabel('development', TEST_LABELS)).toBe('Development');
  });
});

describe('stage tables', () => {
  it('should number the stages from zero in pipeline order', () => {
    expect(stageStep('GAP_ISSUE')).toBe(0);
    expect(stageStep('DEV_ISSUE_CREATION')).toBe(3);
    expect(stageStep('CAP_MERGE')).toBe(8);
  });

  it('should label every stage', () => {
    for (const stage of STAGES) {
      expect(STAGE_LABELS[stage]).toBeTruthy();
    }
  });

  it('should order the rules gap first, then capability, then development', () => {
    expect(STAGE_RULES.map(rule => rule.stage)).toEqual([
      'GAP_ISSUE',
      'GAP_MERGE',
      'GAP_EXECUTION',
      'CAP_MERGE',
      'CAP_EXECUTION',
      'CAP_ISSUE',
      'DEV_MERGE',
      'DEV_EXECUTION',
      'DEV_ISSUE_CREATION',
      'GAP_EXECUTION'
    ]);
  });

  it('should merge capability work before gap analysis and development', () => {
    expect(MERGE_PRIORITY).toEqual(['capability', 'gapAnalysis', 'development']);
  });

  it('should promote the oldest capability item before any development item', () => {
    const items = [
      makeQueueItem('.gitkeep', '2024-12-01T00:00:00Z', 'excluded'),
      makeQueueItem('dev-20250101T000000.md', '2025-01-01T00:00:00Z', 'development'),
      makeQueueItem('cap-20250301T000000.md', '2025-03-01T00:00:00Z', 'capability'),
      makeQueueItem('cap-20250201T000000.md', '2025-02-01T00:00:00Z', 'capability')
    ];

    expect(selectNextQueueItem(items)?.name).toBe('cap-20250201T000000.md');
    expect(selectNextQueueItem(items.filter(item => item.category !== 'capability'))?.name).toBe(
      'dev-20250101T000000.md'
    );
    expect(selectNextQueueItem([items[0]])).toBeUndefined();
  });

  it('should build the capability update title', () => {
    expect(capabilityUpdateTitle(5)).toBe('Update system capabilities based on merged PR #5');
  });
});
