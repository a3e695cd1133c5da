/**
 * Gap Analysis Ensurer Component
 *
 * Keeps exactly one open gap-analysis issue. The issue body always comes from
 * the bundled template; the only edit ever made to an existing issue is
 * replacing a known unsafe legacy body with that template.
 */

import type { ActionWarning, GapAnalysisResult, IssueRecord, LabelConfig } from '../types';
import { logger } from '../utils/logger';
import type { IssueRepository } from './github-repository-client';
import type { TemplateStore } from './template-store';
import { isUnsafeGapAnalysisBody } from './template-store';
import { type AssignmentOptions, assignAutomationActor } from './assignment';
import { categorizeIssue } from './pipeline-rules';

export interface GapAnalysisEnsurerOptions extends AssignmentOptions {
  readonly labels: LabelConfig;
}

export class GapAnalysisEnsurer {
  private readonly repository: IssueRepository;
  private readonly templates: TemplateStore;
  private readonly options: GapAnalysisEnsurerOptions;

  constructor(repository: IssueRepository, templates: TemplateStore, options: GapAnalysisEnsurerOptions) {
    this.repository = repository;
    this.templates = templates;
    this.options = options;
  }

  /**
   * @throws {TemplateCorruptedError} If a new or repaired issue needs the template and it does not parse
   */
  async ensure(): Promise<GapAnalysisResult> {
    const open = await this.findOpenGapAnalysisIssues();
    const warnings: ActionWarning[] = [];

    if (open.length > 1) {
      warnings.push({
        code: 'DUPLICATE_GAP_ANALYSIS_ISSUE',
        message: `Found ${open.length} open gap-analysis issues; using #${open[0].number}, others: #${open
          .slice(1)
          .map(issue => issue.number)
          .join(', #')}`
      });
    }

    const existing = open[0];
    if (existing) {
      if (!isUnsafeGapAnalysisBody(existing.body)) {
        logger.info('Gap analysis issue already open', { issueNumber: existing.number });
        return { created: false, repaired: false, issueNumber: existing.number, issueUrl: existing.url, warnings };
      }
      return this.repair(existing, warnings);
    }

    const template = await this.templates.loadGapAnalysisTemplate();
    const created = await this.repository.createIssue({
      title: template.title,
      body: template.body,
      labels: [this.options.labels.gapAnalysis]
    });
    logger.info('Gap analysis issue created', { issueNumber: created.number });

    warnings.push(...(await assignAutomationActor(this.repository, created.number, this.options)));
    return { created: true, repaired: false, issueNumber: created.number, issueUrl: created.url, warnings };
  }

  private async repair(issue: IssueRecord, warnings: ActionWarning[]): Promise<GapAnalysisResult> {
    const template = await this.templates.loadGapAnalysisTemplate();

    logger.warn('Replacing unsafe gap analysis issue body', { issueNumber: issue.number });
    await this.repository.updateIssueBody(issue.number, template.body);

    warnings.push(...(await assignAutomationActor(this.repository, issue.number, this.options, issue.assignees)));
    return { created: false, repaired: true, issueNumber: issue.number, issueUrl: issue.url, warnings };
  }

  private async findOpenGapAnalysisIssues(): Promise<IssueRecord[]> {
    const issues = await this.repository.listIssues({ state: 'open' });
    return issues
      .filter(issue => categorizeIssue(issue, this.options.labels) === 'gapAnalysis')
      .sort((a, b) => a.number - b.number);
  }
}
