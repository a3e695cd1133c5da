/**
 * Template Store Component
 *
 * Loads the issue templates that ship with the engine. Templates are never
 * read from the target repository, so unreviewed edits there cannot change
 * what the automation is told to do.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { TemplateCorruptedError } from '../errors';
import { logger } from '../utils/logger';

export const GAP_ANALYSIS_TEMPLATE_FILE = 'gap-analysis.md';
export const CAPABILITY_UPDATE_TEMPLATE_FILE = 'capability-update.md';

/**
 * Placeholders the capability update template must contain.
 * `{{PR_TITLE}}` and `{{PR_URL}}` are optional.
 */
export const REQUIRED_CAPABILITY_PLACEHOLDERS = ['{{PR_NUMBER}}', '{{PR_DESCRIPTION}}', '{{PR_COMMENTS}}'] as const;

/**
 * Bodies written by earlier versions of the loop that told the assigned agent
 * to act on its own issue. An agent following them re-creates the prompt it
 * is working on instead of producing a queue file.
 */
export const UNSAFE_GAP_ANALYSIS_PATTERNS: readonly RegExp[] = [
  /\b(?:create|open)\s+(?:a\s+)?(?:new\s+)?(?:github\s+)?issue\s+(?:titled|called|named)\s+["'`]?identify the next most important development gap/i,
  /\b(?:re-?open|re-?create|duplicate)\s+this\s+issue\b/i,
  /\bassign\s+(?:this\s+issue|it)\s+(?:back\s+)?to\s+(?:yourself|copilot)\b/i,
  /\b(?:create|open)\s+(?:a\s+)?(?:new\s+|another\s+)?gap[- ]analysis\s+issue\b/i
];

export interface GapAnalysisTemplate {
  readonly title: string;
  readonly body: string;
}

export interface TemplateStore {
  loadGapAnalysisTemplate(): Promise<GapAnalysisTemplate>;
  loadCapabilityUpdateTemplate(): Promise<string>;
}

export function isUnsafeGapAnalysisBody(body: string): boolean {
  return UNSAFE_GAP_ANALYSIS_PATTERNS.some(pattern => pattern.test(body));
}

/**
 * Splits the gap analysis template into its H1 title and the remaining body
 *
 * @throws {TemplateCorruptedError} If the title or body is missing, or the body is itself unsafe
 */
export function parseGapAnalysisTemplate(raw: string, templatePath: string): GapAnalysisTemplate {
  const lines = raw.replace(/\r\n/g, '\n').split('\n');
  const headingIndex = lines.findIndex(line => line.trim() !== '');
  const heading = headingIndex === -1 ? undefined : /^#\s+(.+)$/.exec(lines[headingIndex].trim());
  const problems: string[] = [];

  const title = heading ? heading[1].trim() : '';
  if (!title) {
    problems.push('first non-empty line must be a level-one heading');
  }

  const body = headingIndex === -1 ? '' : lines.slice(headingIndex + 1).join('\n').trim();
  if (!body) {
    problems.push('body after the heading is empty');
  }
  if (/\{\{[A-Z_]+\}\}/.test(body)) {
    problems.push('body contains unfilled placeholders');
  }
  if (isUnsafeGapAnalysisBody(body)) {
    problems.push('body matches a known unsafe self-referential pattern');
  }

  if (problems.length > 0) {
    throw new TemplateCorruptedError(`Gap analysis template is corrupted: ${templatePath}`, templatePath, problems);
  }

  return { title, body };
}

/**
 * @throws {TemplateCorruptedError} If a required placeholder is missing
 */
export function validateCapabilityUpdateTemplate(raw: string, templatePath: string): string {
  const problems: string[] = [];

  if (!raw.trim()) {
    problems.push('template is empty');
  }
  for (const placeholder of REQUIRED_CAPABILITY_PLACEHOLDERS) {
    if (!raw.includes(placeholder)) {
      problems.push(`missing placeholder ${placeholder}`);
    }
  }

  if (problems.length > 0) {
    throw new TemplateCorruptedError(`Capability update template is corrupted: ${templatePath}`, templatePath, problems);
  }

  return raw;
}

export class LocalTemplateStore implements TemplateStore {
  private readonly templatesDir: string;

  constructor(templatesDir: string) {
    this.templatesDir = templatesDir;
  }

  async loadGapAnalysisTemplate(): Promise<GapAnalysisTemplate> {
    const templatePath = path.join(this.templatesDir, GAP_ANALYSIS_TEMPLATE_FILE);
    const raw = await this.read(templatePath);
    return parseGapAnalysisTemplate(raw, templatePath);
  }

  async loadCapabilityUpdateTemplate(): Promise<string> {
    const templatePath = path.join(this.templatesDir, CAPABILITY_UPDATE_TEMPLATE_FILE);
    const raw = await this.read(templatePath);
    return validateCapabilityUpdateTemplate(raw, templatePath);
  }

  private async read(templatePath: string): Promise<string> {
    try {
      const raw = await fs.readFile(templatePath, 'utf-8');
      logger.debug('Template loaded', { templatePath, length: raw.length });
      return raw;
    } catch (error) {
      throw new TemplateCorruptedError(
        `Cannot read template: ${templatePath}`,
        templatePath,
        [error instanceof Error ? error.message : String(error)],
        error instanceof Error ? error : undefined
      );
    }
  }
}
