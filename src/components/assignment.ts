/**
 * Best-effort assignment of the automation actor. An issue that already
 * exists is never rolled back because its assignee could not be added.
 */

import type { ActionWarning, AgentAssignment } from '../types';
import { UpstreamApiError } from '../errors';
import { logger } from '../utils/logger';
import type { IssueRepository } from './github-repository-client';

export interface AssignmentOptions {
  readonly automationAssignee: string;
  /** Sent only when the assignee is a Copilot login */
  readonly agentAssignment?: AgentAssignment;
}

export function isCopilotLogin(login: string): boolean {
  return login.toLowerCase().includes('copilot');
}

/**
 * Whether an assignee GitHub reports is the automation actor. GitHub lists
 * the Copilot coding agent as `Copilot` whichever bot login assigned it.
 */
export function isAutomationActor(login: string, assignee: string): boolean {
  if (login.toLowerCase() === assignee.toLowerCase()) {
    return true;
  }
  return isCopilotLogin(assignee) && isCopilotLogin(login);
}

export async function assignAutomationActor(
  repository: IssueRepository,
  issueNumber: number,
  options: AssignmentOptions,
  currentAssignees: string[] = []
): Promise<ActionWarning[]> {
  const assignee = options.automationAssignee;
  if (currentAssignees.some(login => isAutomationActor(login, assignee))) {
    return [];
  }

  const agentAssignment = isCopilotLogin(assignee) ? options.agentAssignment : undefined;

  let assigned: string[];
  try {
    assigned = await repository.addAssignees(issueNumber, [assignee], agentAssignment);
  } catch (error) {
    if (!(error instanceof UpstreamApiError)) {
      throw error;
    }
    logger.warn('Failed to assign automation actor', { issueNumber, assignee, error: error.message });
    return [{ code: 'ASSIGNEE_UNAVAILABLE', message: `Could not assign ${assignee} to #${issueNumber}: ${error.message}` }];
  }

  if (!assigned.some(login => isAutomationActor(login, assignee))) {
    logger.warn('Automation actor was not accepted as assignee', { issueNumber, assignee });
    return [{ code: 'ASSIGNEE_UNAVAILABLE', message: `${assignee} cannot be assigned to #${issueNumber}` }];
  }

  logger.info('Automation actor assigned', { issueNumber, assignee });
  return [];
}
