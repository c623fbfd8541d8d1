import type { Config } from '../config/schema.js';
import type { BoardManager } from '../github/board.js';
import type { IssueManager } from '../github/issues.js';
import type { Logger } from '../utils/logger.js';
import { STATUS_DISPLAY, statusOptionId, type StatusKeyword } from './fields.js';

/** Labels that mirror the workflow status on the issue itself. */
export const WORKFLOW_LABELS = ['in-progress', 'in progress', 'in review'] as const;

export const STATUS_LABELS: Partial<Record<StatusKeyword, string>> = {
  'in-progress': 'in progress',
  'in-review': 'in review',
};

export const NO_STATUS = 'No Status';

export interface ChangeStatusResult {
  issueNumber: number;
  itemId: string;
  addedToBoard: boolean;
  previousStatus: string;
  status: string;
  label: string | null;
}

export interface ChangeStatusDeps {
  config: Config;
  board: Pick<BoardManager, 'findItemByIssueNumber' | 'addItem' | 'setSingleSelect'>;
  issues: Pick<IssueManager, 'getIssue' | 'addLabels' | 'removeLabel'>;
  log: Logger;
}

/**
 * Move an issue's board Status. Adds the issue to the board first when it is
 * not there yet. The keyword is already validated, so nothing here can fail
 * on input.
 */
export async function changeStatus(
  issueNumber: number,
  keyword: StatusKeyword,
  deps: ChangeStatusDeps
): Promise<ChangeStatusResult> {
  const { config, board, issues, log } = deps;
  const display = STATUS_DISPLAY[keyword];
  const optionId = statusOptionId(config.project, keyword);

  const lookup = await board.findItemByIssueNumber(issueNumber);
  let itemId: string;
  let previousStatus = NO_STATUS;
  let addedToBoard = false;

  if (lookup.found) {
    itemId = lookup.item.itemId;
    previousStatus = lookup.item.fieldValuesById[config.project.fields.status] ?? NO_STATUS;
  } else {
    log.warn(`Issue #${issueNumber} not found in project board. Adding it now...`);
    const issue = await issues.getIssue(issueNumber);
    itemId = await board.addItem(issue.nodeId);
    addedToBoard = true;
    log.success('Added issue to project board');
  }

  log.info(`Updating status of #${issueNumber} from ${previousStatus} to ${display}...`);
  const newStatus = await board.setSingleSelect(itemId, config.project.fields.status, optionId);
  log.success('Status updated successfully');

  let label: string | null = null;
  const statusLabel = STATUS_LABELS[keyword];
  if (config.workflow.syncStatusLabels && statusLabel) {
    for (const stale of WORKFLOW_LABELS) {
      if (stale === statusLabel) continue;
      try {
        await issues.removeLabel(issueNumber, stale);
      } catch (error) {
        log.debug(`Could not remove label '${stale}'`, { error: error instanceof Error ? error.message : String(error) });
      }
    }
    await issues.addLabels(issueNumber, [statusLabel]);
    label = statusLabel;
    log.success(`Added '${statusLabel}' label`);
  }

  return { issueNumber, itemId, addedToBoard, previousStatus, status: newStatus ?? display, label };
}
