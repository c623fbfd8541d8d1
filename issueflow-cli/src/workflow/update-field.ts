import type { Config } from '../config/schema.js';
import type { BoardManager } from '../github/board.js';
import type { Logger } from '../utils/logger.js';
import { WorkflowError, ErrorCode } from '../utils/errors.js';
import { resolveFieldUpdate, type UpdatableField } from './fields.js';

export interface UpdateFieldResult {
  issueNumber: number;
  field: UpdatableField;
  value: string;
  itemId: string;
}

export interface UpdateFieldDeps {
  config: Config;
  board: Pick<BoardManager, 'findItemByIssueNumber' | 'setSingleSelect' | 'setNumber'>;
  log: Logger;
}

export async function updateField(
  issueNumber: number,
  field: string,
  value: string,
  deps: UpdateFieldDeps
): Promise<UpdateFieldResult> {
  const { config, board, log } = deps;
  // Validated before anything touches the network.
  const update = resolveFieldUpdate(config.project, field, value);

  log.info(`Updating ${update.field} of issue #${issueNumber} to ${update.display}`);

  const lookup = await board.findItemByIssueNumber(issueNumber);
  if (!lookup.found) {
    throw new WorkflowError(
      ErrorCode.WORKFLOW_BOARD_ITEM_NOT_FOUND,
      `Issue #${issueNumber} not found in project board (${lookup.scanned} items scanned)`,
      { issueNumber }
    );
  }

  const { itemId } = lookup.item;
  if (update.kind === 'option') {
    await board.setSingleSelect(itemId, update.fieldId, update.optionId);
  } else {
    await board.setNumber(itemId, update.fieldId, update.value);
  }

  log.success(`Updated ${update.field} to ${update.display}`);
  return { issueNumber, field: update.field, value: update.display, itemId };
}
