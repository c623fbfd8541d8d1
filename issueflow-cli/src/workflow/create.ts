import type { Config } from '../config/schema.js';
import type { IssueManager } from '../github/issues.js';
import type { BoardManager } from '../github/board.js';
import type { Logger } from '../utils/logger.js';
import { UsageError } from '../utils/errors.js';
import {
  estimateForSize,
  normalizePriority,
  normalizeSize,
  STATUS_DISPLAY,
  type Priority,
  type Size,
} from './fields.js';

export interface CreateIssueInput {
  title: string;
  body?: string;
  /** Comma-separated list, as typed on the command line */
  labels?: string;
  priority?: string;
  size?: string;
}

export interface CreateIssueResult {
  number: number;
  url: string;
  labels: string[];
  priority: Priority;
  size: Size;
  estimate: number;
  addedToBoard: boolean;
  /** Board fields that could not be set */
  failedFields: string[];
}

export interface CreateIssueDeps {
  config: Config;
  issues: Pick<IssueManager, 'createIssue'>;
  board: Pick<BoardManager, 'addItem' | 'setSingleSelect' | 'setNumber'>;
  log: Logger;
}

export function parseLabelList(labels: string | undefined): string[] {
  if (!labels) return [];
  return labels
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create an issue, put it on the board and set Status=Backlog, Priority,
 * Size and the Estimate derived from Size. Board failures are warnings; the
 * created issue is never rolled back.
 */
export async function createIssue(input: CreateIssueInput, deps: CreateIssueDeps): Promise<CreateIssueResult> {
  const { config, issues, board, log } = deps;
  const title = input.title.trim();
  if (!title) {
    throw new UsageError('Issue title must not be empty', { argument: 'title' });
  }

  const priority = normalizePriority(input.priority);
  if (priority.fallback) {
    log.warn(`Unknown priority '${input.priority}', using ${priority.value}`);
  }
  const size = normalizeSize(input.size);
  if (size.fallback) {
    log.warn(`Unknown size '${input.size}', using ${size.value}`);
  }
  const estimate = estimateForSize(size.value);
  const labels = parseLabelList(input.labels);

  log.step(1, 2, 'Creating issue...');
  const issue = await issues.createIssue({ title, body: input.body ?? '', labels });
  log.success(`Created issue #${issue.number}`);
  log.info(`URL: ${issue.htmlUrl}`);

  const result: CreateIssueResult = {
    number: issue.number,
    url: issue.htmlUrl,
    labels: issue.labels,
    priority: priority.value,
    size: size.value,
    estimate,
    addedToBoard: false,
    failedFields: [],
  };

  log.step(2, 2, 'Adding to project board...');
  let itemId: string;
  try {
    itemId = await board.addItem(issue.nodeId);
  } catch (error) {
    log.warn(`Failed to add to project board: ${describe(error)}`);
    result.failedFields.push('Status', 'Priority', 'Size', 'Estimate');
    return result;
  }
  result.addedToBoard = true;
  log.success('Added to project board');

  const { project } = config;
  const updates: Array<{ name: string; display: string; apply: () => Promise<unknown> }> = [
    {
      name: 'Status',
      display: STATUS_DISPLAY.backlog,
      apply: () => board.setSingleSelect(itemId, project.fields.status, project.statusOptions.backlog),
    },
    {
      name: 'Priority',
      display: priority.value,
      apply: () => board.setSingleSelect(itemId, project.fields.priority, project.priorityOptions[priority.value]),
    },
    {
      name: 'Size',
      display: size.value,
      apply: () => board.setSingleSelect(itemId, project.fields.size, project.sizeOptions[size.value]),
    },
    {
      name: 'Estimate',
      display: `${estimate} hours`,
      apply: () => board.setNumber(itemId, project.fields.estimate, estimate),
    },
  ];

  for (const update of updates) {
    try {
      await update.apply();
      log.success(`Set ${update.name.toLowerCase()} to ${update.display}`);
    } catch (error) {
      result.failedFields.push(update.name);
      log.warn(`Failed to set ${update.name.toLowerCase()}: ${describe(error)}`);
    }
  }

  return result;
}
