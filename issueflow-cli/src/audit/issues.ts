import type { Config } from '../config/schema.js';
import type { BoardManager } from '../github/board.js';
import type { Issue, IssueManager } from '../github/issues.js';
import type { PRManager } from '../github/pulls.js';
import type { Logger } from '../utils/logger.js';
import { daysSince, systemClock, type Clock } from '../utils/time.js';
import { extractCodeElements, extractFileReferences, extractIssueReferences } from './text.js';

export interface BoardFields {
  status: string | null;
  priority: string | null;
  size: string | null;
  estimate: string | null;
}

export interface LinkedPR {
  number: number;
  state: string;
}

export interface IssueAuditEntry {
  number: number;
  title: string;
  url: string;
  author: string;
  createdAt: string;
  ageDays: number | null;
  updatedAt: string;
  inactiveDays: number | null;
  labels: string[];
  assignees: string[];
  comments: number;
  files: string[];
  /** Only filled when no files are mentioned */
  codeElements: string[];
  linkedPRs: LinkedPR[];
  notes: string[];
  /** null when the issue is not on the board or the board could not be read */
  board: BoardFields | null;
}

export interface LabelCount {
  label: string;
  count: number;
}

export interface IssueAuditReport {
  repository: string;
  issues: IssueAuditEntry[];
  summary: {
    total: number;
    byLabel: LabelCount[];
    unassigned: number;
  };
}

export interface AuditIssuesDeps {
  config: Config;
  issues: Pick<IssueManager, 'listOpenIssues' | 'listComments'>;
  pulls: Pick<PRManager, 'getPR'>;
  board: Pick<BoardManager, 'listItems'>;
  log: Logger;
  clock?: Clock;
}

export function issueNotes(issue: Pick<Issue, 'labels' | 'assignees'>, ageDays: number | null, inactiveDays: number | null): string[] {
  const notes: string[] = [];
  if (issue.labels.some((label) => label.toLowerCase() === 'bug')) {
    notes.push('Bug report - needs fixing');
  }
  if (issue.assignees.length === 0) {
    notes.push('Unassigned - needs someone to work on it');
  }
  if (ageDays !== null && ageDays > 30) {
    notes.push('Over 30 days old - may need attention');
  } else if (ageDays !== null && ageDays > 14) {
    notes.push('Over 2 weeks old');
  }
  if (inactiveDays !== null && inactiveDays > 7) {
    notes.push(`No activity for ${inactiveDays} days`);
  }
  return notes;
}

export function countLabels(issues: Pick<Issue, 'labels'>[]): LabelCount[] {
  const counts = new Map<string, number>();
  for (const issue of issues) {
    for (const label of issue.labels) {
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([label, count]) => ({ label, count }))
    .sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));
}

async function loadBoardFields(deps: AuditIssuesDeps): Promise<Map<number, BoardFields>> {
  const { fields } = deps.config.project;
  const byIssue = new Map<number, BoardFields>();
  try {
    for (const item of await deps.board.listItems()) {
      if (item.issueNumber === null) continue;
      byIssue.set(item.issueNumber, {
        status: item.fieldValuesById[fields.status] ?? null,
        priority: item.fieldValuesById[fields.priority] ?? null,
        size: item.fieldValuesById[fields.size] ?? null,
        estimate: item.fieldValuesById[fields.estimate] ?? null,
      });
    }
  } catch (error) {
    deps.log.warn('Could not read the project board; board fields are omitted', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return byIssue;
}

/**
 * Read-only report over every open issue (first page of 100).
 */
export async function auditIssues(deps: AuditIssuesDeps): Promise<IssueAuditReport> {
  const { config, issues, pulls, log } = deps;
  const now = (deps.clock ?? systemClock)();
  const repository = `${config.repo.owner}/${config.repo.name}`;

  log.info('Fetching open issues...');
  const open = await issues.listOpenIssues();
  const board = open.length > 0 ? await loadBoardFields(deps) : new Map<number, BoardFields>();

  // A number referenced from several issues is looked up once.
  const prCache = new Map<number, LinkedPR | null>();
  const lookupPR = async (number: number): Promise<LinkedPR | null> => {
    const cached = prCache.get(number);
    if (cached !== undefined) return cached;
    const pr = await pulls.getPR(number);
    const linked = pr ? { number: pr.number, state: pr.state } : null;
    prCache.set(number, linked);
    return linked;
  };

  const entries: IssueAuditEntry[] = [];
  for (const issue of open) {
    const ageDays = daysSince(issue.createdAt, now);
    const inactiveDays = daysSince(issue.updatedAt, now);
    const titleAndBody = `${issue.title} ${issue.body}`;
    const files = extractFileReferences(titleAndBody);
    const codeElements = files.length === 0 ? extractCodeElements(titleAndBody) : [];

    const comments = await issues.listComments(issue.number);
    const refs = extractIssueReferences([issue.body, ...comments.map((comment) => comment.body)].join(' '));
    const linkedPRs: LinkedPR[] = [];
    for (const ref of refs) {
      const linked = await lookupPR(ref);
      if (linked) linkedPRs.push(linked);
    }

    entries.push({
      number: issue.number,
      title: issue.title,
      url: issue.htmlUrl,
      author: issue.author,
      createdAt: issue.createdAt,
      ageDays,
      updatedAt: issue.updatedAt,
      inactiveDays,
      labels: issue.labels,
      assignees: issue.assignees,
      comments: issue.comments,
      files,
      codeElements,
      linkedPRs,
      notes: issueNotes(issue, ageDays, inactiveDays),
      board: board.get(issue.number) ?? null,
    });
  }

  return {
    repository,
    issues: entries,
    summary: {
      total: entries.length,
      byLabel: countLabels(open),
      unassigned: open.filter((issue) => issue.assignees.length === 0).length,
    },
  };
}

export function printIssueAudit(report: IssueAuditReport, log: Logger): void {
  log.header('GitHub Issues Audit Report');
  log.print(`Repository: ${report.repository}`);
  log.print();

  if (report.issues.length === 0) {
    log.success('No open issues found.');
    return;
  }

  log.print(`Found ${report.summary.total} open issue(s)`);
  log.print();

  for (const entry of report.issues) {
    log.print(`Issue #${entry.number}: ${entry.title}`);
    log.print(`  URL: ${entry.url}`);
    log.print(`  Author: @${entry.author}`);
    log.print(`  Created: ${entry.createdAt} (${entry.ageDays ?? 'unknown'} days ago)`);
    log.print(`  Last Updated: ${entry.updatedAt}`);
    if (entry.labels.length > 0) {
      log.print(`  Labels: ${entry.labels.join(',')}`);
    }
    log.print(`  Assignees: ${entry.assignees.length > 0 ? entry.assignees.join(',') : 'Unassigned'}`);
    log.print(`  Comments: ${entry.comments}`);
    if (entry.board) {
      const { status, priority, size, estimate } = entry.board;
      log.print(
        `  Board: Status ${status ?? '-'}, Priority ${priority ?? '-'}, Size ${size ?? '-'}, Estimate ${estimate ?? '-'}`
      );
    } else {
      log.print('  Board: not on the project board');
    }

    log.print();
    log.print('  Files Referenced:');
    if (entry.files.length > 0) {
      for (const file of entry.files) log.print(`    • ${file}`);
    } else if (entry.codeElements.length > 0) {
      log.print('    No specific files found, but these code elements were mentioned:');
      for (const element of entry.codeElements) log.print(`    • ${element} (search codebase for this)`);
    } else {
      log.print('    No specific files mentioned');
    }

    log.print();
    log.print('  Linked Pull Requests:');
    if (entry.linkedPRs.length > 0) {
      for (const pr of entry.linkedPRs) log.print(`    • PR #${pr.number} (${pr.state})`);
    } else {
      log.print('    No linked PRs found');
    }

    if (entry.notes.length > 0) {
      log.print();
      log.print('  Status Analysis:');
      for (const note of entry.notes) log.print(`    • ${note}`);
    }

    log.print();
    log.print('---');
    log.print();
  }

  log.print('Summary:');
  log.print(`Total open issues: ${report.summary.total}`);
  log.print();
  log.print('Issues by Label:');
  for (const { label, count } of report.summary.byLabel) {
    log.print(`  ${count} - ${label}`);
  }
  log.print();
  log.print(`Unassigned issues: ${report.summary.unassigned}`);
}
