import type { Config } from '../config/schema.js';
import type { IssueManager } from '../github/issues.js';
import type { CheckRun, PRManager, PullRequest } from '../github/pulls.js';
import type { Logger } from '../utils/logger.js';
import { daysSince, systemClock, type Clock } from '../utils/time.js';
import { extractIssueReferences } from './text.js';

export interface PRAuditEntry {
  number: number;
  title: string;
  url: string;
  author: string;
  createdAt: string;
  ageDays: number | null;
  updatedAt: string;
  draft: boolean;
  /** Unique review states, sorted */
  reviews: string[];
  /** `name: conclusion` (or status while running) per check run */
  checks: string[];
  comments: number;
  mergeable: boolean | null;
  mergeableState: string;
  todo: string[];
  relatedIssues: number[];
}

export interface PRAuditReport {
  repository: string;
  pullRequests: PRAuditEntry[];
  summary: { total: number };
}

export interface AuditPRsDeps {
  config: Config;
  pulls: Pick<PRManager, 'listOpenPRs' | 'getPR' | 'listReviews' | 'listCheckRuns'>;
  issues: Pick<IssueManager, 'listComments'>;
  log: Logger;
  clock?: Clock;
}

export function describeCheck(run: CheckRun): string {
  return `${run.name}: ${run.conclusion ?? run.status}`;
}

export interface TodoInput {
  draft: boolean;
  ageDays: number | null;
  reviews: string[];
  checks: CheckRun[];
  mergeable: boolean | null;
  mergeableState: string;
}

/**
 * What still stands between the PR and a merge. Empty means ready.
 */
export function prTodoList(input: TodoInput): string[] {
  const todo: string[] = [];

  if (input.mergeable === false || input.mergeableState === 'dirty' || input.mergeableState === 'conflicting') {
    todo.push('Resolve merge conflicts');
  }

  if (input.reviews.length === 0) {
    todo.push('Needs code review');
  } else if (input.reviews.includes('CHANGES_REQUESTED')) {
    todo.push('Address requested changes');
  } else if (!input.reviews.includes('APPROVED')) {
    todo.push('Awaiting approval');
  }

  if (input.draft) {
    todo.push('Mark as ready for review (currently draft)');
  }

  const outcomes = input.checks.map((run) => run.conclusion ?? run.status);
  if (outcomes.includes('failure')) {
    todo.push('Fix failing checks');
  } else if (outcomes.includes('in_progress') || outcomes.includes('queued')) {
    todo.push('Waiting for checks to complete');
  }

  if (input.ageDays !== null && input.ageDays > 7) {
    todo.push(`PR is ${input.ageDays} days old - consider prioritizing`);
  }

  return todo;
}

async function auditOne(pr: PullRequest, deps: AuditPRsDeps, now: Date): Promise<PRAuditEntry> {
  const { pulls, issues } = deps;

  const reviews = [...new Set((await pulls.listReviews(pr.number)).map((review) => review.state))].sort();
  const checkRuns = await pulls.listCheckRuns(pr.head.sha);
  const comments = await issues.listComments(pr.number);
  // mergeable is only computed on the single-PR endpoint
  const detail = (await pulls.getPR(pr.number)) ?? pr;
  const ageDays = daysSince(pr.createdAt, now);

  return {
    number: pr.number,
    title: pr.title,
    url: pr.htmlUrl,
    author: pr.author,
    createdAt: pr.createdAt,
    ageDays,
    updatedAt: pr.updatedAt,
    draft: pr.draft,
    reviews,
    checks: checkRuns.map(describeCheck),
    comments: comments.length,
    mergeable: detail.mergeable,
    mergeableState: detail.mergeableState,
    todo: prTodoList({
      draft: pr.draft,
      ageDays,
      reviews,
      checks: checkRuns,
      mergeable: detail.mergeable,
      mergeableState: detail.mergeableState,
    }),
    relatedIssues: extractIssueReferences(pr.body),
  };
}

export async function auditPRs(deps: AuditPRsDeps): Promise<PRAuditReport> {
  const { config, pulls, log } = deps;
  const now = (deps.clock ?? systemClock)();

  log.info('Fetching open pull requests...');
  const open = await pulls.listOpenPRs();

  const entries: PRAuditEntry[] = [];
  for (const pr of open) {
    entries.push(await auditOne(pr, deps, now));
  }

  return {
    repository: `${config.repo.owner}/${config.repo.name}`,
    pullRequests: entries,
    summary: { total: entries.length },
  };
}

export function printPRAudit(report: PRAuditReport, log: Logger): void {
  log.header('GitHub PR Audit Report');
  log.print(`Repository: ${report.repository}`);
  log.print();

  if (report.pullRequests.length === 0) {
    log.success('No open pull requests found.');
    return;
  }

  log.print(`Found ${report.summary.total} open pull request(s)`);
  log.print();

  for (const entry of report.pullRequests) {
    log.print(`PR #${entry.number}: ${entry.title}`);
    log.print(`  URL: ${entry.url}`);
    log.print(`  Author: @${entry.author}`);
    log.print(`  Created: ${entry.createdAt} (${entry.ageDays ?? 'unknown'} days ago)`);
    log.print(`  Last Updated: ${entry.updatedAt}`);
    if (entry.draft) {
      log.print('  Status: DRAFT');
    }
    log.print(`  Reviews: ${entry.reviews.length > 0 ? entry.reviews.join(', ') : 'No reviews yet'}`);
    log.print(`  Checks: ${entry.checks.length > 0 ? entry.checks.join(', ') : 'No checks'}`);
    log.print(`  Comments: ${entry.comments}`);
    log.print(`  Mergeable: ${entry.mergeable ?? 'unknown'} (state: ${entry.mergeableState})`);

    log.print();
    log.print('  TODO:');
    if (entry.todo.length > 0) {
      for (const item of entry.todo) log.print(`    • ${item}`);
    } else {
      log.print('    ✓ Ready to merge!');
    }

    if (entry.relatedIssues.length > 0) {
      log.print();
      log.print(`  Related Issues: ${entry.relatedIssues.map((n) => `#${n}`).join(' ')}`);
    }

    log.print();
    log.print('---');
    log.print();
  }

  log.print('Summary:');
  log.print(`Total open PRs: ${report.summary.total}`);
}
