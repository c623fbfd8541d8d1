/**
 * Work session commands: start, continue, review, done.
 *
 * A session ties one issue to the shared branch and the shared draft PR. Its
 * local record lives in the session store; the board Status gates which
 * command may run.
 */

import type { Config } from '../config/schema.js';
import type { BoardManager } from '../github/board.js';
import type { IssueManager } from '../github/issues.js';
import type { PRManager } from '../github/pulls.js';
import type { GitOperations } from '../git/index.js';
import type { SessionStore, ArchiveResult } from '../session/store.js';
import type { WorkSession } from '../session/schema.js';
import { CURRENT_SESSION_VERSION } from '../session/schema.js';
import type { Logger } from '../utils/logger.js';
import { WorkflowError, ErrorCode } from '../utils/errors.js';
import { formatUtcMinute, isoSeconds, systemClock, type Clock } from '../utils/time.js';
import { addIssueSection, buildSharedPRBody, replaceIssueSection, type IssueSection } from './changelog.js';
import { STATUS_DISPLAY } from './fields.js';
import { changeStatus, NO_STATUS, type ChangeStatusResult } from './status.js';
import { buildWorkSummary, recentCommentLines, renderIssueDetails } from './work-report.js';

const RECENT_COMMENTS = 2;
const COMMIT_LIMIT = 10;

export interface WorkSessionDeps {
  config: Config;
  issues: Pick<IssueManager, 'getIssue' | 'listComments' | 'addComment' | 'addLabels' | 'removeLabel'>;
  pulls: Pick<PRManager, 'findOpenPR' | 'createPR' | 'getPR' | 'updateBody'>;
  board: Pick<BoardManager, 'findItemByIssueNumber' | 'getItemFieldValue' | 'addItem' | 'setSingleSelect'>;
  git: GitOperations;
  store: SessionStore;
  log: Logger;
  clock?: Clock;
}

export interface StartWorkResult {
  issueNumber: number;
  title: string;
  branch: string;
  prNumber: number | null;
  sessionPath: string;
  detailsPath: string;
}

export interface ContinueWorkResult {
  issueNumber: number;
  branch: string;
  prNumber: number | null;
  /** True when the issue came back from review since the last hand-off */
  returnedFromReview: boolean;
  filesModified: string[];
  /** Set when there was no session and `start` ran instead */
  started?: StartWorkResult;
}

export interface ReviewWorkResult {
  issueNumber: number;
  commentUrl: string;
  filesModified: string[];
  status: ChangeStatusResult;
}

export interface DoneWorkResult {
  issueNumber: number;
  status: ChangeStatusResult;
  archived: ArchiveResult | null;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function withLogEntry(session: WorkSession, action: string, clock: Clock): WorkSession {
  return { ...session, workLog: [...session.workLog, { timestamp: isoSeconds(clock()), action }] };
}

async function readBoardStatus(issueNumber: number, deps: WorkSessionDeps): Promise<string> {
  const value = await deps.board.getItemFieldValue(issueNumber, deps.config.project.fields.status);
  return value ?? NO_STATUS;
}

async function ensureCleanTree(issueNumber: number, git: GitOperations, doing: string): Promise<void> {
  if (!(await git.isClean())) {
    throw new WorkflowError(
      ErrorCode.WORKFLOW_UNCOMMITTED_CHANGES,
      `Uncommitted changes detected. Commit or stash them before ${doing}`,
      { issueNumber }
    );
  }
}

async function pullOrWarn(branch: string, deps: WorkSessionDeps, warning: string): Promise<void> {
  try {
    await deps.git.pull(branch);
  } catch (error) {
    deps.log.warn(warning, { error: describe(error) });
  }
}

async function developerName(git: GitOperations): Promise<string> {
  return (await git.userName()) ?? 'Unknown';
}

async function showRecentComments(issueNumber: number, prNumber: number | null, deps: WorkSessionDeps): Promise<void> {
  const { issues, log } = deps;

  log.print();
  log.print('Issue Comments:');
  const issueLines = recentCommentLines(await issues.listComments(issueNumber), RECENT_COMMENTS);
  log.print(issueLines.length > 0 ? issueLines.join('\n') : '  No recent comments');

  if (prNumber !== null) {
    log.print();
    log.print('PR Comments:');
    const prLines = recentCommentLines(await issues.listComments(prNumber), RECENT_COMMENTS);
    log.print(prLines.length > 0 ? prLines.join('\n') : '  No recent comments');
  }
}

/**
 * Merge the working tree's modified files into the session, sorted and
 * deduplicated.
 */
async function trackFiles(session: WorkSession, deps: WorkSessionDeps): Promise<WorkSession> {
  const changed = await deps.git.modifiedFiles();
  if (changed.length === 0) {
    return session;
  }
  const filesModified = [...new Set([...changed, ...session.filesModified])].sort();
  deps.log.success(`Tracking ${changed.length} files for issue #${session.issueNumber}`);
  return { ...session, filesModified };
}

async function sectionFor(session: WorkSession, deps: WorkSessionDeps): Promise<IssueSection> {
  const started = new Date(session.startedAt);
  return {
    issueNumber: session.issueNumber,
    title: session.title,
    started: Number.isNaN(started.getTime()) ? session.startedAt : formatUtcMinute(started),
    developer: await developerName(deps.git),
    files: session.filesModified,
  };
}

/**
 * Rewrite this issue's section of the shared PR body. The PR may have been
 * closed or merged since; that only costs a warning.
 */
async function refreshPRSection(session: WorkSession, deps: WorkSessionDeps): Promise<void> {
  if (session.prNumber === null) return;

  try {
    const pr = await deps.pulls.getPR(session.prNumber);
    if (!pr) {
      deps.log.warn(`Shared PR #${session.prNumber} no longer exists`);
      return;
    }
    const edit = replaceIssueSection(pr.body, await sectionFor(session, deps));
    if (edit.changed) {
      await deps.pulls.updateBody(pr.number, edit.body);
      deps.log.success(`Updated PR changelog for issue #${session.issueNumber}`);
    }
  } catch (error) {
    deps.log.warn(`Could not update PR #${session.prNumber} changelog`, { error: describe(error) });
  }
}

async function ensureBranch(branch: string, deps: WorkSessionDeps): Promise<void> {
  const { git, log } = deps;

  if (await git.localBranchExists(branch)) {
    log.success(`${branch} branch exists`);
    if ((await git.currentBranch()) !== branch) {
      await git.checkout(branch);
    }
    await pullOrWarn(branch, deps, `No remote ${branch} branch yet`);
  } else {
    log.warn(`${branch} branch doesn't exist. Creating it...`);
    await git.createBranch(branch);
    log.success(`Created ${branch} branch`);
  }
}

/**
 * Find the open shared PR, or create it as a draft. An existing PR gets this
 * issue's changelog section. Returns null when creation failed.
 */
async function ensureSharedPR(section: IssueSection, deps: WorkSessionDeps): Promise<number | null> {
  const { config, pulls, log } = deps;
  const { branch, baseBranch, prTitle } = config.workflow;

  const existing = await pulls.findOpenPR(branch, baseBranch);
  if (existing) {
    log.success(`Using existing shared PR #${existing.number}`);
    const edit = addIssueSection(existing.body, section);
    if (!edit.changed) {
      log.info(`Issue #${section.issueNumber} already in PR changelog`);
      return existing.number;
    }
    try {
      await pulls.updateBody(existing.number, edit.body);
      log.success(`Added issue #${section.issueNumber} to PR changelog`);
    } catch (error) {
      log.warn(`Could not add issue #${section.issueNumber} to PR changelog`, { error: describe(error) });
    }
    return existing.number;
  }

  log.info('Creating shared PR for this sprint...');
  try {
    const created = await pulls.createPR({
      title: prTitle,
      body: buildSharedPRBody(branch, section),
      head: branch,
      base: baseBranch,
      draft: true,
    });
    log.success(`Created shared sprint PR #${created.number}`);
    return created.number;
  } catch (error) {
    log.warn('Failed to create shared PR; the session will record no PR', { error: describe(error) });
    return null;
  }
}

export async function startWork(issueNumber: number, deps: WorkSessionDeps): Promise<StartWorkResult> {
  const { config, issues, git, store, log } = deps;
  const clock = deps.clock ?? systemClock;
  const branch = config.workflow.branch;

  log.header(`Starting work on issue #${issueNumber}`);

  const issue = await issues.getIssue(issueNumber);
  const comments = await issues.listComments(issueNumber);
  const details = renderIssueDetails(issue, comments);
  const detailsPath = store.writeDetails(issueNumber, details);
  log.print(details);
  log.info(`Full issue details saved to: ${detailsPath}`);

  const status = await readBoardStatus(issueNumber, deps);
  log.info(`Current status: ${status}`);
  const allowed = [STATUS_DISPLAY.ready, STATUS_DISPLAY['in-progress']];
  if (!allowed.includes(status)) {
    throw new WorkflowError(
      ErrorCode.WORKFLOW_INVALID_STATUS,
      `Issue #${issueNumber} must be in 'Ready' or 'In progress' status to start work (current: ${status})`,
      {
        issueNumber,
        context: { status },
        recoveryActions: [
          { description: `Move the issue to Ready first: issueflow status ${issueNumber} ready`, automatic: false },
        ],
      }
    );
  }

  log.print();
  log.print('Recent comments:');
  const recent = recentCommentLines(comments, RECENT_COMMENTS);
  log.print(recent.length > 0 ? recent.join('\n') : '  No recent comments');

  await ensureCleanTree(issueNumber, git, 'starting new work');
  log.success('No uncommitted changes');

  await ensureBranch(branch, deps);
  await changeStatus(issueNumber, 'in-progress', deps);

  const now = clock();
  const section: IssueSection = {
    issueNumber,
    title: issue.title,
    started: formatUtcMinute(now),
    developer: await developerName(git),
  };
  const prNumber = await ensureSharedPR(section, deps);

  // A restarted issue keeps its history; the log is append-only.
  const previous = store.exists(issueNumber) ? store.load(issueNumber) : null;
  const startedAt = isoSeconds(now);
  const base: WorkSession = previous
    ? { ...previous, title: issue.title, branch, prNumber, status: 'in-progress' }
    : {
        version: CURRENT_SESSION_VERSION,
        issueNumber,
        title: issue.title,
        branch,
        prNumber,
        status: 'in-progress',
        lastStatus: null,
        startedAt,
        workLog: [],
        filesModified: [],
        nextSteps: [],
        testInstructions: '',
      };
  store.save({ ...base, workLog: [...base.workLog, { timestamp: startedAt, action: 'Started work on issue' }] });

  log.print();
  log.success('Work session started');
  log.print(`State saved to: ${store.sessionPath(issueNumber)}`);
  log.print(`Working branch: ${branch}`);
  log.print(`Pull Request: ${prNumber === null ? 'none' : `#${prNumber}`}`);
  log.print();
  log.print('Next steps:');
  log.print('1. Make your code changes');
  log.print("2. Use 'git add <files>' to stage only files for this issue");
  log.print(`3. Use 'git commit -m "[#${issueNumber}] Your message"' for commits`);
  log.print(`4. Run 'issueflow work review ${issueNumber}' when ready for testing`);

  return {
    issueNumber,
    title: issue.title,
    branch,
    prNumber,
    sessionPath: store.sessionPath(issueNumber),
    detailsPath,
  };
}

export async function continueWork(issueNumber: number, deps: WorkSessionDeps): Promise<ContinueWorkResult> {
  const { git, store, log } = deps;
  const clock = deps.clock ?? systemClock;

  if (!store.exists(issueNumber)) {
    log.warn('No previous work session found. Starting new session...');
    const started = await startWork(issueNumber, deps);
    return {
      issueNumber,
      branch: started.branch,
      prNumber: started.prNumber,
      returnedFromReview: false,
      filesModified: [],
      started,
    };
  }

  log.header(`Continuing work on issue #${issueNumber}`);

  const status = await readBoardStatus(issueNumber, deps);
  log.info(`Current status: ${status}`);
  if (status !== STATUS_DISPLAY['in-progress']) {
    const hint =
      status === STATUS_DISPLAY['in-review']
        ? "If changes were requested, wait for the issue to be moved back to 'In progress'"
        : 'Make sure the issue is in the right status before continuing';
    throw new WorkflowError(
      ErrorCode.WORKFLOW_INVALID_STATUS,
      `Issue #${issueNumber} must be in 'In progress' status to continue work (current: ${status})`,
      { issueNumber, context: { status }, recoveryActions: [{ description: hint, automatic: false }] }
    );
  }

  let session = store.load(issueNumber);
  log.print(`Title: ${session.title}`);
  log.print(`Started: ${session.startedAt}`);
  log.print(`Work Branch: ${session.branch}`);
  if (session.prNumber !== null) {
    log.print(`Pull Request: #${session.prNumber}`);
  }

  if ((await git.currentBranch()) !== session.branch) {
    await ensureCleanTree(issueNumber, git, 'switching branches');
    log.info('Switching to work branch...');
    await git.checkout(session.branch);
    log.success(`Switched to ${session.branch} branch`);
    await pullOrWarn(session.branch, deps, 'No remote updates');
  }

  const returnedFromReview = session.lastStatus === STATUS_DISPLAY['in-review'];
  if (returnedFromReview) {
    log.warn("Issue was moved back from 'In review' to 'In progress'. Changes were probably requested during testing");
    session = { ...session, status: 'in-progress', lastStatus: null };
  }

  await showRecentComments(issueNumber, session.prNumber, deps);

  log.print();
  log.print('Work Log:');
  for (const entry of session.workLog) {
    log.print(`  • ${entry.timestamp}: ${entry.action}`);
  }
  if (session.filesModified.length > 0) {
    log.print();
    log.print('Files Modified:');
    for (const file of session.filesModified) {
      log.print(`  • ${file}`);
    }
  }
  if (session.nextSteps.length > 0) {
    log.print();
    log.print('Next Steps:');
    for (const step of session.nextSteps) {
      log.print(`  • ${step}`);
    }
  }

  session = withLogEntry(session, 'Resumed work on issue', clock);
  session = await trackFiles(session, deps);
  store.save(session);
  await refreshPRSection(session, deps);

  log.print();
  log.success('Resumed work session');
  log.print(`Remember to commit with: git commit -m "[#${issueNumber}] Description"`);

  return {
    issueNumber,
    branch: session.branch,
    prNumber: session.prNumber,
    returnedFromReview,
    filesModified: session.filesModified,
  };
}

export async function reviewWork(
  issueNumber: number,
  options: { testInstructions?: string },
  deps: WorkSessionDeps
): Promise<ReviewWorkResult> {
  const { git, issues, store, log } = deps;
  const clock = deps.clock ?? systemClock;

  log.header(`Marking issue #${issueNumber} ready for review`);

  let session = store.load(issueNumber);
  session = await trackFiles(session, deps);
  if (options.testInstructions !== undefined) {
    session = { ...session, testInstructions: options.testInstructions };
  }
  store.save(session);
  await refreshPRSection(session, deps);

  log.info('Creating work summary in issue...');
  const commits = await git.commitsForIssue(issueNumber, COMMIT_LIMIT);
  const comment = await issues.addComment(
    issueNumber,
    buildWorkSummary({ session, commits, testInstructions: session.testInstructions })
  );
  log.success(`Added work summary to issue #${issueNumber}`);

  session = withLogEntry(
    { ...session, lastStatus: STATUS_DISPLAY['in-review'], status: 'in-review' },
    'Marked ready for review',
    clock
  );
  store.save(session);

  const status = await changeStatus(issueNumber, 'in-review', deps);

  log.print();
  log.success('Issue marked for review');
  log.print(`Reviewer: check issue #${issueNumber} for the work summary and add testing feedback`);

  return { issueNumber, commentUrl: comment.htmlUrl, filesModified: session.filesModified, status };
}

export async function finishWork(issueNumber: number, deps: WorkSessionDeps): Promise<DoneWorkResult> {
  const { store, log } = deps;

  log.header(`Marking issue #${issueNumber} as done`);

  const status = await changeStatus(issueNumber, 'done', deps);

  let archived: ArchiveResult | null = null;
  if (store.exists(issueNumber)) {
    archived = store.archive(issueNumber);
    log.success(`Work session archived to ${archived.sessionPath}`);
  } else {
    log.info(`No work session to archive for issue #${issueNumber}`);
  }

  log.success('Issue marked as done');
  return { issueNumber, status, archived };
}
