import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { continueWork, finishWork, reviewWork, startWork, type WorkSessionDeps } from './session.js';
import { buildSharedPRBody } from './changelog.js';
import { buildWorkSummary } from './work-report.js';
import { createSessionStore, type SessionStore } from '../session/store.js';
import type { WorkSession } from '../session/schema.js';
import { ErrorCode, WorkflowError } from '../utils/errors.js';
import {
  captureLogger,
  FakeBoard,
  FakeGit,
  FakeIssues,
  FakePulls,
  fixedClock,
  makeComment,
  makeIssue,
  makePR,
  makeTempDir,
  removeTempDir,
  testConfig,
  type LogCapture,
} from '../test-utils/fakes.js';

const START = '2024-05-01T09:30:00Z';
const LATER = '2024-05-02T10:00:00Z';

function failsWith(code: ErrorCode) {
  return (error: unknown): boolean => error instanceof WorkflowError && error.code === code;
}

describe('work sessions', () => {
  let root: string;
  let dir: string;
  let issues: FakeIssues;
  let pulls: FakePulls;
  let board: FakeBoard;
  let git: FakeGit;
  let store: SessionStore;
  let capture: LogCapture;

  beforeEach(() => {
    root = makeTempDir('work-test-');
    dir = join(root, '.claude');
    issues = new FakeIssues().add(makeIssue(12, { title: 'Add export', body: 'CSV please' }), [
      makeComment(1, { body: 'Which columns?' }),
    ]);
    pulls = new FakePulls();
    board = new FakeBoard();
    git = new FakeGit();
    store = createSessionStore(dir, fixedClock(LATER));
    capture = captureLogger('json');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  function deps(iso = START): WorkSessionDeps {
    return { config: testConfig(), issues, pulls, board, git, store, log: capture.log, clock: fixedClock(iso) };
  }

  function seed(overrides: Partial<WorkSession> = {}): WorkSession {
    const session: WorkSession = {
      version: 2,
      issueNumber: 12,
      title: 'Add export',
      branch: 'wip',
      prNumber: 500,
      status: 'in-progress',
      lastStatus: null,
      startedAt: START,
      workLog: [{ timestamp: START, action: 'Started work on issue' }],
      filesModified: [],
      nextSteps: [],
      testInstructions: '',
      ...overrides,
    };
    store.save(session);
    return session;
  }

  const section = {
    issueNumber: 12,
    title: 'Add export',
    started: '2024-05-01 09:30 UTC',
    developer: 'Test Developer',
  };

  describe('startWork', () => {
    it('creates the branch, moves the issue, opens the shared PR and records the session', async () => {
      board.put(12, { FIELD_STATUS: 'Ready' });

      const result = await startWork(12, deps());

      assert.deepStrictEqual(result, {
        issueNumber: 12,
        title: 'Add export',
        branch: 'wip',
        prNumber: 500,
        sessionPath: join(dir, 'issue-12.json'),
        detailsPath: join(dir, 'issue-12-details.md'),
      });
      assert.deepStrictEqual(git.calls, ['create wip']);
      assert.strictEqual(board.valueOf(12, 'FIELD_STATUS'), 'In progress');
      assert.deepStrictEqual(issues.labelsAdded, [{ issueNumber: 12, labels: ['in progress'] }]);
      assert.deepStrictEqual(pulls.created, [
        {
          title: '[WIP] Sprint Development - Active Work',
          body: buildSharedPRBody('wip', section),
          head: 'wip',
          base: 'master',
          draft: true,
        },
      ]);
      assert.deepStrictEqual(store.load(12), {
        version: 2,
        issueNumber: 12,
        title: 'Add export',
        branch: 'wip',
        prNumber: 500,
        status: 'in-progress',
        lastStatus: null,
        startedAt: START,
        workLog: [{ timestamp: START, action: 'Started work on issue' }],
        filesModified: [],
        nextSteps: [],
        testInstructions: '',
      });
      assert.ok(readFileSync(result.detailsPath, 'utf-8').startsWith('# GitHub Issue #12: Add export\n'));
    });

    it('accepts an issue already in progress and reuses the local branch', async () => {
      board.put(12, { FIELD_STATUS: 'In progress' });
      git.branches.add('wip');

      await startWork(12, deps());

      assert.deepStrictEqual(git.calls, ['checkout wip', 'pull wip']);
    });

    it('only warns when the branch has no remote yet', async () => {
      board.put(12, { FIELD_STATUS: 'Ready' });
      git.branches.add('wip');
      git.branch = 'wip';
      git.pullFails = true;

      const result = await startWork(12, deps());

      assert.strictEqual(result.prNumber, 500);
      assert.deepStrictEqual(git.calls, ['pull wip']);
      assert.ok(capture.entries().some((entry) => entry.level === 'warn' && entry.message === 'No remote wip branch yet'));
    });

    it('refuses an issue that is not Ready or In progress', async () => {
      board.put(12, { FIELD_STATUS: 'Backlog' });

      await assert.rejects(
        startWork(12, deps()),
        (error: unknown) =>
          failsWith(ErrorCode.WORKFLOW_INVALID_STATUS)(error) &&
          error instanceof Error &&
          error.message === "Issue #12 must be in 'Ready' or 'In progress' status to start work (current: Backlog)"
      );
      assert.deepStrictEqual(git.calls, []);
      assert.strictEqual(store.exists(12), false);
    });

    it('treats an issue missing from the board as having no status', async () => {
      await assert.rejects(
        startWork(12, deps()),
        (error: unknown) => error instanceof Error && error.message.endsWith('(current: No Status)')
      );
    });

    it('stops on uncommitted changes before touching the board', async () => {
      board.put(12, { FIELD_STATUS: 'Ready' });
      git.clean = false;

      await assert.rejects(startWork(12, deps()), failsWith(ErrorCode.WORKFLOW_UNCOMMITTED_CHANGES));
      assert.strictEqual(board.valueOf(12, 'FIELD_STATUS'), 'Ready');
      assert.deepStrictEqual(pulls.created, []);
    });

    it('adds the issue to an existing shared PR', async () => {
      board.put(12, { FIELD_STATUS: 'Ready' });
      const other = { ...section, issueNumber: 3, title: 'Older work' };
      pulls.add(makePR(40, { body: buildSharedPRBody('wip', other) }));

      const result = await startWork(12, deps());

      assert.strictEqual(result.prNumber, 40);
      assert.deepStrictEqual(pulls.created, []);
      assert.strictEqual(pulls.bodyUpdates.length, 1);
      assert.ok(pulls.bodyUpdates[0]?.body.includes('### Issue #3: Older work'));
      assert.ok(pulls.bodyUpdates[0]?.body.includes('### Issue #12: Add export'));
    });

    it('leaves an existing PR alone when the issue is already listed', async () => {
      board.put(12, { FIELD_STATUS: 'Ready' });
      pulls.add(makePR(40, { body: buildSharedPRBody('wip', section) }));

      await startWork(12, deps());

      assert.deepStrictEqual(pulls.bodyUpdates, []);
    });

    it('records no PR when creating it fails', async () => {
      board.put(12, { FIELD_STATUS: 'Ready' });
      pulls.failCreate = new Error('Validation Failed');

      const result = await startWork(12, deps());

      assert.strictEqual(result.prNumber, null);
      assert.strictEqual(store.load(12).prNumber, null);
    });

    it('appends to the log of a restarted session', async () => {
      board.put(12, { FIELD_STATUS: 'In progress' });
      seed({ filesModified: ['src/a.ts'] });

      await startWork(12, deps(LATER));

      const session = store.load(12);
      assert.strictEqual(session.startedAt, START);
      assert.deepStrictEqual(session.filesModified, ['src/a.ts']);
      assert.deepStrictEqual(session.workLog, [
        { timestamp: START, action: 'Started work on issue' },
        { timestamp: LATER, action: 'Started work on issue' },
      ]);
    });
  });

  describe('continueWork', () => {
    it('starts a new session when there is none', async () => {
      board.put(12, { FIELD_STATUS: 'Ready' });

      const result = await continueWork(12, deps());

      assert.strictEqual(result.started?.prNumber, 500);
      assert.strictEqual(store.exists(12), true);
    });

    it('switches branch, tracks files and refreshes the PR changelog', async () => {
      board.put(12, { FIELD_STATUS: 'In progress' });
      pulls.add(makePR(500, { body: buildSharedPRBody('wip', section) }));
      seed();
      git.modified = ['src/b.ts', 'src/a.ts'];

      const result = await continueWork(12, deps(LATER));

      assert.deepStrictEqual(result, {
        issueNumber: 12,
        branch: 'wip',
        prNumber: 500,
        returnedFromReview: false,
        filesModified: ['src/a.ts', 'src/b.ts'],
      });
      assert.deepStrictEqual(git.calls, ['checkout wip', 'pull wip']);
      assert.deepStrictEqual(store.load(12).workLog[1], { timestamp: LATER, action: 'Resumed work on issue' });
      assert.ok(pulls.bodyUpdates[0]?.body.includes('- Files modified:\n  - src/a.ts\n  - src/b.ts\n'));
    });

    it('notices an issue that came back from review', async () => {
      board.put(12, { FIELD_STATUS: 'In progress' });
      seed({ status: 'in-review', lastStatus: 'In review', prNumber: null });
      git.branch = 'wip';

      const result = await continueWork(12, deps(LATER));

      assert.strictEqual(result.returnedFromReview, true);
      const session = store.load(12);
      assert.strictEqual(session.lastStatus, null);
      assert.strictEqual(session.status, 'in-progress');
      assert.deepStrictEqual(git.calls, []);
    });

    it('refuses an issue that is still in review', async () => {
      board.put(12, { FIELD_STATUS: 'In review' });
      seed();

      await assert.rejects(
        continueWork(12, deps()),
        (error: unknown) =>
          error instanceof WorkflowError &&
          error.code === ErrorCode.WORKFLOW_INVALID_STATUS &&
          error.getRecoverySuggestions()[0] ===
            "If changes were requested, wait for the issue to be moved back to 'In progress'"
      );
    });

    it('will not switch branches over uncommitted changes', async () => {
      board.put(12, { FIELD_STATUS: 'In progress' });
      seed();
      git.clean = false;

      await assert.rejects(continueWork(12, deps()), failsWith(ErrorCode.WORKFLOW_UNCOMMITTED_CHANGES));
      assert.deepStrictEqual(git.calls, []);
    });

    it('warns when the shared PR is gone', async () => {
      board.put(12, { FIELD_STATUS: 'In progress' });
      seed();
      git.branch = 'wip';

      await continueWork(12, deps(LATER));

      assert.ok(capture.entries().some((entry) => entry.message === 'Shared PR #500 no longer exists'));
    });
  });

  describe('reviewWork', () => {
    it('posts the summary and hands the issue to review', async () => {
      board.put(12, { FIELD_STATUS: 'In progress' });
      const seeded = seed();
      git.modified = ['src/a.ts'];
      git.commits = ['abc1234 [#12] Add CSV writer'];

      const result = await reviewWork(12, { testInstructions: 'Export the orders table' }, deps(LATER));

      const expectedBody = buildWorkSummary({
        session: { ...seeded, filesModified: ['src/a.ts'], testInstructions: 'Export the orders table' },
        commits: ['abc1234 [#12] Add CSV writer'],
        testInstructions: 'Export the orders table',
      });
      assert.deepStrictEqual(issues.posted, [{ issueNumber: 12, body: expectedBody }]);
      assert.strictEqual(result.commentUrl, 'https://github.com/acme/widgets/issues/12#issuecomment-9000');
      assert.strictEqual(result.status.status, 'In review');
      assert.strictEqual(board.valueOf(12, 'FIELD_STATUS'), 'In review');

      const session = store.load(12);
      assert.strictEqual(session.status, 'in-review');
      assert.strictEqual(session.lastStatus, 'In review');
      assert.strictEqual(session.testInstructions, 'Export the orders table');
      assert.deepStrictEqual(session.workLog[1], { timestamp: LATER, action: 'Marked ready for review' });
    });

    it('needs a session', async () => {
      await assert.rejects(reviewWork(12, {}, deps()), failsWith(ErrorCode.WORKFLOW_SESSION_NOT_FOUND));
      assert.deepStrictEqual(issues.posted, []);
    });
  });

  describe('finishWork', () => {
    it('marks the issue done and archives the session', async () => {
      board.put(12, { FIELD_STATUS: 'In review' });
      seed();

      const result = await finishWork(12, deps());

      assert.strictEqual(result.status.status, 'Done');
      assert.strictEqual(result.archived?.sessionPath, join(dir, 'archive', 'issue-12-20240502-100000.json'));
      assert.strictEqual(existsSync(join(dir, 'issue-12.json')), false);
    });

    it('still marks the issue done without a session', async () => {
      board.put(12, { FIELD_STATUS: 'In review' });

      const result = await finishWork(12, deps());

      assert.strictEqual(result.archived, null);
      assert.strictEqual(board.valueOf(12, 'FIELD_STATUS'), 'Done');
    });
  });
});
