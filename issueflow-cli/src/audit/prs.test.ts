import { describe, it } from 'node:test';
import assert from 'node:assert';
import { auditPRs, describeCheck, printPRAudit, prTodoList, type TodoInput } from './prs.js';
import {
  captureLogger,
  FakeIssues,
  FakePulls,
  fixedClock,
  makeComment,
  makeIssue,
  makePR,
  testConfig,
} from '../test-utils/fakes.js';

const ready: TodoInput = {
  draft: false,
  ageDays: 2,
  reviews: ['APPROVED'],
  checks: [{ name: 'build', status: 'completed', conclusion: 'success' }],
  mergeable: true,
  mergeableState: 'clean',
};

describe('describeCheck', () => {
  it('uses the conclusion, or the status while running', () => {
    assert.strictEqual(describeCheck({ name: 'build', status: 'completed', conclusion: 'success' }), 'build: success');
    assert.strictEqual(describeCheck({ name: 'lint', status: 'in_progress', conclusion: null }), 'lint: in_progress');
  });
});

describe('prTodoList', () => {
  it('is empty for an approved, green, fresh PR', () => {
    assert.deepStrictEqual(prTodoList(ready), []);
  });

  it('flags conflicts from mergeable or the mergeable state', () => {
    assert.deepStrictEqual(prTodoList({ ...ready, mergeable: false }), ['Resolve merge conflicts']);
    assert.deepStrictEqual(prTodoList({ ...ready, mergeable: null, mergeableState: 'dirty' }), [
      'Resolve merge conflicts',
    ]);
  });

  it('picks one review item', () => {
    assert.deepStrictEqual(prTodoList({ ...ready, reviews: [] }), ['Needs code review']);
    assert.deepStrictEqual(prTodoList({ ...ready, reviews: ['APPROVED', 'CHANGES_REQUESTED'] }), [
      'Address requested changes',
    ]);
    assert.deepStrictEqual(prTodoList({ ...ready, reviews: ['COMMENTED'] }), ['Awaiting approval']);
  });

  it('prefers failing checks over pending ones', () => {
    const checks = [
      { name: 'build', status: 'completed', conclusion: 'failure' },
      { name: 'e2e', status: 'queued', conclusion: null },
    ];
    assert.deepStrictEqual(prTodoList({ ...ready, checks }), ['Fix failing checks']);
    assert.deepStrictEqual(prTodoList({ ...ready, checks: checks.slice(1) }), ['Waiting for checks to complete']);
  });

  it('lists draft and age in order', () => {
    assert.deepStrictEqual(prTodoList({ ...ready, draft: true, ageDays: 8 }), [
      'Mark as ready for review (currently draft)',
      'PR is 8 days old - consider prioritizing',
    ]);
    assert.deepStrictEqual(prTodoList({ ...ready, ageDays: 7 }), []);
  });
});

describe('auditPRs', () => {
  function setup() {
    const pulls = new FakePulls().add(makePR(3, { title: 'Sprint work', draft: true, body: 'Closes #12 and #4' }));
    pulls.reviews.set(3, [
      { state: 'COMMENTED', author: 'rev1' },
      { state: 'APPROVED', author: 'rev2' },
      { state: 'COMMENTED', author: 'rev1' },
    ]);
    pulls.checkRuns.set('sha3', [{ name: 'build', status: 'completed', conclusion: 'failure' }]);
    const issues = new FakeIssues().add(makeIssue(3), [makeComment(1), makeComment(2)]);
    return { pulls, issues };
  }

  it('collects reviews, checks, comments and the TODO list', async () => {
    const { pulls, issues } = setup();
    const capture = captureLogger();

    const report = await auditPRs({
      config: testConfig(),
      pulls,
      issues,
      log: capture.log,
      clock: fixedClock('2024-05-31T09:00:00Z'),
    });

    assert.deepStrictEqual(report.summary, { total: 1 });
    assert.deepStrictEqual(report.pullRequests[0], {
      number: 3,
      title: 'Sprint work',
      url: 'https://github.com/acme/widgets/pull/3',
      author: 'octo',
      createdAt: '2024-05-01T09:00:00Z',
      ageDays: 30,
      updatedAt: '2024-05-01T09:00:00Z',
      draft: true,
      reviews: ['APPROVED', 'COMMENTED'],
      checks: ['build: failure'],
      comments: 2,
      mergeable: null,
      mergeableState: 'unknown',
      todo: [
        'Mark as ready for review (currently draft)',
        'Fix failing checks',
        'PR is 30 days old - consider prioritizing',
      ],
      relatedIssues: [4, 12],
    });
  });

  it('takes mergeability from the single-PR lookup', async () => {
    const { pulls, issues } = setup();
    const listed = makePR(3);
    const capture = captureLogger();

    const report = await auditPRs({
      config: testConfig(),
      pulls: {
        listOpenPRs: async () => [listed],
        getPR: async () => ({ ...listed, mergeable: false, mergeableState: 'dirty' }),
        listReviews: (n) => pulls.listReviews(n),
        listCheckRuns: async () => [],
      },
      issues,
      log: capture.log,
      clock: fixedClock('2024-05-02T09:00:00Z'),
    });

    const [entry] = report.pullRequests;
    assert.strictEqual(entry?.mergeable, false);
    assert.deepStrictEqual(entry?.todo, ['Resolve merge conflicts']);
  });
});

describe('printPRAudit', () => {
  it('prints the TODO list and related issues', async () => {
    const pulls = new FakePulls().add(makePR(3, { draft: true, body: 'Closes #12' }));
    const capture = captureLogger();
    const report = await auditPRs({
      config: testConfig(),
      pulls,
      issues: new FakeIssues(),
      log: capture.log,
      clock: fixedClock('2024-05-03T09:00:00Z'),
    });

    const out = captureLogger();
    printPRAudit(report, out.log);
    const lines = out.text();

    assert.ok(lines.includes('PR #3: PR 3'));
    assert.ok(lines.includes('  Status: DRAFT'));
    assert.ok(lines.includes('  Reviews: No reviews yet'));
    assert.ok(lines.includes('  Checks: No checks'));
    assert.ok(lines.includes('  Mergeable: unknown (state: unknown)'));
    assert.ok(lines.includes('    • Needs code review'));
    assert.ok(lines.includes('    • Mark as ready for review (currently draft)'));
    assert.ok(lines.includes('  Related Issues: #12'));
    assert.strictEqual(lines[lines.length - 1], 'Total open PRs: 1');
  });

  it('marks a PR with nothing left as ready', () => {
    const out = captureLogger();
    printPRAudit(
      {
        repository: 'acme/widgets',
        summary: { total: 1 },
        pullRequests: [
          {
            number: 5,
            title: 'Done',
            url: 'https://github.com/acme/widgets/pull/5',
            author: 'octo',
            createdAt: '2024-05-01T09:00:00Z',
            ageDays: 1,
            updatedAt: '2024-05-01T09:00:00Z',
            draft: false,
            reviews: ['APPROVED'],
            checks: ['build: success'],
            comments: 0,
            mergeable: true,
            mergeableState: 'clean',
            todo: [],
            relatedIssues: [],
          },
        ],
      },
      out.log
    );
    assert.ok(out.text().includes('    ✓ Ready to merge!'));
    assert.ok(out.text().includes('  Mergeable: true (state: clean)'));
  });
});
