import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  addComment,
  commentPreview,
  DEFAULT_COMMENT_LIMIT,
  listRecentComments,
  parseCommentLimit,
  printCommentListing,
} from './index.js';
import { UsageError } from '../utils/errors.js';
import { captureLogger, FakeIssues, makeComment, makeIssue } from '../test-utils/fakes.js';

describe('commentPreview', () => {
  it('keeps up to three lines', () => {
    assert.strictEqual(commentPreview('one\ntwo'), 'one\ntwo');
    assert.strictEqual(commentPreview('a\nb\nc'), 'a\nb\nc');
  });

  it('marks truncated text', () => {
    assert.strictEqual(commentPreview('a\nb\nc\nd'), 'a\nb\nc\n...');
  });
});

describe('parseCommentLimit', () => {
  it('defaults when absent', () => {
    assert.strictEqual(parseCommentLimit(undefined), DEFAULT_COMMENT_LIMIT);
  });

  it('accepts positive whole numbers', () => {
    assert.strictEqual(parseCommentLimit('10'), 10);
  });

  it('rejects anything else', () => {
    for (const value of ['0', '-1', '2.5', 'many']) {
      assert.throws(() => parseCommentLimit(value), {
        name: 'UsageError',
        message: `Invalid limit '${value}'. Use a positive whole number`,
      });
    }
  });
});

describe('addComment', () => {
  it('posts the text and reports the URL and preview', async () => {
    const issues = new FakeIssues();
    const capture = captureLogger();

    const result = await addComment(12, 'Status update\nline 2\nline 3\nline 4', { issues, log: capture.log });

    assert.deepStrictEqual(issues.posted, [{ issueNumber: 12, body: 'Status update\nline 2\nline 3\nline 4' }]);
    assert.deepStrictEqual(result, {
      issueNumber: 12,
      id: 9000,
      url: 'https://github.com/acme/widgets/issues/12#issuecomment-9000',
      preview: 'Status update\nline 2\nline 3\n...',
    });
    assert.deepStrictEqual(capture.text().slice(3), [
      '✓ Comment added successfully',
      'Comment URL: https://github.com/acme/widgets/issues/12#issuecomment-9000',
      '',
      'Preview:',
      'Status update\nline 2\nline 3\n...',
    ]);
  });

  it('rejects blank text without calling the API', async () => {
    const issues = new FakeIssues();
    await assert.rejects(addComment(12, '   ', { issues, log: captureLogger().log }), UsageError);
    assert.deepStrictEqual(issues.posted, []);
  });
});

describe('listRecentComments', () => {
  const comments = [
    makeComment(1, { body: 'first', createdAt: '2024-05-01T10:00:00Z', updatedAt: '2024-05-01T10:00:00Z' }),
    makeComment(3, { body: 'third', createdAt: '2024-05-01T12:00:00Z', updatedAt: '2024-05-01T12:00:00Z' }),
    makeComment(2, {
      body: 'second',
      author: 'dev1',
      createdAt: '2024-05-01T11:00:00Z',
      updatedAt: '2024-05-02T08:05:00Z',
    }),
  ];

  it('returns the newest comments, oldest first', async () => {
    const issues = new FakeIssues().add(makeIssue(4, { title: 'Flaky build' }), comments);

    const listing = await listRecentComments(4, 2, { issues });

    assert.deepStrictEqual(
      listing.comments.map((comment) => comment.body),
      ['second', 'third']
    );
    assert.deepStrictEqual(listing.issue, {
      number: 4,
      title: 'Flaky build',
      state: 'open',
      url: 'https://github.com/acme/widgets/issues/4',
      isPullRequest: false,
    });
  });

  describe('past the first page', () => {
    const many = Array.from({ length: 205 }, (_, index) =>
      makeComment(index, { createdAt: new Date(Date.UTC(2024, 4, 1, 0, index)).toISOString() })
    );

    it('reads the last page', async () => {
      const issues = new FakeIssues().add(makeIssue(7, { comments: 205 }), many);

      const listing = await listRecentComments(7, 3, { issues });

      assert.deepStrictEqual(
        listing.comments.map((comment) => comment.id),
        [202, 203, 204]
      );
    });

    it('adds the page before a short last page', async () => {
      const issues = new FakeIssues().add(makeIssue(7, { comments: 205 }), many);

      const listing = await listRecentComments(7, 8, { issues });

      assert.deepStrictEqual(
        listing.comments.map((comment) => comment.id),
        [197, 198, 199, 200, 201, 202, 203, 204]
      );
    });
  });

  it('prints each comment with its UTC time and edits', async () => {
    const issues = new FakeIssues().add(makeIssue(4, { title: 'Flaky build', isPullRequest: true }), comments);
    const listing = await listRecentComments(4, 2, { issues });
    const capture = captureLogger();

    printCommentListing(listing, capture.log);

    const rule = '─'.repeat(42);
    assert.deepStrictEqual(capture.text().slice(3), [
      'Title: Flaky build',
      'State: open',
      'URL: https://github.com/acme/widgets/issues/4',
      '',
      'Last 2 comments:',
      '',
      rule,
      '2024-05-01 11:00 UTC by @dev1',
      'Updated: 2024-05-02 08:05 UTC',
      '',
      'second',
      rule,
      '2024-05-01 12:00 UTC by @octo',
      '',
      'third',
      rule,
      '',
      'Showing 2 of last 2 comments',
      '',
      'Note: this issue is a pull request',
    ]);
  });

  it('warns when there are no comments', async () => {
    const issues = new FakeIssues().add(makeIssue(4));
    const capture = captureLogger();

    printCommentListing(await listRecentComments(4, 5, { issues }), capture.log);

    assert.strictEqual(capture.text().at(-1), '⚠️ WARN  No comments found on this issue');
  });
});
