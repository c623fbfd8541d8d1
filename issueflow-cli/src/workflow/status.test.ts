import { describe, it } from 'node:test';
import assert from 'node:assert';
import { changeStatus } from './status.js';
import { GitHubError } from '../utils/errors.js';
import { captureLogger, FakeBoard, FakeIssues, makeIssue, testConfig } from '../test-utils/fakes.js';

function setup(syncStatusLabels = true) {
  const board = new FakeBoard();
  const issues = new FakeIssues();
  const capture = captureLogger();
  return {
    board,
    issues,
    capture,
    deps: { config: testConfig({ syncStatusLabels }), board, issues, log: capture.log },
  };
}

describe('changeStatus', () => {
  it('moves an item already on the board and syncs the label', async () => {
    const { board, issues, capture, deps } = setup();
    board.put(5, { FIELD_STATUS: 'Ready' });

    const result = await changeStatus(5, 'in-progress', deps);

    assert.deepStrictEqual(result, {
      issueNumber: 5,
      itemId: 'ITEM_1',
      addedToBoard: false,
      previousStatus: 'Ready',
      status: 'In progress',
      label: 'in progress',
    });
    assert.strictEqual(board.valueOf(5, 'FIELD_STATUS'), 'In progress');
    assert.deepStrictEqual(issues.labelsRemoved, [
      { issueNumber: 5, label: 'in-progress' },
      { issueNumber: 5, label: 'in review' },
    ]);
    assert.deepStrictEqual(issues.labelsAdded, [{ issueNumber: 5, labels: ['in progress'] }]);
    assert.deepStrictEqual(capture.text(), [
      '📋 INFO  Updating status of #5 from Ready to In progress...',
      '✓ Status updated successfully',
      "✓ Added 'in progress' label",
    ]);
  });

  it('adds a missing issue to the board first', async () => {
    const { board, issues, capture, deps } = setup();
    issues.add(makeIssue(9));

    const result = await changeStatus(9, 'ready', deps);

    assert.strictEqual(result.addedToBoard, true);
    assert.strictEqual(result.previousStatus, 'No Status');
    assert.strictEqual(board.valueOf(9, 'FIELD_STATUS'), 'Ready');
    assert.strictEqual(capture.text()[0], '⚠️ WARN  Issue #9 not found in project board. Adding it now...');
  });

  it('leaves labels alone for statuses without one', async () => {
    const { board, issues, deps } = setup();
    board.put(5, { FIELD_STATUS: 'In review' });

    const result = await changeStatus(5, 'done', deps);

    assert.strictEqual(result.label, null);
    assert.deepStrictEqual(issues.labelsAdded, []);
    assert.deepStrictEqual(issues.labelsRemoved, []);
  });

  it('skips labels when syncing is off', async () => {
    const { board, issues, deps } = setup(false);
    board.put(5);

    const result = await changeStatus(5, 'in-review', deps);

    assert.strictEqual(result.label, null);
    assert.deepStrictEqual(issues.labelsAdded, []);
  });

  it('fails when the issue exists neither on the board nor in the repository', async () => {
    const { deps } = setup();
    await assert.rejects(changeStatus(404, 'ready', deps), GitHubError);
  });
});
