import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  normalizePriority,
  normalizeSize,
  parseIssueNumber,
  parseStatusKeyword,
  resolveFieldUpdate,
  statusOptionId,
} from './fields.js';
import { ErrorCode, UsageError } from '../utils/errors.js';
import { testConfig } from '../test-utils/fakes.js';

const { project } = testConfig();

function usageError(message: string) {
  return (error: unknown): boolean =>
    error instanceof UsageError && error.code === ErrorCode.USAGE_INVALID_ARGUMENT && error.message === message;
}

describe('fields', () => {
  describe('parseStatusKeyword', () => {
    it('accepts keywords in any case', () => {
      assert.strictEqual(parseStatusKeyword('In-Review'), 'in-review');
      assert.strictEqual(parseStatusKeyword(' done '), 'done');
    });

    it('rejects anything else and lists the keywords', () => {
      assert.throws(() => parseStatusKeyword('doing'), usageError("Invalid status 'doing'"));
      try {
        parseStatusKeyword('in progress');
      } catch (error) {
        assert.ok(error instanceof UsageError);
        assert.deepStrictEqual(error.getRecoverySuggestions(), [
          'Use one of: backlog, ready, in-progress, in-review, done',
        ]);
      }
    });
  });

  it('maps each status keyword to its configured option', () => {
    assert.strictEqual(statusOptionId(project, 'backlog'), 'OPT_BACKLOG');
    assert.strictEqual(statusOptionId(project, 'in-progress'), 'OPT_IN_PROGRESS');
    assert.strictEqual(statusOptionId(project, 'in-review'), 'OPT_IN_REVIEW');
    assert.strictEqual(statusOptionId(project, 'done'), 'OPT_DONE');
  });

  describe('lenient create-time values', () => {
    it('uppercases known values', () => {
      assert.deepStrictEqual(normalizePriority('p0'), { value: 'P0', fallback: false });
      assert.deepStrictEqual(normalizeSize('xl'), { value: 'XL', fallback: false });
    });

    it('falls back to the defaults and flags explicit unknown values', () => {
      assert.deepStrictEqual(normalizePriority(undefined), { value: 'P2', fallback: false });
      assert.deepStrictEqual(normalizePriority('urgent'), { value: 'P2', fallback: true });
      assert.deepStrictEqual(normalizeSize(''), { value: 'M', fallback: false });
      assert.deepStrictEqual(normalizeSize('XXL'), { value: 'M', fallback: true });
    });
  });

  describe('resolveFieldUpdate', () => {
    it('resolves priority and size to option ids', () => {
      assert.deepStrictEqual(resolveFieldUpdate(project, 'Priority', 'p1'), {
        field: 'priority',
        fieldId: 'FIELD_PRIORITY',
        kind: 'option',
        optionId: 'OPT_P1',
        display: 'P1',
      });
      assert.deepStrictEqual(resolveFieldUpdate(project, 'size', 's'), {
        field: 'size',
        fieldId: 'FIELD_SIZE',
        kind: 'option',
        optionId: 'OPT_S',
        display: 'S',
      });
    });

    it('resolves an estimate to a number', () => {
      assert.deepStrictEqual(resolveFieldUpdate(project, 'estimate', '12'), {
        field: 'estimate',
        fieldId: 'FIELD_ESTIMATE',
        kind: 'number',
        value: 12,
        display: '12 hours',
      });
    });

    it('rejects unknown fields and values', () => {
      assert.throws(() => resolveFieldUpdate(project, 'status', 'done'), usageError("Invalid field 'status'"));
      assert.throws(() => resolveFieldUpdate(project, 'priority', 'P3'), usageError("Invalid priority 'P3'"));
      assert.throws(() => resolveFieldUpdate(project, 'size', 'XXL'), usageError("Invalid size 'XXL'"));
      assert.throws(
        () => resolveFieldUpdate(project, 'estimate', '2.5'),
        usageError("Estimate must be a whole number of hours, got '2.5'")
      );
    });
  });

  describe('parseIssueNumber', () => {
    it('accepts plain and #-prefixed numbers', () => {
      assert.strictEqual(parseIssueNumber('42'), 42);
      assert.strictEqual(parseIssueNumber('#7'), 7);
    });

    it('rejects zero, negatives and text', () => {
      for (const value of ['0', '-3', 'abc', '']) {
        assert.throws(() => parseIssueNumber(value), usageError(`Invalid issue number '${value}'`));
      }
    });
  });
});
