import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { configureLoggerFromEnv, isLogFormat, isLogLevel, logger } from './logger.js';
import { ErrorCode, WorkflowError } from './errors.js';
import { captureLogger, messagesAt } from '../test-utils/fakes.js';

describe('Logger', () => {
  describe('levels', () => {
    it('drops messages below the configured level', () => {
      const { log, text } = captureLogger();
      log.setLevel('warn');
      log.info('hidden');
      log.warn('shown');
      assert.deepStrictEqual(text(), ['⚠️ WARN  shown']);
    });

    it('writes warnings and errors to stderr in pretty mode', () => {
      const { log, lines } = captureLogger();
      log.info('to stdout');
      log.warn('to stderr');
      log.error('also stderr');
      assert.deepStrictEqual(
        lines.map((line) => line.stream),
        ['out', 'err', 'err']
      );
    });
  });

  describe('pretty format', () => {
    it('prefixes child loggers with their component', () => {
      const { log, text } = captureLogger();
      log.child('Board').info('Scanned 3 items');
      assert.deepStrictEqual(text(), ['📋 INFO  [Board] Scanned 3 items']);
    });

    it('appends metadata as JSON', () => {
      const { log, text } = captureLogger();
      log.info('Created', { number: 7 });
      assert.deepStrictEqual(text(), ['📋 INFO  Created {"number":7}']);
    });

    it('renders the helper outputs', () => {
      const { log, text } = captureLogger();
      log.success('done');
      log.step(1, 3, 'Creating issue...');
      log.print('plain line');
      log.result('status', { ok: true });
      assert.deepStrictEqual(text(), ['✓ done', '[1/3] Creating issue...', 'plain line']);
    });
  });

  describe('json format', () => {
    it('emits one JSON object per line', () => {
      const capture = captureLogger('json');
      capture.log.child('Issues').warn('Unknown priority', { value: 'P9' });
      assert.deepStrictEqual(capture.entries(), [
        { level: 'warn', message: 'Unknown priority', component: 'Issues', meta: { value: 'P9' } },
      ]);
    });

    it('suppresses report lines and emits the result object', () => {
      const { log, text } = captureLogger('json');
      log.print('report line');
      log.divider();
      log.bell();
      log.result('create-issue', { number: 101 });
      assert.deepStrictEqual(text(), ['{"success":true,"action":"create-issue","data":{"number":101}}']);
    });

    it('marks success lines', () => {
      const capture = captureLogger('json');
      capture.log.success('Comment added');
      assert.deepStrictEqual(capture.entries(), [{ level: 'info', message: 'Comment added', meta: { status: 'success' } }]);
    });

    it('keeps the level of every entry', () => {
      const capture = captureLogger('json');
      capture.log.info('a');
      capture.log.warn('b');
      capture.log.child('Board').warn('c');
      assert.deepStrictEqual(messagesAt(capture, 'warn'), ['b', 'c']);
      assert.deepStrictEqual(messagesAt(capture, 'info'), ['a']);
    });

    it('serializes structured errors with their recovery actions', () => {
      const capture = captureLogger('json');
      capture.log.structuredError(
        new WorkflowError(ErrorCode.WORKFLOW_SESSION_NOT_FOUND, 'No work session found for issue #4', { issueNumber: 4 })
      );
      const [entry] = capture.entries();
      assert.strictEqual(entry?.error?.code, 'WORKFLOW_SESSION_NOT_FOUND');
      assert.deepStrictEqual(entry?.error?.context, { issueNumber: 4 });
      assert.deepStrictEqual(entry?.error?.recoveryActions, [
        { description: 'Run "issueflow work start 4" first', automatic: false },
      ]);
    });
  });

  it('shares settings between a parent and children created earlier', () => {
    const { log, text } = captureLogger();
    const child = log.child('Monitor');
    log.setFormat('json');
    child.info('switched');
    assert.deepStrictEqual(text(), ['{"level":"info","message":"switched","component":"Monitor"}']);
  });
});

describe('configureLoggerFromEnv', () => {
  afterEach(() => {
    logger.setLevel('info');
    logger.setFormat('pretty');
  });

  it('applies LOG_LEVEL and LOG_FORMAT', () => {
    configureLoggerFromEnv({ LOG_LEVEL: 'warn', LOG_FORMAT: 'json' });
    assert.strictEqual(logger.getLevel(), 'warn');
    assert.strictEqual(logger.getFormat(), 'json');
  });

  it('lets DEBUG override LOG_LEVEL', () => {
    configureLoggerFromEnv({ LOG_LEVEL: 'error', DEBUG: '1' });
    assert.strictEqual(logger.getLevel(), 'debug');
  });

  it('ignores unknown values and DEBUG=false', () => {
    configureLoggerFromEnv({ LOG_LEVEL: 'loud', LOG_FORMAT: 'xml', DEBUG: 'false' });
    assert.strictEqual(logger.getLevel(), 'info');
    assert.strictEqual(logger.getFormat(), 'pretty');
  });
});

describe('guards', () => {
  it('accept only known levels and formats', () => {
    assert.strictEqual(isLogLevel('debug'), true);
    assert.strictEqual(isLogLevel('trace'), false);
    assert.strictEqual(isLogFormat('json'), true);
    assert.strictEqual(isLogFormat('yaml'), false);
  });
});
