import { describe, it } from 'node:test';
import assert from 'node:assert';
import { openAllPRs } from './index.js';
import { captureLogger, FakePulls, makePR } from '../test-utils/fakes.js';

describe('openAllPRs', () => {
  it('opens every open PR in order', async () => {
    const pulls = new FakePulls().add(makePR(4)).add(makePR(9)).add(makePR(11, { state: 'closed' }));
    const opened: string[] = [];

    const result = await openAllPRs({
      pulls,
      log: captureLogger().log,
      openUrl: async (url) => opened.push(url),
      delayMs: 0,
    });

    const urls = ['https://github.com/acme/widgets/pull/4', 'https://github.com/acme/widgets/pull/9'];
    assert.deepStrictEqual(opened, urls);
    assert.deepStrictEqual(result, { urls, opened: urls, failed: [] });
  });

  it('reports a failed open and continues', async () => {
    const pulls = new FakePulls().add(makePR(4)).add(makePR(9));
    const capture = captureLogger();

    const result = await openAllPRs({
      pulls,
      log: capture.log,
      openUrl: async (url) => {
        if (url.endsWith('/4')) throw new Error('no browser');
      },
      delayMs: 0,
    });

    assert.deepStrictEqual(result.failed, ['https://github.com/acme/widgets/pull/4']);
    assert.deepStrictEqual(result.opened, ['https://github.com/acme/widgets/pull/9']);
    assert.ok(
      capture.text().includes('⚠️ WARN  Failed to open: https://github.com/acme/widgets/pull/4 {"error":"no browser"}')
    );
    assert.strictEqual(capture.text().at(-1), '✓ Done!');
  });

  it('does nothing when no PRs are open', async () => {
    const capture = captureLogger();
    let calls = 0;

    const result = await openAllPRs({
      pulls: new FakePulls(),
      log: capture.log,
      openUrl: async () => {
        calls += 1;
      },
    });

    assert.deepStrictEqual(result, { urls: [], opened: [], failed: [] });
    assert.strictEqual(calls, 0);
    assert.strictEqual(capture.text().at(-1), 'No open pull requests found.');
  });
});
