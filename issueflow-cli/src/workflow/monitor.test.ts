import { describe, it } from 'node:test';
import assert from 'node:assert';
import { StatusMonitor, type StatusMonitorDeps } from './monitor.js';
import { captureLogger, fixedClock, testConfig, type LogCapture } from '../test-utils/fakes.js';

function scriptedBoard(statuses: Array<string | null | Error>, onPoll?: (count: number) => void) {
  let count = 0;
  return {
    async getItemFieldValue(): Promise<string | null> {
      count += 1;
      onPoll?.(count);
      const next = statuses.shift();
      if (next instanceof Error) throw next;
      return next ?? null;
    },
  };
}

function fakeStore(hasSession: boolean) {
  const appended: string[] = [];
  return {
    appended,
    exists: () => hasSession,
    appendLog(_issueNumber: number, action: string) {
      appended.push(action);
      return {
        version: 2 as const,
        issueNumber: 12,
        title: '',
        branch: 'wip',
        prNumber: null,
        status: 'in-progress' as const,
        lastStatus: null,
        startedAt: '',
        workLog: [],
        filesModified: [],
        nextSteps: [],
        testInstructions: '',
      };
    },
  };
}

function monitorWith(
  board: StatusMonitorDeps['board'],
  store: StatusMonitorDeps['store'],
  capture: LogCapture = captureLogger()
): StatusMonitor {
  return new StatusMonitor(
    12,
    { config: testConfig(), board, store, log: capture.log },
    { intervalMs: 1, handleSignals: false, clock: fixedClock('2024-05-01T09:00:00Z') }
  );
}

describe('StatusMonitor', () => {
  it('reports only changes', async () => {
    const monitor = monitorWith(scriptedBoard(['Ready', 'Ready', 'In review']), fakeStore(false));

    assert.deepStrictEqual(await monitor.poll(), { kind: 'changed', status: 'Ready', previous: null, resumed: false });
    assert.deepStrictEqual(await monitor.poll(), { kind: 'unchanged', status: 'Ready' });
    assert.deepStrictEqual(await monitor.poll(), {
      kind: 'changed',
      status: 'In review',
      previous: 'Ready',
      resumed: false,
    });
    assert.strictEqual(monitor.currentStatus, 'In review');
  });

  it('logs the return to In progress into the session', async () => {
    const store = fakeStore(true);
    const capture = captureLogger();
    const monitor = monitorWith(scriptedBoard(['In review', 'In progress']), store, capture);

    await monitor.poll();
    const outcome = await monitor.poll();

    assert.deepStrictEqual(outcome, { kind: 'changed', status: 'In progress', previous: 'In review', resumed: true });
    assert.deepStrictEqual(store.appended, ['Issue moved back to In Progress from In review']);
    assert.deepStrictEqual(capture.text(), [
      '[2024-05-01 09:00:00] Status: In review',
      '[2024-05-01 09:00:00] Status: In progress',
      '⚠️ WARN  Issue moved back to In Progress!',
      '✓ Updated work log',
      "Run 'issueflow work continue 12' to resume work",
      '\u0007',
    ]);
  });

  it('does not treat the first observation as a return', async () => {
    const store = fakeStore(true);
    const monitor = monitorWith(scriptedBoard(['In progress']), store);

    const outcome = await monitor.poll();

    assert.deepStrictEqual(outcome, { kind: 'changed', status: 'In progress', previous: null, resumed: false });
    assert.deepStrictEqual(store.appended, []);
  });

  it('warns without a session to update', async () => {
    const monitor = monitorWith(scriptedBoard(['Done', 'In progress']), fakeStore(false));
    await monitor.poll();
    const outcome = await monitor.poll();
    assert.deepStrictEqual(outcome, { kind: 'changed', status: 'In progress', previous: 'Done', resumed: false });
  });

  it('shows No Status for an issue off the board', async () => {
    const monitor = monitorWith(scriptedBoard([null]), fakeStore(false));
    assert.deepStrictEqual(await monitor.poll(), { kind: 'changed', status: 'No Status', previous: null, resumed: false });
  });

  it('keeps the last status across a failed poll', async () => {
    const capture = captureLogger();
    const monitor = monitorWith(scriptedBoard(['Ready', new Error('socket hang up'), 'Ready']), fakeStore(false), capture);

    await monitor.poll();
    assert.deepStrictEqual(await monitor.poll(), { kind: 'failed', error: 'socket hang up' });
    assert.deepStrictEqual(await monitor.poll(), { kind: 'unchanged', status: 'Ready' });
    assert.strictEqual(capture.text()[1], '❌ ERROR Error checking status. Retrying in 0.001s {"error":"socket hang up"}');
  });

  it('polls until stopped', async () => {
    let monitor: StatusMonitor | undefined;
    const board = scriptedBoard(['Ready', 'Ready', 'In review'], (count) => {
      if (count === 3) monitor?.stop();
    });
    monitor = monitorWith(board, fakeStore(false));

    await monitor.start();

    assert.strictEqual(monitor.currentStatus, 'In review');
  });
});
