import type { Config } from '../config/schema.js';
import type { BoardManager } from '../github/board.js';
import type { SessionStore } from '../session/store.js';
import type { Logger } from '../utils/logger.js';
import { formatUtcSecond, systemClock, type Clock } from '../utils/time.js';
import { STATUS_DISPLAY } from './fields.js';
import { NO_STATUS } from './status.js';

export interface StatusMonitorOptions {
  /** Overrides `workflow.monitorIntervalSeconds` */
  intervalMs?: number;
  /** Stop on SIGINT/SIGTERM. Off in tests. */
  handleSignals?: boolean;
  clock?: Clock;
}

export interface StatusMonitorDeps {
  config: Config;
  board: Pick<BoardManager, 'getItemFieldValue'>;
  store: Pick<SessionStore, 'exists' | 'appendLog'>;
  log: Logger;
}

export type PollOutcome =
  | { kind: 'unchanged'; status: string }
  | { kind: 'changed'; status: string; previous: string | null; resumed: boolean }
  | { kind: 'failed'; error: string };

/**
 * Polls one issue's board Status and notices when it comes back to
 * "In progress". The last seen status lives in memory only.
 */
export class StatusMonitor {
  private lastStatus: string | null = null;
  private isRunning = false;
  private wake: (() => void) | null = null;
  private readonly intervalMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly issueNumber: number,
    private readonly deps: StatusMonitorDeps,
    private readonly options: StatusMonitorOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? deps.config.workflow.monitorIntervalSeconds * 1000;
    this.clock = options.clock ?? systemClock;
  }

  get currentStatus(): string | null {
    return this.lastStatus;
  }

  async poll(): Promise<PollOutcome> {
    const { config, board, store, log } = this.deps;

    let status: string;
    try {
      status = (await board.getItemFieldValue(this.issueNumber, config.project.fields.status)) ?? NO_STATUS;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Error checking status. Retrying in ${this.intervalMs / 1000}s`, { error: message });
      return { kind: 'failed', error: message };
    }

    if (status === this.lastStatus) {
      return { kind: 'unchanged', status };
    }

    const previous = this.lastStatus;
    this.lastStatus = status;
    log.print(`[${formatUtcSecond(this.clock())}] Status: ${status}`);

    const inProgress = STATUS_DISPLAY['in-progress'];
    let resumed = false;
    if (status === inProgress && previous !== null && previous !== inProgress) {
      log.warn('Issue moved back to In Progress!');
      if (store.exists(this.issueNumber)) {
        store.appendLog(this.issueNumber, `Issue moved back to In Progress from ${previous}`);
        log.success('Updated work log');
        log.print(`Run 'issueflow work continue ${this.issueNumber}' to resume work`);
        log.bell();
        resumed = true;
      }
    }

    return { kind: 'changed', status, previous, resumed };
  }

  async start(): Promise<void> {
    const { log } = this.deps;
    log.header(`Monitoring issue #${this.issueNumber} for status changes`);
    log.print('Press Ctrl+C to stop monitoring');

    const handleSignal = (signal: string): void => {
      log.info(`Received ${signal}, stopping monitor`);
      this.stop();
    };
    if (this.options.handleSignals ?? true) {
      process.once('SIGINT', handleSignal);
      process.once('SIGTERM', handleSignal);
    }

    this.isRunning = true;
    try {
      while (this.isRunning) {
        await this.poll();
        if (!this.isRunning) break;
        await this.sleep(this.intervalMs);
      }
    } finally {
      process.removeListener('SIGINT', handleSignal);
      process.removeListener('SIGTERM', handleSignal);
    }
  }

  stop(): void {
    this.isRunning = false;
    this.wake?.();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const finish = (): void => {
        clearTimeout(timeout);
        this.wake = null;
        resolve();
      };
      const timeout = setTimeout(finish, ms);
      this.wake = finish;
    });
  }
}
