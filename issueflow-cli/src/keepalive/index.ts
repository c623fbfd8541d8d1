/**
 * Keepalive supervisor. Writes a heartbeat line on a timer so a long-lived
 * workspace session looks active, and a watchdog restarts the heartbeat
 * if it stops.
 */

import { spawn } from 'child_process';
import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync, appendFileSync } from 'fs';
import { join } from 'path';
import { logger, type Logger } from '../utils/logger.js';
import { WorkflowError, ErrorCode } from '../utils/errors.js';
import { systemClock, type Clock } from '../utils/time.js';

export const HEARTBEAT_INTERVAL_MS = 180_000;
export const WATCHDOG_INTERVAL_MS = 60_000;
export const MAX_LOG_LINES = 1000;
export const KEEP_LOG_LINES = 100;

export const KEEPALIVE_LOG = 'keepalive.log';
export const MONITOR_LOG = 'monitor.log';
export const PID_FILE = 'keepalive.pid';

/**
 * Append one line, first cutting the file down to its last `keepLines`
 * lines when it holds more than `maxLines`.
 */
export function appendWithTruncation(
  path: string,
  line: string,
  maxLines: number = MAX_LOG_LINES,
  keepLines: number = KEEP_LOG_LINES
): void {
  if (existsSync(path)) {
    const lines = readFileSync(path, 'utf-8').split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    if (lines.length > maxLines) {
      writeFileSync(path, lines.slice(-keepLines).join('\n') + '\n', 'utf-8');
    }
  }
  appendFileSync(path, line + '\n', 'utf-8');
}

export interface KeepaliveOptions {
  dir: string;
  heartbeatMs?: number;
  watchdogMs?: number;
  clock?: Clock;
}

export class KeepaliveSupervisor {
  private heartbeat: NodeJS.Timeout | null = null;
  private watchdog: NodeJS.Timeout | null = null;
  private lastBeatAt: number | null = null;
  private readonly heartbeatMs: number;
  private readonly watchdogMs: number;
  private readonly clock: Clock;
  private readonly log: Logger = logger.child('Keepalive');

  constructor(private readonly options: KeepaliveOptions) {
    this.heartbeatMs = options.heartbeatMs ?? HEARTBEAT_INTERVAL_MS;
    this.watchdogMs = options.watchdogMs ?? WATCHDOG_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
  }

  get keepaliveLogPath(): string {
    return join(this.options.dir, KEEPALIVE_LOG);
  }

  get monitorLogPath(): string {
    return join(this.options.dir, MONITOR_LOG);
  }

  get isRunning(): boolean {
    return this.watchdog !== null;
  }

  start(): void {
    if (this.isRunning) return;
    mkdirSync(this.options.dir, { recursive: true });
    this.startHeartbeat();
    this.watchdog = setInterval(() => this.check(), this.watchdogMs);
    this.log.info(`Keepalive running; logs in ${this.options.dir}`);
  }

  stop(): void {
    this.stopHeartbeat();
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
  }

  /** Write one heartbeat line. */
  beat(): void {
    const now = this.clock();
    this.lastBeatAt = now.getTime();
    appendWithTruncation(this.keepaliveLogPath, `[${now.toISOString()}] Heartbeat: waiting for the next instruction.`);
  }

  /** Heartbeat timer exists and has written within two intervals. */
  heartbeatAlive(): boolean {
    if (this.heartbeat === null || this.lastBeatAt === null) return false;
    return this.clock().getTime() - this.lastBeatAt <= this.heartbeatMs * 2;
  }

  /** One watchdog pass. Returns true when the heartbeat had to be restarted. */
  check(): boolean {
    const stamp = this.clock().toISOString();
    if (this.heartbeatAlive()) {
      appendWithTruncation(this.monitorLogPath, `[${stamp}] Keep-alive heartbeat is running`);
      return false;
    }
    appendWithTruncation(this.monitorLogPath, `[${stamp}] WARNING: Keep-alive heartbeat not found! Restarting...`);
    this.stopHeartbeat();
    this.startHeartbeat();
    this.log.warn('Heartbeat restarted');
    return true;
  }

  /**
   * Stop the heartbeat timer without stopping the watchdog, which then
   * restarts it on its next pass.
   */
  stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  private startHeartbeat(): void {
    this.beat();
    this.heartbeat = setInterval(() => this.beat(), this.heartbeatMs);
  }
}

/**
 * Run the supervisor in this process until SIGINT or SIGTERM.
 */
export function runKeepalive(options: KeepaliveOptions): Promise<void> {
  const supervisor = new KeepaliveSupervisor(options);
  supervisor.start();

  return new Promise((resolve) => {
    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}, stopping keepalive`);
      supervisor.stop();
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}

export interface KeepaliveStatus {
  running: boolean;
  pid: number | null;
  pidFile: string;
}

function readPid(pidFile: string): number | null {
  if (!existsSync(pidFile)) return null;
  const value = Number(readFileSync(pidFile, 'utf-8').trim());
  return Number.isInteger(value) && value > 0 ? value : null;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists under another user
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export function keepaliveStatus(dir: string): KeepaliveStatus {
  const pidFile = join(dir, PID_FILE);
  const pid = readPid(pidFile);
  return { running: pid !== null && processAlive(pid), pid, pidFile };
}

/**
 * Launch `issueflow keepalive run` as a detached background process and
 * record its pid.
 */
export function startDetachedKeepalive(dir: string, scriptPath: string = process.argv[1] ?? ''): KeepaliveStatus {
  const current = keepaliveStatus(dir);
  if (current.running) {
    logger.warn(`Keepalive already running with PID ${current.pid}`);
    return current;
  }
  if (!scriptPath) {
    throw new WorkflowError(ErrorCode.INTERNAL_ERROR, 'Cannot locate the issueflow entry point to relaunch');
  }

  mkdirSync(dir, { recursive: true });
  const child = spawn(process.execPath, [...process.execArgv, scriptPath, 'keepalive', 'run', '--dir', dir], {
    detached: true,
    stdio: 'ignore',
  });
  child.unref();

  if (child.pid === undefined) {
    throw new WorkflowError(ErrorCode.INTERNAL_ERROR, 'Failed to start the keepalive process');
  }
  writeFileSync(current.pidFile, `${child.pid}\n`, 'utf-8');
  return { running: true, pid: child.pid, pidFile: current.pidFile };
}

export function stopDetachedKeepalive(dir: string): KeepaliveStatus {
  const current = keepaliveStatus(dir);
  if (current.pid !== null && current.running) {
    process.kill(current.pid, 'SIGTERM');
  }
  if (existsSync(current.pidFile)) {
    unlinkSync(current.pidFile);
  }
  return { running: false, pid: current.pid, pidFile: current.pidFile };
}
