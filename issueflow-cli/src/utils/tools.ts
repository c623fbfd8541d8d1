/**
 * External command helpers (gcloud, git presence checks)
 */

import { execFileSync } from 'child_process';
import { WorkflowError, ErrorCode } from './errors.js';

export interface CommandRunner {
  /** Run a command and return its trimmed stdout. Throws when it exits non-zero. */
  run(command: string, args: string[], input?: string): string;
  /** True when the command can be found on PATH. */
  exists(command: string): boolean;
}

function hasCode(error: unknown): error is { code: unknown } {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export const systemCommands: CommandRunner = {
  run(command, args, input) {
    return execFileSync(command, args, {
      encoding: 'utf-8',
      input,
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
  },

  exists(command) {
    try {
      execFileSync(command, ['--version'], { stdio: ['ignore', 'ignore', 'ignore'] });
      return true;
    } catch (error) {
      // Present but exiting non-zero still counts as installed.
      return !(hasCode(error) && error.code === 'ENOENT');
    }
  },
};

export const TOOL_INSTALL_HINTS: Record<string, string> = {
  git: 'Install git: https://git-scm.com/downloads',
  gcloud: 'Install the Google Cloud CLI: https://cloud.google.com/sdk/docs/install',
};

export function toolMissingError(tool: string, reason?: string): WorkflowError {
  const hint = TOOL_INSTALL_HINTS[tool] ?? `Install ${tool} and make sure it is on PATH`;
  return new WorkflowError(ErrorCode.ENV_TOOL_MISSING, `Required tool "${tool}" not found${reason ? ` (${reason})` : ''}`, {
    recoveryActions: [{ description: hint, automatic: false }],
    context: { tool },
  });
}

export function requireTool(runner: CommandRunner, tool: string, reason?: string): void {
  if (!runner.exists(tool)) {
    throw toolMissingError(tool, reason);
  }
}
