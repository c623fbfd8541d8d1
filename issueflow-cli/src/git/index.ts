import { simpleGit, type SimpleGit } from 'simple-git';
import { WorkflowError, ErrorCode } from '../utils/errors.js';

/**
 * The local git operations the work-session commands need.
 */
export interface GitOperations {
  /** True when `git status --porcelain` is empty. */
  isClean(): Promise<boolean>;
  currentBranch(): Promise<string>;
  localBranchExists(name: string): Promise<boolean>;
  checkout(name: string): Promise<void>;
  createBranch(name: string): Promise<void>;
  pull(branch: string): Promise<void>;
  /** Unstaged and staged changes against HEAD, deduplicated. */
  modifiedFiles(): Promise<string[]>;
  /** One-line log entries whose message mentions `[#<issue>]`. */
  commitsForIssue(issueNumber: number, limit: number): Promise<string[]>;
  userName(): Promise<string | null>;
  remoteUrl(remote: string): Promise<string | null>;
}

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function gitFailure(operation: string, error: unknown): WorkflowError {
  const message = error instanceof Error ? error.message : String(error);
  return new WorkflowError(ErrorCode.WORKFLOW_GIT_FAILED, `git ${operation} failed: ${message}`, {
    context: { operation },
    cause: error instanceof Error ? error : undefined,
  });
}

export function createGitOperations(baseDir: string = process.cwd()): GitOperations {
  const git: SimpleGit = simpleGit(baseDir);

  const run = async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      throw gitFailure(operation, error);
    }
  };

  return {
    async isClean() {
      const output = await run('status', () => git.raw(['status', '--porcelain']));
      return output.trim() === '';
    },

    async currentBranch() {
      const output = await run('rev-parse', () => git.raw(['rev-parse', '--abbrev-ref', 'HEAD']));
      return output.trim();
    },

    async localBranchExists(name) {
      try {
        await git.raw(['show-ref', '--verify', '--quiet', `refs/heads/${name}`]);
        return true;
      } catch {
        // show-ref exits 1 when the ref is missing
        return false;
      }
    },

    async checkout(name) {
      await run('checkout', () => git.checkout(name));
    },

    async createBranch(name) {
      await run('checkout -b', () => git.checkoutLocalBranch(name));
    },

    async pull(branch) {
      await run('pull', () => git.pull('origin', branch));
    },

    async modifiedFiles() {
      const unstaged = await run('diff', () => git.raw(['diff', '--name-only', 'HEAD']));
      const staged = await run('diff --cached', () => git.raw(['diff', '--cached', '--name-only']));
      return [...new Set([...lines(unstaged), ...lines(staged)])];
    },

    async commitsForIssue(issueNumber, limit) {
      const output = await run('log', () =>
        git.raw(['log', '--oneline', `--grep=\\[#${issueNumber}\\]`, `-${limit}`])
      );
      return lines(output);
    },

    async userName() {
      try {
        const output = await git.raw(['config', 'user.name']);
        return output.trim() || null;
      } catch {
        // unset user.name makes git config exit 1
        return null;
      }
    },

    async remoteUrl(remote) {
      try {
        const output = await git.raw(['remote', 'get-url', remote]);
        return output.trim() || null;
      } catch {
        // no such remote, or not a repository
        return null;
      }
    },
  };
}
