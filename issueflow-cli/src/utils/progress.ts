import ora, { type Ora } from 'ora';
import chalk from 'chalk';

export interface SpinnerOptions {
  /** JSON mode and non-interactive output get no spinner */
  enabled?: boolean;
}

/**
 * Spinner for the slow read-only commands (audits, listings). Falls back to
 * plain status lines when output is not a terminal.
 */
export class ProgressSpinner {
  private spinner: Ora | null = null;
  private readonly enabled: boolean;

  constructor(options: SpinnerOptions = {}) {
    this.enabled = options.enabled ?? Boolean(process.stdout.isTTY);
  }

  start(text: string): void {
    if (!this.enabled) return;

    if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.spinner = ora({ text, spinner: 'dots', color: 'cyan' }).start();
    }
  }

  update(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.start(text);
    }
  }

  succeed(message: string): void {
    if (!this.enabled) return;

    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else {
      console.log(`${chalk.green('✓')} ${message}`);
    }
  }

  fail(message: string): void {
    if (!this.enabled) return;

    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      console.log(`${chalk.red('✗')} ${message}`);
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

/**
 * Run `task` behind a spinner. The spinner fails with `failText` (or stops)
 * when the task throws, and the error propagates.
 */
export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  options: SpinnerOptions & { successText?: (value: T) => string; failText?: string } = {}
): Promise<T> {
  const spinner = new ProgressSpinner(options);
  spinner.start(text);
  try {
    const value = await task();
    if (options.successText) {
      spinner.succeed(options.successText(value));
    } else {
      spinner.stop();
    }
    return value;
  } catch (error) {
    if (options.failText) {
      spinner.fail(options.failText);
    } else {
      spinner.stop();
    }
    throw error;
  }
}
