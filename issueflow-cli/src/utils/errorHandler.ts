import chalk from 'chalk';
import { ConfigError, GitHubError, StructuredError, UsageError, WorkflowError } from './errors.js';

export interface ErrorHandlerOptions {
  json?: boolean;
  verbose?: boolean;
}

export type ErrorType = 'usage_error' | 'config_error' | 'api_error' | 'workflow_error' | 'error';

export function errorType(error: unknown): ErrorType {
  if (error instanceof UsageError) return 'usage_error';
  if (error instanceof ConfigError) return 'config_error';
  if (error instanceof GitHubError) return 'api_error';
  if (error instanceof WorkflowError) return 'workflow_error';
  return 'error';
}

export interface CommandErrorResponse {
  success: false;
  action: string;
  error: string;
  code: string | null;
  type: ErrorType;
}

export function commandErrorResponse(error: unknown, action: string): CommandErrorResponse {
  return {
    success: false,
    action,
    error: error instanceof Error ? error.message : String(error),
    code: error instanceof StructuredError ? error.code : null,
    type: errorType(error),
  };
}

/**
 * Human-readable error block: the message, then recovery suggestions for
 * structured errors.
 */
export function renderCommandError(error: unknown, action: string, options: ErrorHandlerOptions = {}): string {
  const lines: string[] = [];

  if (error instanceof StructuredError) {
    lines.push(chalk.red(`Error ${action}: ${error.message}`));
    const suggestions = error.getRecoverySuggestions();
    if (suggestions.length > 0) {
      lines.push(chalk.yellow('Suggestions:'));
      for (const suggestion of suggestions) {
        lines.push(chalk.yellow(`  • ${suggestion}`));
      }
    }
    if (options.verbose) {
      lines.push(chalk.gray(`[${error.code}]`));
      if (error.cause?.stack) lines.push(chalk.gray(error.cause.stack));
    }
  } else if (error instanceof Error) {
    lines.push(chalk.red(`Error ${action}: ${error.message}`));
    if (options.verbose && error.stack) lines.push(chalk.gray(error.stack));
  } else {
    lines.push(chalk.red(`Error ${action}: ${String(error)}`));
  }

  return lines.join('\n');
}

export function handleCommandError(error: unknown, action: string, options: ErrorHandlerOptions = {}): never {
  if (options.json) {
    console.error(JSON.stringify(commandErrorResponse(error, action)));
  } else {
    console.error(renderCommandError(error, action, options));
  }
  process.exit(1);
}

export function wrapCommand<T extends unknown[]>(
  action: string,
  fn: (...args: T) => Promise<void>,
  getOptions?: (...args: T) => ErrorHandlerOptions
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      const options = getOptions ? getOptions(...args) : {};
      handleCommandError(error, action, options);
    }
  };
}
