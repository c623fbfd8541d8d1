/**
 * Structured error handling with error codes, severity levels and recovery suggestions.
 *
 * Every failure a command can hit maps onto one of four families:
 * configuration/credentials, missing external tools, GitHub API errors,
 * and violated local preconditions. Argument validation has its own
 * `UsageError`, raised before any network call.
 */

export type ErrorSeverity = 'critical' | 'error' | 'warning';

export enum ErrorCode {
  // GitHub API
  GITHUB_AUTH_FAILED = 'GITHUB_AUTH_FAILED',
  GITHUB_RATE_LIMITED = 'GITHUB_RATE_LIMITED',
  GITHUB_NOT_FOUND = 'GITHUB_NOT_FOUND',
  GITHUB_PERMISSION_DENIED = 'GITHUB_PERMISSION_DENIED',
  GITHUB_VALIDATION_FAILED = 'GITHUB_VALIDATION_FAILED',
  GITHUB_CONFLICT = 'GITHUB_CONFLICT',
  GITHUB_GRAPHQL_ERROR = 'GITHUB_GRAPHQL_ERROR',
  GITHUB_INVALID_RESPONSE = 'GITHUB_INVALID_RESPONSE',
  GITHUB_NETWORK_ERROR = 'GITHUB_NETWORK_ERROR',
  GITHUB_API_ERROR = 'GITHUB_API_ERROR',

  // Configuration and credentials
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_FILE_NOT_FOUND = 'CONFIG_FILE_NOT_FOUND',
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',
  CONFIG_MIGRATION_FAILED = 'CONFIG_MIGRATION_FAILED',
  CONFIG_TOKEN_UNAVAILABLE = 'CONFIG_TOKEN_UNAVAILABLE',

  // Command line usage
  USAGE_INVALID_ARGUMENT = 'USAGE_INVALID_ARGUMENT',

  // Local workflow preconditions
  WORKFLOW_UNCOMMITTED_CHANGES = 'WORKFLOW_UNCOMMITTED_CHANGES',
  WORKFLOW_INVALID_STATUS = 'WORKFLOW_INVALID_STATUS',
  WORKFLOW_SESSION_NOT_FOUND = 'WORKFLOW_SESSION_NOT_FOUND',
  WORKFLOW_SESSION_INVALID = 'WORKFLOW_SESSION_INVALID',
  WORKFLOW_LOG_TRUNCATED = 'WORKFLOW_LOG_TRUNCATED',
  WORKFLOW_BOARD_ITEM_NOT_FOUND = 'WORKFLOW_BOARD_ITEM_NOT_FOUND',
  WORKFLOW_GIT_FAILED = 'WORKFLOW_GIT_FAILED',
  WORKFLOW_SETUP_ABORTED = 'WORKFLOW_SETUP_ABORTED',

  // Local environment
  ENV_TOOL_MISSING = 'ENV_TOOL_MISSING',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface RecoveryAction {
  description: string;
  automatic: boolean;
}

export interface ErrorContext {
  operation?: string;
  component?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface StructuredErrorOptions {
  severity?: ErrorSeverity;
  recoveryActions?: RecoveryAction[];
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly recoveryActions: RecoveryAction[];
  public readonly context: ErrorContext;
  public readonly cause?: Error;
  public readonly timestamp: string;

  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions = {}) {
    super(message);
    this.name = 'StructuredError';
    this.code = code;
    this.severity = options.severity ?? inferSeverity(code);
    this.recoveryActions = options.recoveryActions ?? [];
    this.timestamp = new Date().toISOString();
    this.context = {
      ...options.context,
      timestamp: this.timestamp,
    };
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      recoveryActions: this.recoveryActions.map((a) => ({
        description: a.description,
        automatic: a.automatic,
      })),
      context: this.context,
      timestamp: this.timestamp,
      cause: this.cause?.message,
    };
  }

  getRecoverySuggestions(): string[] {
    return this.recoveryActions.map((a) => a.description);
  }
}

function inferSeverity(code: ErrorCode): ErrorSeverity {
  const criticalCodes = [
    ErrorCode.GITHUB_AUTH_FAILED,
    ErrorCode.CONFIG_INVALID,
    ErrorCode.CONFIG_VALIDATION_FAILED,
    ErrorCode.CONFIG_TOKEN_UNAVAILABLE,
    ErrorCode.ENV_TOOL_MISSING,
  ];
  return criticalCodes.includes(code) ? 'critical' : 'error';
}

/**
 * GitHub API error, raised for failed requests and for responses that do not
 * have the shape a caller expects.
 */
export class GitHubError extends StructuredError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      statusCode?: number;
      endpoint?: string;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(code, message, {
      severity: options.statusCode === 401 || options.statusCode === 403 ? 'critical' : 'error',
      recoveryActions: options.recoveryActions ?? getGitHubRecoveryActions(code),
      context: {
        ...options.context,
        statusCode: options.statusCode,
        endpoint: options.endpoint,
      },
      cause: options.cause,
    });
    this.name = 'GitHubError';
    this.statusCode = options.statusCode;
    this.endpoint = options.endpoint;
  }
}

function getGitHubRecoveryActions(code: ErrorCode): RecoveryAction[] {
  const actions: RecoveryAction[] = [];

  switch (code) {
    case ErrorCode.GITHUB_AUTH_FAILED:
      actions.push({ description: 'Verify your GitHub token is valid and not expired', automatic: false });
      actions.push({ description: 'Generate a new token at https://github.com/settings/tokens', automatic: false });
      actions.push({ description: 'Ensure the token has the repo and project scopes', automatic: false });
      break;

    case ErrorCode.GITHUB_RATE_LIMITED:
      actions.push({ description: 'Wait for the rate limit window to reset, then run the command again', automatic: false });
      break;

    case ErrorCode.GITHUB_NOT_FOUND:
      actions.push({ description: 'Verify the repository slug and the issue or PR number', automatic: false });
      actions.push({ description: 'Check that your token has access to the repository', automatic: false });
      break;

    case ErrorCode.GITHUB_PERMISSION_DENIED:
      actions.push({ description: 'Verify your token has the required permissions (repo, project)', automatic: false });
      break;

    case ErrorCode.GITHUB_GRAPHQL_ERROR:
      actions.push({ description: 'Check the project, field and option IDs in your configuration', automatic: false });
      actions.push({ description: 'Run "issueflow setup --discover-only" to list the current IDs', automatic: false });
      break;

    case ErrorCode.GITHUB_NETWORK_ERROR:
      actions.push({ description: 'Check your network connection and run the command again', automatic: false });
      break;
  }

  return actions;
}

/**
 * Configuration and credential error
 */
export class ConfigError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      field?: string;
      value?: unknown;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(code, message, {
      severity: 'critical',
      recoveryActions: options.recoveryActions ?? getConfigRecoveryActions(options.field),
      context: {
        ...options.context,
        field: options.field,
        invalidValue: options.value,
      },
      cause: options.cause,
    });
    this.name = 'ConfigError';
  }
}

function getConfigRecoveryActions(field?: string): RecoveryAction[] {
  const actions: RecoveryAction[] = [
    { description: 'Run "issueflow help-config" for configuration documentation', automatic: false },
    { description: 'Run "issueflow setup" to discover board IDs and write a configuration file', automatic: false },
  ];

  if (field) {
    actions.push({ description: `Check the value of "${field}" in your configuration`, automatic: false });
  }

  return actions;
}

/**
 * Invalid command line input. Always raised before any network call.
 */
export class UsageError extends StructuredError {
  constructor(message: string, options: { argument?: string; value?: unknown; allowed?: readonly string[] } = {}) {
    super(ErrorCode.USAGE_INVALID_ARGUMENT, message, {
      severity: 'error',
      recoveryActions: options.allowed
        ? [{ description: `Use one of: ${options.allowed.join(', ')}`, automatic: false }]
        : [],
      context: {
        argument: options.argument,
        invalidValue: options.value,
      },
    });
    this.name = 'UsageError';
  }
}

/**
 * Local precondition failure (dirty working tree, wrong board status, missing
 * session file, missing tool).
 */
export class WorkflowError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      issueNumber?: number;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(code, message, {
      recoveryActions: options.recoveryActions ?? getWorkflowRecoveryActions(code, options.issueNumber),
      context: {
        ...options.context,
        issueNumber: options.issueNumber,
      },
      cause: options.cause,
    });
    this.name = 'WorkflowError';
  }
}

function getWorkflowRecoveryActions(code: ErrorCode, issueNumber?: number): RecoveryAction[] {
  const actions: RecoveryAction[] = [];
  const issueRef = issueNumber !== undefined ? String(issueNumber) : '<issue>';

  switch (code) {
    case ErrorCode.WORKFLOW_UNCOMMITTED_CHANGES:
      actions.push({ description: 'Commit or stash your changes before switching work', automatic: false });
      break;

    case ErrorCode.WORKFLOW_SESSION_NOT_FOUND:
      actions.push({ description: `Run "issueflow work start ${issueRef}" first`, automatic: false });
      break;

    case ErrorCode.WORKFLOW_BOARD_ITEM_NOT_FOUND:
      actions.push({ description: `Run "issueflow status ${issueRef} backlog" to add the issue to the board`, automatic: false });
      break;

    case ErrorCode.WORKFLOW_LOG_TRUNCATED:
      actions.push({ description: 'Reload the session file before saving; the work log is append-only', automatic: false });
      break;
  }

  return actions;
}

/**
 * Wrap an error as a StructuredError if it isn't already
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = ErrorCode.UNKNOWN_ERROR,
  context?: ErrorContext
): StructuredError {
  if (error instanceof StructuredError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new StructuredError(defaultCode, message, { context, cause });
}

/**
 * Shape of the errors thrown by Octokit's request and graphql functions.
 */
interface OctokitLikeError {
  status?: unknown;
  message?: unknown;
  code?: unknown;
  errors?: unknown;
  response?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readStatus(error: OctokitLikeError): number | undefined {
  if (typeof error.status === 'number') return error.status;
  if (isRecord(error.response) && typeof error.response.status === 'number') return error.response.status;
  return undefined;
}

/**
 * Create a GitHub error from an Octokit error response
 */
export function createGitHubErrorFromResponse(
  error: unknown,
  endpoint?: string,
  context?: ErrorContext
): GitHubError {
  if (error instanceof GitHubError) {
    return error;
  }

  const details: OctokitLikeError = isRecord(error) ? error : {};
  const statusCode = readStatus(details);
  const message =
    error instanceof Error ? error.message : typeof details.message === 'string' ? details.message : String(error);

  let code: ErrorCode;

  switch (statusCode) {
    case 401:
      code = ErrorCode.GITHUB_AUTH_FAILED;
      break;
    case 403:
      code = message.toLowerCase().includes('rate limit')
        ? ErrorCode.GITHUB_RATE_LIMITED
        : ErrorCode.GITHUB_PERMISSION_DENIED;
      break;
    case 404:
      code = ErrorCode.GITHUB_NOT_FOUND;
      break;
    case 409:
      code = ErrorCode.GITHUB_CONFLICT;
      break;
    case 422:
      code = ErrorCode.GITHUB_VALIDATION_FAILED;
      break;
    default:
      if (Array.isArray(details.errors)) {
        code = ErrorCode.GITHUB_GRAPHQL_ERROR;
      } else if (details.code === 'ENOTFOUND' || details.code === 'ETIMEDOUT' || details.code === 'ECONNRESET') {
        code = ErrorCode.GITHUB_NETWORK_ERROR;
      } else {
        code = ErrorCode.GITHUB_API_ERROR;
      }
  }

  return new GitHubError(code, message, {
    statusCode,
    endpoint,
    context: {
      ...context,
      responseData: isRecord(details.response) ? details.response.data : undefined,
    },
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * True when the error is a GitHub 404, used by lookups that treat "missing" as a value.
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof GitHubError && error.statusCode === 404;
}

/**
 * Format a StructuredError for display
 */
export function formatError(error: StructuredError): string {
  const lines: string[] = [];

  lines.push(`[${error.code}] ${error.message}`);
  lines.push(`  Severity: ${error.severity}`);

  if (error.recoveryActions.length > 0) {
    lines.push('  Recovery suggestions:');
    for (const action of error.recoveryActions) {
      const prefix = action.automatic ? '(auto)' : '(manual)';
      lines.push(`    ${prefix} ${action.description}`);
    }
  }

  const contextEntries = Object.entries(error.context).filter(
    ([key, value]) => value !== undefined && key !== 'timestamp'
  );
  if (contextEntries.length > 0) {
    lines.push('  Context:');
    for (const [key, value] of contextEntries) {
      lines.push(`    ${key}: ${JSON.stringify(value)}`);
    }
  }

  return lines.join('\n');
}
