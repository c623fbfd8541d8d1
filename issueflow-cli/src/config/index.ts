import { readFileSync, existsSync, writeFileSync, copyFileSync } from 'fs';
import { resolve } from 'path';
import type { ZodError, ZodIssue } from 'zod';
import {
  ConfigSchema,
  defaultConfig,
  findCredentialsInConfig,
  CURRENT_CONFIG_VERSION,
  type Config,
} from './schema.js';
import { logger } from '../utils/logger.js';
import {
  ConfigError,
  ErrorCode,
  type RecoveryAction,
} from '../utils/errors.js';
import {
  migrateConfig,
  needsMigration,
  detectConfigVersion,
  formatMigrationSummary,
  setPath,
  type MigrationResult,
} from './migrations.js';

const log = logger.child('Config');

export const CONFIG_FILE_CANDIDATES = ['./issueflow.config.json', './.issueflow.json'] as const;

/**
 * Configuration field metadata for help and validation suggestions
 */
const configFieldHelp: Record<string, { description: string; envVar?: string; suggestion?: string; example?: string }> = {
  'version': {
    description: 'Configuration schema version for migration support',
    suggestion: `Current version is ${CURRENT_CONFIG_VERSION}. Run "issueflow config --upgrade" to migrate older configs.`,
    example: String(CURRENT_CONFIG_VERSION),
  },
  'repo.owner': {
    description: 'GitHub repository owner (username or organization)',
    envVar: 'ISSUEFLOW_REPO',
    suggestion: 'ISSUEFLOW_REPO takes the full "owner/name" slug',
    example: 'octocat',
  },
  'repo.name': {
    description: 'GitHub repository name',
    envVar: 'ISSUEFLOW_REPO',
    example: 'hello-world',
  },
  'token.method': {
    description: 'Where the GitHub token is read from: env, file or gcloud',
    envVar: 'ISSUEFLOW_TOKEN_METHOD',
    suggestion: 'Use "env" with GITHUB_TOKEN for local work',
    example: 'env',
  },
  'token.envVar': {
    description: 'Environment variable holding the token (method "env")',
    envVar: 'ISSUEFLOW_TOKEN_ENV_VAR',
    example: 'GITHUB_TOKEN',
  },
  'token.file': {
    description: 'File holding the token (method "file"); "~" is expanded',
    envVar: 'ISSUEFLOW_TOKEN_FILE',
    suggestion: 'Restrict access with chmod 600',
    example: '~/.github-token',
  },
  'token.secret': {
    description: 'Google Secret Manager secret name (method "gcloud")',
    envVar: 'ISSUEFLOW_TOKEN_SECRET',
    example: 'github-workflow-token',
  },
  'project.id': {
    description: 'Node id of the GitHub Projects board',
    envVar: 'ISSUEFLOW_PROJECT_ID',
    suggestion: 'Run "issueflow setup --discover-only" to list board identifiers',
    example: 'PVT_kwDOABCDEF',
  },
  'project.fields': {
    description: 'Field ids of the Status, Priority, Size and Estimate board fields',
    suggestion: 'Discovered by "issueflow setup"',
  },
  'project.statusOptions': {
    description: 'Option ids of Backlog, Ready, In progress, In review and Done',
    suggestion: 'Discovered by "issueflow setup"',
  },
  'project.priorityOptions': {
    description: 'Option ids of the P0, P1 and P2 priorities',
  },
  'project.sizeOptions': {
    description: 'Option ids of the XS, S, M, L and XL sizes',
  },
  'workflow.stateDir': {
    description: 'Directory holding work-session files and their archive',
    envVar: 'ISSUEFLOW_STATE_DIR',
    example: '.claude',
  },
  'workflow.branch': {
    description: 'Shared working branch all tracked development happens on',
    envVar: 'ISSUEFLOW_BRANCH',
    example: 'wip',
  },
  'workflow.baseBranch': {
    description: 'Base branch of the shared pull request',
    envVar: 'ISSUEFLOW_BASE_BRANCH',
    example: 'master',
  },
  'workflow.prTitle': {
    description: 'Title of the shared draft pull request',
    example: '[WIP] Sprint Development - Active Work',
  },
  'workflow.syncStatusLabels': {
    description: 'Add an "in progress" / "in review" label when the status changes',
    example: 'true',
  },
  'workflow.monitorIntervalSeconds': {
    description: 'Poll interval of "issueflow monitor" in seconds (1-3600)',
    example: '30',
  },
  'logging.level': {
    description: 'Minimum log level: debug, info, warn or error',
    envVar: 'LOG_LEVEL',
    suggestion: 'DEBUG=1 is a shortcut for debug',
    example: 'info',
  },
  'logging.format': {
    description: 'Output format: pretty for terminals, json for automation',
    envVar: 'LOG_FORMAT',
    example: 'pretty',
  },
};

function getValidationSuggestion(segments: Array<string | number>): string | undefined {
  const help = configFieldHelp[segments.join('.')] ?? configFieldHelp[segments.slice(0, 2).join('.')];
  if (!help) return undefined;

  const parts = [`    ${help.description}`];
  if (help.envVar) parts.push(`    Environment: ${help.envVar}`);
  if (help.suggestion) parts.push(`    Tip: ${help.suggestion}`);
  if (help.example) parts.push(`    Example: ${help.example}`);
  return parts.join('\n');
}

function buildRecoveryActionsFromValidation(errors: ZodIssue[]): RecoveryAction[] {
  const actions: RecoveryAction[] = [];
  const envVars = new Set<string>();

  for (const issue of errors) {
    const help = configFieldHelp[issue.path.join('.')];
    if (help?.envVar && !envVars.has(help.envVar)) {
      envVars.add(help.envVar);
      actions.push({
        description: `Set the ${help.envVar} environment variable`,
        automatic: false,
      });
    }
  }

  actions.push({
    description: 'Run "issueflow setup" to discover board IDs and write a configuration file',
    automatic: false,
  });
  actions.push({
    description: 'Run "issueflow help-config" for detailed configuration documentation',
    automatic: false,
  });

  return actions;
}

function createConfigValidationError(zodError: ZodError, configPath?: string): ConfigError {
  const errorMessages = zodError.errors.map((e) => {
    const path = e.path.join('.') || 'root';
    return `${path}: ${e.message}`;
  });

  const firstError = zodError.errors[0];
  const field = firstError ? firstError.path.join('.') || undefined : undefined;

  return new ConfigError(
    ErrorCode.CONFIG_VALIDATION_FAILED,
    `Configuration validation failed: ${errorMessages.join('; ')}`,
    {
      field,
      recoveryActions: buildRecoveryActionsFromValidation(zodError.errors),
      context: {
        validationErrors: zodError.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
          code: e.code,
        })),
        configPath,
        configSourcesChecked: configPath ? [configPath] : [...CONFIG_FILE_CANDIDATES],
      },
    }
  );
}

/**
 * Per-field explanation of validation failures, printed by `config --validate`.
 */
export function describeValidationErrors(error: ConfigError): string[] {
  const lines: string[] = [];
  const issues = error.context.validationErrors;
  if (!Array.isArray(issues)) return lines;

  for (const issue of issues) {
    if (typeof issue !== 'object' || issue === null) continue;
    const path = 'path' in issue && typeof issue.path === 'string' ? issue.path : '';
    const message = 'message' in issue && typeof issue.message === 'string' ? issue.message : '';
    lines.push(`  ${path || 'root'}: ${message}`);
    const suggestion = getValidationSuggestion(path.split('.'));
    if (suggestion) lines.push(suggestion);
  }
  return lines;
}

/**
 * Generate comprehensive configuration help text
 */
export function getConfigHelp(): string {
  const sections = [
    {
      title: 'REPOSITORY SETTINGS (repo.*)',
      fields: ['repo.owner', 'repo.name'],
    },
    {
      title: 'TOKEN SETTINGS (token.*)',
      fields: ['token.method', 'token.envVar', 'token.file', 'token.secret'],
    },
    {
      title: 'PROJECT BOARD SETTINGS (project.*)',
      fields: ['project.id', 'project.fields', 'project.statusOptions', 'project.priorityOptions', 'project.sizeOptions'],
    },
    {
      title: 'WORKFLOW SETTINGS (workflow.*)',
      fields: [
        'workflow.stateDir',
        'workflow.branch',
        'workflow.baseBranch',
        'workflow.prTitle',
        'workflow.syncStatusLabels',
        'workflow.monitorIntervalSeconds',
      ],
    },
    {
      title: 'LOGGING SETTINGS (logging.*)',
      fields: ['logging.level', 'logging.format'],
    },
  ];

  let output = '';

  for (const section of sections) {
    output += `${section.title}\n`;
    output += '─'.repeat(60) + '\n\n';

    for (const field of section.fields) {
      const help = configFieldHelp[field];
      if (help) {
        const fieldName = field.split('.').pop();
        output += `  ${fieldName}\n`;
        output += `    ${help.description}\n`;
        if (help.envVar) {
          output += `    Environment: ${help.envVar}\n`;
        }
        if (help.suggestion) {
          output += `    Tip: ${help.suggestion}\n`;
        }
        if (help.example) {
          output += `    Example: ${help.example}\n`;
        }
        output += '\n';
      }
    }
  }

  output += 'CONFIGURATION FILES\n';
  output += '─'.repeat(60) + '\n\n';
  output += '  Config files are searched in this order:\n';
  output += '    1. Path specified with -c/--config option\n';
  output += '    2. ./issueflow.config.json\n';
  output += '    3. ./.issueflow.json\n\n';
  output += '  Configuration precedence (highest to lowest):\n';
  output += '    1. Environment variables (a .env file is loaded at startup)\n';
  output += '    2. Config file values\n';
  output += '    3. Default values\n\n';
  output += '  The GitHub token is never stored in the config file.\n\n';

  output += 'QUICK START\n';
  output += '─'.repeat(60) + '\n\n';
  output += '  1. Export GITHUB_TOKEN (or pick another token method)\n';
  output += '  2. Run "issueflow setup" to discover the board and write the config\n';
  output += '  3. Run "issueflow config --validate" to verify\n';
  output += '  4. Run "issueflow audit issues" to see the open issues\n';

  return output;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Environment overrides, highest precedence.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const repo = env.ISSUEFLOW_REPO;
  if (repo) {
    const match = /^([^/\s]+)\/([^/\s]+)$/.exec(repo);
    if (!match) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, `ISSUEFLOW_REPO must be "owner/name", got "${repo}"`, {
        field: 'repo',
        value: repo,
      });
    }
    setPath(overrides, 'repo.owner', match[1]);
    setPath(overrides, 'repo.name', match[2]);
  }

  const mapping: Array<[string, string]> = [
    ['ISSUEFLOW_TOKEN_METHOD', 'token.method'],
    ['ISSUEFLOW_TOKEN_ENV_VAR', 'token.envVar'],
    ['ISSUEFLOW_TOKEN_FILE', 'token.file'],
    ['ISSUEFLOW_TOKEN_SECRET', 'token.secret'],
    ['ISSUEFLOW_PROJECT_ID', 'project.id'],
    ['ISSUEFLOW_STATE_DIR', 'workflow.stateDir'],
    ['ISSUEFLOW_BRANCH', 'workflow.branch'],
    ['ISSUEFLOW_BASE_BRANCH', 'workflow.baseBranch'],
    ['LOG_LEVEL', 'logging.level'],
    ['LOG_FORMAT', 'logging.format'],
  ];

  for (const [envVar, path] of mapping) {
    const value = env[envVar];
    if (value) {
      setPath(overrides, path, value);
    }
  }

  return overrides;
}

export interface LoadConfigOptions {
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory the default config file names are resolved against */
  cwd?: string;
  /** Whether to automatically migrate old configs in memory (default: true) */
  autoMigrate?: boolean;
}

export interface ConfigFile {
  path: string;
  raw: Record<string, unknown>;
}

/**
 * Find and parse the config file. Returns undefined when none of the default
 * candidates exist; an explicit path that does not exist is an error.
 */
export function readConfigFile(configPath?: string, cwd = process.cwd()): ConfigFile | undefined {
  const possiblePaths = configPath ? [configPath] : [...CONFIG_FILE_CANDIDATES];

  for (const path of possiblePaths) {
    const fullPath = resolve(cwd, path);
    if (!existsSync(fullPath)) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        ErrorCode.CONFIG_PARSE_ERROR,
        `Failed to parse config file ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
        {
          context: { configPath: fullPath },
          recoveryActions: [
            { description: 'Verify your config file is valid JSON', automatic: false },
            { description: 'Run "issueflow setup" to create a new configuration file', automatic: false },
          ],
          cause: error instanceof Error ? error : undefined,
        }
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Config file ${fullPath} must contain a JSON object`, {
        context: { configPath: fullPath },
      });
    }

    return { path: fullPath, raw: parsed };
  }

  if (configPath) {
    throw new ConfigError(ErrorCode.CONFIG_FILE_NOT_FOUND, `Config file not found: ${resolve(cwd, configPath)}`, {
      context: { configPath },
    });
  }

  return undefined;
}

export function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Config {
  const { env = process.env, cwd = process.cwd(), autoMigrate = true } = options;
  const file = readConfigFile(configPath, cwd);
  let fileConfig: Record<string, unknown> = {};

  if (file) {
    log.debug(`Loaded config from ${file.path}`);
    fileConfig = file.raw;

    const credentialPaths = findCredentialsInConfig(fileConfig);
    if (credentialPaths.length > 0) {
      throw new ConfigError(
        ErrorCode.CONFIG_INVALID,
        `Config file ${file.path} contains credentials (${credentialPaths.join(', ')}); tokens are never stored in configuration`,
        {
          field: credentialPaths[0],
          recoveryActions: [
            { description: 'Remove the token from the config file and revoke it', automatic: false },
            { description: 'Set token.method to env, file or gcloud instead', automatic: false },
          ],
        }
      );
    }

    if (needsMigration(fileConfig)) {
      const fromVersion = detectConfigVersion(fileConfig);
      if (!autoMigrate) {
        throw new ConfigError(
          ErrorCode.CONFIG_MIGRATION_FAILED,
          `Configuration file is at version ${fromVersion}, current version is ${CURRENT_CONFIG_VERSION}`,
          {
            context: { configPath: file.path },
            recoveryActions: [{ description: 'Run "issueflow config --upgrade"', automatic: false }],
          }
        );
      }

      log.warn(`Configuration file is at version ${fromVersion}, migrating in memory`);
      log.info('Run "issueflow config --upgrade" to save the migrated configuration to disk.');

      const migrationResult = migrateConfig(fileConfig);
      if (!migrationResult.success || !migrationResult.config) {
        throw new ConfigError(ErrorCode.CONFIG_MIGRATION_FAILED, migrationResult.errors.join('; '), {
          context: { configPath: file.path, fromVersion },
        });
      }
      for (const warning of migrationResult.warnings) {
        log.warn(warning);
      }
      fileConfig = migrationResult.config;
    }
  }

  const merged = deepMerge(deepMerge(defaultConfig, fileConfig), configFromEnv(env));
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    throw createConfigValidationError(result.error, file?.path);
  }

  return result.data;
}

export function saveConfig(path: string, config: Config | Record<string, unknown>): void {
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export interface UpgradeResult {
  success: boolean;
  configPath?: string;
  backupPath?: string;
  migrationResult?: MigrationResult;
  error?: string;
}

/**
 * Migrate the config file on disk to the current version, keeping a
 * `.backup` copy of the original.
 */
export function upgradeConfig(configPath?: string, cwd = process.cwd()): UpgradeResult {
  const file = readConfigFile(configPath, cwd);
  if (!file) {
    return { success: false, error: `No configuration file found (checked ${CONFIG_FILE_CANDIDATES.join(', ')})` };
  }

  if (!needsMigration(file.raw)) {
    return {
      success: true,
      configPath: file.path,
      migrationResult: {
        success: true,
        fromVersion: detectConfigVersion(file.raw),
        toVersion: CURRENT_CONFIG_VERSION,
        changes: [],
        warnings: [],
        errors: [],
      },
    };
  }

  const migrationResult = migrateConfig(file.raw);
  if (!migrationResult.success || !migrationResult.config) {
    return { success: false, configPath: file.path, migrationResult, error: migrationResult.errors.join('; ') };
  }

  const backupPath = `${file.path}.backup`;
  copyFileSync(file.path, backupPath);
  saveConfig(file.path, migrationResult.config);
  log.debug(formatMigrationSummary(migrationResult));

  return { success: true, configPath: file.path, backupPath, migrationResult };
}

export type { Config, TokenConfig, ProjectConfig, WorkflowConfig } from './schema.js';
export { ConfigSchema, CURRENT_CONFIG_VERSION } from './schema.js';
export { formatMigrationSummary, migrateConfig } from './migrations.js';
