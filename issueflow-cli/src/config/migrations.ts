/**
 * Configuration Migration System
 *
 * Version 1 is the flat upper-case key layout of the first configuration
 * template (`REPO`, `TOKEN_METHOD`, `STATUS_FIELD_ID`, `BACKLOG_ID`, ...).
 * Version 2 groups those settings into `repo`, `token`, `project`, `workflow`
 * and `logging` sections.
 */

import { CURRENT_CONFIG_VERSION, type ConfigVersion, SUPPORTED_CONFIG_VERSIONS } from './schema.js';
import { logger } from '../utils/logger.js';

export { CURRENT_CONFIG_VERSION, SUPPORTED_CONFIG_VERSIONS } from './schema.js';

/**
 * Result of a migration operation
 */
export interface MigrationResult {
  success: boolean;
  /** The migrated configuration (if successful) */
  config?: Record<string, unknown>;
  fromVersion: number;
  toVersion: number;
  changes: MigrationChange[];
  /** Warnings about dropped keys or manual intervention needed */
  warnings: string[];
  errors: string[];
}

export interface MigrationChange {
  type: 'added' | 'removed' | 'renamed' | 'modified';
  /** Path to the affected field (e.g., 'repo.owner') */
  path: string;
  description: string;
  oldValue?: unknown;
  newValue?: unknown;
}

type MigrationFn = (config: Record<string, unknown>) => {
  config: Record<string, unknown>;
  changes: MigrationChange[];
  warnings: string[];
};

const migrations: Map<number, MigrationFn> = new Map();

/**
 * Legacy key → v2 path. REPO is handled separately since it splits in two.
 */
export const LEGACY_KEY_MAP: Record<string, string> = {
  TOKEN_METHOD: 'token.method',
  TOKEN_ENV_VAR: 'token.envVar',
  TOKEN_FILE: 'token.file',
  TOKEN_SECRET: 'token.secret',
  PROJECT_ID: 'project.id',
  PROJECT_NAME: 'project.name',
  STATUS_FIELD_ID: 'project.fields.status',
  PRIORITY_FIELD_ID: 'project.fields.priority',
  SIZE_FIELD_ID: 'project.fields.size',
  ESTIMATE_FIELD_ID: 'project.fields.estimate',
  BACKLOG_ID: 'project.statusOptions.backlog',
  READY_ID: 'project.statusOptions.ready',
  IN_PROGRESS_ID: 'project.statusOptions.inProgress',
  IN_REVIEW_ID: 'project.statusOptions.inReview',
  DONE_ID: 'project.statusOptions.done',
  P0_ID: 'project.priorityOptions.P0',
  P1_ID: 'project.priorityOptions.P1',
  P2_ID: 'project.priorityOptions.P2',
  XS_ID: 'project.sizeOptions.XS',
  S_ID: 'project.sizeOptions.S',
  M_ID: 'project.sizeOptions.M',
  L_ID: 'project.sizeOptions.L',
  XL_ID: 'project.sizeOptions.XL',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a dotted path on a plain object, creating intermediate objects.
 */
export function setPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const segments = path.split('.');
  let current = target;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

/**
 * Migration from v1 to v2
 */
migrations.set(1, (config: Record<string, unknown>) => {
  const changes: MigrationChange[] = [];
  const warnings: string[] = [];
  const migrated: Record<string, unknown> = { version: 2 };

  changes.push({
    type: 'added',
    path: 'version',
    description: 'Added configuration version field',
    newValue: 2,
  });

  for (const [key, value] of Object.entries(config)) {
    if (key === 'version') continue;

    if (key === 'REPO') {
      const slug = typeof value === 'string' ? value : '';
      const [owner, name, ...rest] = slug.split('/');
      if (!owner || !name || rest.length > 0) {
        warnings.push(`REPO must be "owner/name", got "${slug}"; set repo.owner and repo.name manually`);
        continue;
      }
      setPath(migrated, 'repo.owner', owner);
      setPath(migrated, 'repo.name', name);
      changes.push({ type: 'renamed', path: 'repo', description: 'Split REPO into repo.owner and repo.name', oldValue: slug });
      continue;
    }

    const target = LEGACY_KEY_MAP[key];
    if (target) {
      setPath(migrated, target, value);
      changes.push({ type: 'renamed', path: target, description: `Moved ${key} to ${target}` });
    } else if (isRecord(value)) {
      // Already-grouped sections (partially migrated files) are carried over as they are.
      migrated[key] = value;
    } else {
      warnings.push(`Unrecognised legacy setting "${key}" was dropped`);
      changes.push({ type: 'removed', path: key, description: `Dropped unrecognised setting ${key}`, oldValue: value });
    }
  }

  return { config: migrated, changes, warnings };
});

/**
 * Detect the version of a configuration object
 * Returns 1 for legacy configs without version field
 */
export function detectConfigVersion(config: Record<string, unknown>): number {
  if (typeof config.version === 'number') {
    return config.version;
  }
  return 1;
}

export function isVersionSupported(version: number): version is ConfigVersion {
  return SUPPORTED_CONFIG_VERSIONS.some((supported) => supported === version);
}

/**
 * Migrate a configuration from its current version to the latest version
 */
export function migrateConfig(config: Record<string, unknown>): MigrationResult {
  const fromVersion = detectConfigVersion(config);
  const toVersion = CURRENT_CONFIG_VERSION;

  if (fromVersion === toVersion) {
    return {
      success: true,
      config,
      fromVersion,
      toVersion,
      changes: [],
      warnings: [],
      errors: [],
    };
  }

  if (!isVersionSupported(fromVersion)) {
    return {
      success: false,
      fromVersion,
      toVersion,
      changes: [],
      warnings: [],
      errors: [
        `Unsupported configuration version: ${fromVersion}. ` +
        `Supported versions: ${SUPPORTED_CONFIG_VERSIONS.join(', ')}. ` +
        `Please create a new configuration using "issueflow setup".`,
      ],
    };
  }

  let currentConfig = { ...config };
  const allChanges: MigrationChange[] = [];
  const allWarnings: string[] = [];

  for (let v = fromVersion; v < toVersion; v++) {
    const migration = migrations.get(v);
    if (!migration) {
      return {
        success: false,
        fromVersion,
        toVersion,
        changes: allChanges,
        warnings: allWarnings,
        errors: [`No migration found for version ${v} to ${v + 1}`],
      };
    }

    try {
      const result = migration(currentConfig);
      currentConfig = result.config;
      allChanges.push(...result.changes);
      allWarnings.push(...result.warnings);
      logger.debug(`Migrated config from v${v} to v${v + 1}`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        fromVersion,
        toVersion,
        changes: allChanges,
        warnings: allWarnings,
        errors: [`Migration from v${v} to v${v + 1} failed: ${errorMessage}`],
      };
    }
  }

  return {
    success: true,
    config: currentConfig,
    fromVersion,
    toVersion,
    changes: allChanges,
    warnings: allWarnings,
    errors: [],
  };
}

/**
 * Generate a summary of migration changes for display
 */
export function formatMigrationSummary(result: MigrationResult): string {
  const lines: string[] = [];

  if (result.success) {
    lines.push(`✓ Configuration migrated successfully from v${result.fromVersion} to v${result.toVersion}`);
    lines.push('');

    if (result.changes.length > 0) {
      lines.push('Changes made:');
      for (const change of result.changes) {
        const icon = change.type === 'added' ? '+' :
                     change.type === 'removed' ? '-' :
                     change.type === 'renamed' ? '~' : '*';
        lines.push(`  ${icon} ${change.path}: ${change.description}`);
      }
      lines.push('');
    }

    if (result.warnings.length > 0) {
      lines.push('Warnings:');
      for (const warning of result.warnings) {
        lines.push(`  ⚠ ${warning}`);
      }
      lines.push('');
    }
  } else {
    lines.push(`✗ Configuration migration failed from v${result.fromVersion} to v${result.toVersion}`);
    lines.push('');

    if (result.errors.length > 0) {
      lines.push('Errors:');
      for (const error of result.errors) {
        lines.push(`  ✗ ${error}`);
      }
      lines.push('');
    }
  }

  return lines.join('\n');
}

export function needsMigration(config: Record<string, unknown>): boolean {
  return detectConfigVersion(config) < CURRENT_CONFIG_VERSION;
}
