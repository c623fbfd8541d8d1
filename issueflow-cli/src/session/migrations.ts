/**
 * Work-session document migrations. Same approach as the config migrations:
 * one function per version step, applied in order.
 */

import { CURRENT_SESSION_VERSION, LegacySessionSchema, SESSION_STATUSES, type SessionStatus } from './schema.js';

export interface SessionMigrationResult {
  success: boolean;
  document?: Record<string, unknown>;
  fromVersion: number;
  toVersion: number;
  changes: string[];
  errors: string[];
}

type SessionMigrationFn = (document: Record<string, unknown>) => { document: Record<string, unknown>; changes: string[] };

const migrations: Map<number, SessionMigrationFn> = new Map();

function toPositiveInt(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
  if (typeof value === 'string' && /^[0-9]+$/.test(value.trim()) && Number(value) > 0) return Number(value);
  return null;
}

function toStatus(value: string): SessionStatus {
  return SESSION_STATUSES.find((status) => status === value) ?? 'in-progress';
}

migrations.set(1, (document) => {
  const legacy = LegacySessionSchema.parse(document);
  const changes: string[] = [];

  const issueNumber = toPositiveInt(legacy.issue_number);
  if (issueNumber === null) {
    throw new Error(`issue_number "${String(legacy.issue_number)}" is not a number`);
  }

  const prNumber = toPositiveInt(legacy.pr_number);
  if (prNumber === null && legacy.pr_number !== undefined && legacy.pr_number !== null && legacy.pr_number !== '') {
    changes.push(`pr_number "${String(legacy.pr_number)}" recorded as no PR`);
  }

  const status = toStatus(legacy.status);
  if (status !== legacy.status) {
    changes.push(`status "${legacy.status}" recorded as ${status}`);
  }

  changes.push('Renamed snake_case fields to camelCase and added version');

  return {
    document: {
      version: 2,
      issueNumber,
      title: legacy.title,
      branch: legacy.branch,
      prNumber,
      status,
      lastStatus: legacy.last_status ?? null,
      startedAt: legacy.started_at,
      workLog: legacy.work_log,
      filesModified: [...new Set(legacy.files_modified)],
      nextSteps: legacy.next_steps,
      testInstructions: legacy.test_instructions,
    },
    changes,
  };
});

export function detectSessionVersion(document: Record<string, unknown>): number {
  return typeof document.version === 'number' ? document.version : 1;
}

export function migrateSession(document: Record<string, unknown>): SessionMigrationResult {
  const fromVersion = detectSessionVersion(document);
  const toVersion = CURRENT_SESSION_VERSION;

  if (fromVersion > toVersion || fromVersion < 1) {
    return {
      success: false,
      fromVersion,
      toVersion,
      changes: [],
      errors: [`Unsupported work-session version ${fromVersion}`],
    };
  }

  let current = document;
  const changes: string[] = [];

  for (let v = fromVersion; v < toVersion; v++) {
    const migration = migrations.get(v);
    if (!migration) {
      return { success: false, fromVersion, toVersion, changes, errors: [`No migration from version ${v}`] };
    }
    try {
      const result = migration(current);
      current = result.document;
      changes.push(...result.changes);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, fromVersion, toVersion, changes, errors: [`Migration from v${v} failed: ${message}`] };
    }
  }

  return { success: true, document: current, fromVersion, toVersion, changes, errors: [] };
}
