import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { WorkSessionSchema, type WorkSession, type WorkLogEntry } from './schema.js';
import { migrateSession } from './migrations.js';
import { WorkflowError, ErrorCode } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatCompactStamp, isoSeconds, systemClock, type Clock } from '../utils/time.js';

export interface ArchiveResult {
  sessionPath: string;
  detailsPath: string | null;
}

/**
 * Local work-session documents, one JSON file per issue under the state
 * directory. Last writer wins; there is no locking.
 */
export interface SessionStore {
  readonly dir: string;
  sessionPath(issueNumber: number): string;
  detailsPath(issueNumber: number): string;
  exists(issueNumber: number): boolean;
  /** Load, migrate and validate. Throws WORKFLOW_SESSION_NOT_FOUND when absent. */
  load(issueNumber: number): WorkSession;
  /** Write the whole document. Refuses to drop work-log entries already on disk. */
  save(session: WorkSession): void;
  /** Load, append one work-log entry stamped now, save. */
  appendLog(issueNumber: number, action: string): WorkSession;
  writeDetails(issueNumber: number, markdown: string): string;
  /** Move (not copy) the session and its details file into `archive/`. */
  archive(issueNumber: number): ArchiveResult;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sameEntry(a: WorkLogEntry, b: WorkLogEntry): boolean {
  return a.timestamp === b.timestamp && a.action === b.action;
}

export function createSessionStore(dir: string, clock: Clock = systemClock): SessionStore {
  const log = logger.child('Session');
  const archiveDir = join(dir, 'archive');

  const sessionPath = (issueNumber: number): string => join(dir, `issue-${issueNumber}.json`);
  const detailsPath = (issueNumber: number): string => join(dir, `issue-${issueNumber}-details.md`);

  const readDocument = (issueNumber: number): WorkSession => {
    const path = sessionPath(issueNumber);
    if (!existsSync(path)) {
      throw new WorkflowError(ErrorCode.WORKFLOW_SESSION_NOT_FOUND, `No work session found for issue #${issueNumber}`, {
        issueNumber,
        context: { path },
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new WorkflowError(ErrorCode.WORKFLOW_SESSION_INVALID, `Work session file ${path} is not valid JSON`, {
        issueNumber,
        context: { path },
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!isRecord(raw)) {
      throw new WorkflowError(ErrorCode.WORKFLOW_SESSION_INVALID, `Work session file ${path} must hold a JSON object`, {
        issueNumber,
        context: { path },
      });
    }

    const migration = migrateSession(raw);
    if (!migration.success || !migration.document) {
      throw new WorkflowError(ErrorCode.WORKFLOW_SESSION_INVALID, migration.errors.join('; '), {
        issueNumber,
        context: { path },
      });
    }
    if (migration.fromVersion !== migration.toVersion) {
      log.debug(`Migrated session #${issueNumber} from v${migration.fromVersion}`, { changes: migration.changes });
    }

    const parsed = WorkSessionSchema.safeParse(migration.document);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new WorkflowError(
        ErrorCode.WORKFLOW_SESSION_INVALID,
        `Work session file ${path} is invalid${issue ? `: ${issue.path.join('.')} ${issue.message}` : ''}`,
        { issueNumber, context: { path } }
      );
    }
    return parsed.data;
  };

  const store: SessionStore = {
    dir,
    sessionPath,
    detailsPath,

    exists(issueNumber) {
      return existsSync(sessionPath(issueNumber));
    },

    load(issueNumber) {
      return readDocument(issueNumber);
    },

    save(session) {
      const validated = WorkSessionSchema.parse(session);

      if (store.exists(validated.issueNumber)) {
        const onDisk = readDocument(validated.issueNumber);
        const keepsHistory =
          validated.workLog.length >= onDisk.workLog.length &&
          onDisk.workLog.every((entry, index) => sameEntry(entry, validated.workLog[index]));
        if (!keepsHistory) {
          throw new WorkflowError(
            ErrorCode.WORKFLOW_LOG_TRUNCATED,
            `Refusing to save session #${validated.issueNumber}: the work log would lose entries`,
            {
              issueNumber: validated.issueNumber,
              context: { onDisk: onDisk.workLog.length, saving: validated.workLog.length },
            }
          );
        }
      }

      mkdirSync(dir, { recursive: true });
      writeFileSync(sessionPath(validated.issueNumber), JSON.stringify(validated, null, 2) + '\n', 'utf-8');
    },

    appendLog(issueNumber, action) {
      const session = readDocument(issueNumber);
      const updated: WorkSession = {
        ...session,
        workLog: [...session.workLog, { timestamp: isoSeconds(clock()), action }],
      };
      store.save(updated);
      return updated;
    },

    writeDetails(issueNumber, markdown) {
      mkdirSync(dir, { recursive: true });
      const path = detailsPath(issueNumber);
      writeFileSync(path, markdown, 'utf-8');
      return path;
    },

    archive(issueNumber) {
      const source = sessionPath(issueNumber);
      if (!existsSync(source)) {
        throw new WorkflowError(ErrorCode.WORKFLOW_SESSION_NOT_FOUND, `No work session found for issue #${issueNumber}`, {
          issueNumber,
          context: { path: source },
        });
      }

      mkdirSync(archiveDir, { recursive: true });
      const stamp = formatCompactStamp(clock());
      const archivedSession = join(archiveDir, `issue-${issueNumber}-${stamp}.json`);
      renameSync(source, archivedSession);

      let archivedDetails: string | null = null;
      const details = detailsPath(issueNumber);
      if (existsSync(details)) {
        archivedDetails = join(archiveDir, `issue-${issueNumber}-details-${stamp}.md`);
        renameSync(details, archivedDetails);
      }

      return { sessionPath: archivedSession, detailsPath: archivedDetails };
    },
  };

  return store;
}
