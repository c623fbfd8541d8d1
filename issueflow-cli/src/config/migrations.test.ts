import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  detectConfigVersion,
  formatMigrationSummary,
  migrateConfig,
  needsMigration,
  setPath,
} from './migrations.js';

describe('Config migrations', () => {
  describe('detectConfigVersion', () => {
    it('treats a file without a version as the legacy layout', () => {
      assert.strictEqual(detectConfigVersion({ REPO: 'acme/widgets' }), 1);
      assert.strictEqual(detectConfigVersion({ version: 2 }), 2);
      assert.strictEqual(needsMigration({ REPO: 'acme/widgets' }), true);
      assert.strictEqual(needsMigration({ version: 2 }), false);
    });
  });

  describe('setPath', () => {
    it('creates intermediate objects and replaces scalars on the way', () => {
      const target: Record<string, unknown> = { project: 'flat' };
      setPath(target, 'project.fields.status', 'F1');
      setPath(target, 'project.fields.size', 'F2');
      assert.deepStrictEqual(target, { project: { fields: { status: 'F1', size: 'F2' } } });
    });
  });

  describe('migrateConfig', () => {
    it('groups legacy keys into sections', () => {
      const result = migrateConfig({
        REPO: 'acme/widgets',
        TOKEN_METHOD: 'gcloud',
        PROJECT_ID: 'PVT_board',
        DONE_ID: 'O_D',
        M_ID: 'O_M',
      });

      assert.strictEqual(result.success, true);
      assert.strictEqual(result.fromVersion, 1);
      assert.strictEqual(result.toVersion, 2);
      assert.deepStrictEqual(result.config, {
        version: 2,
        repo: { owner: 'acme', name: 'widgets' },
        token: { method: 'gcloud' },
        project: { id: 'PVT_board', statusOptions: { done: 'O_D' }, sizeOptions: { M: 'O_M' } },
      });
      assert.deepStrictEqual(result.warnings, []);
    });

    it('drops unknown scalar keys with a warning and keeps grouped sections', () => {
      const result = migrateConfig({
        REPO: 'acme/widgets',
        SLACK_WEBHOOK: 'none',
        workflow: { branch: 'dev' },
      });

      assert.deepStrictEqual(result.warnings, ['Unrecognised legacy setting "SLACK_WEBHOOK" was dropped']);
      assert.deepStrictEqual(result.config?.workflow, { branch: 'dev' });
      assert.strictEqual(result.config?.SLACK_WEBHOOK, undefined);
    });

    it('warns about a malformed REPO instead of guessing', () => {
      const result = migrateConfig({ REPO: 'widgets' });

      assert.strictEqual(result.success, true);
      assert.deepStrictEqual(result.warnings, [
        'REPO must be "owner/name", got "widgets"; set repo.owner and repo.name manually',
      ]);
      assert.strictEqual(result.config?.repo, undefined);
    });

    it('returns a current config unchanged', () => {
      const config = { version: 2, repo: { owner: 'acme', name: 'widgets' } };
      const result = migrateConfig(config);
      assert.strictEqual(result.config, config);
      assert.deepStrictEqual(result.changes, []);
    });

    it('fails for an unsupported version', () => {
      const result = migrateConfig({ version: 7 });
      assert.strictEqual(result.success, false);
      assert.deepStrictEqual(result.errors, [
        'Unsupported configuration version: 7. Supported versions: 1, 2. Please create a new configuration using "issueflow setup".',
      ]);
    });
  });

  describe('formatMigrationSummary', () => {
    it('lists changes with their markers', () => {
      const summary = formatMigrationSummary(migrateConfig({ REPO: 'acme/widgets', EXTRA: 1 }));
      assert.strictEqual(
        summary,
        [
          '✓ Configuration migrated successfully from v1 to v2',
          '',
          'Changes made:',
          '  + version: Added configuration version field',
          '  ~ repo: Split REPO into repo.owner and repo.name',
          '  - EXTRA: Dropped unrecognised setting EXTRA',
          '',
          'Warnings:',
          '  ⚠ Unrecognised legacy setting "EXTRA" was dropped',
          '',
        ].join('\n')
      );
    });

    it('lists errors for a failed migration', () => {
      const summary = formatMigrationSummary(migrateConfig({ version: 9 }));
      assert.ok(summary.startsWith('✗ Configuration migration failed from v9 to v2\n\nErrors:\n  ✗ Unsupported configuration version: 9.'));
    });
  });
});
