import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { mapProjectFields, parseRemoteUrl, parseRepoSlug, runSetup, type RepoRef, type SetupApi, type SetupDeps } from './index.js';
import type { Prompter } from './prompt.js';
import type { ProjectField, RepositoryProject } from '../github/board.js';
import type { CommandRunner } from '../utils/tools.js';
import { ErrorCode, UsageError, WorkflowError } from '../utils/errors.js';
import { captureLogger, FakeGit, makeTempDir, removeTempDir } from '../test-utils/fakes.js';

function selectField(name: string, options: string[]): ProjectField {
  return {
    id: `FIELD_${name.toUpperCase()}`,
    name,
    dataType: 'SINGLE_SELECT',
    options: options.map((option) => ({ id: `OPT_${option.toUpperCase().replace(' ', '_')}`, name: option })),
  };
}

function boardProject(overrides: Partial<RepositoryProject> = {}): RepositoryProject {
  return {
    id: 'PVT_board',
    title: 'Sprint Board',
    number: 3,
    fields: [
      selectField('Status', ['Backlog', 'Ready', 'In progress', 'In review', 'Done']),
      selectField('Priority', ['P0', 'P1', 'P2']),
      selectField('Size', ['XS', 'S', 'M', 'L', 'XL']),
      { id: 'FIELD_ESTIMATE', name: 'Estimate', dataType: 'NUMBER', options: [] },
    ],
    ...overrides,
  };
}

/** Answers popped in order; running out fails the test. */
class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(
    private readonly answers: string[] = [],
    private readonly confirms: boolean[] = []
  ) {}

  async question(prompt: string): Promise<string> {
    this.asked.push(prompt);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`Unexpected question: ${prompt}`);
    return answer;
  }

  secret(prompt: string): Promise<string> {
    return this.question(prompt);
  }

  async confirm(prompt: string): Promise<boolean> {
    this.asked.push(prompt);
    const answer = this.confirms.shift();
    if (answer === undefined) throw new Error(`Unexpected confirmation: ${prompt}`);
    return answer;
  }

  close(): void {}
}

const commands = (available: string[] = ['git']): CommandRunner & { runs: string[][] } => {
  const runs: string[][] = [];
  return {
    runs,
    run(command, args) {
      runs.push([command, ...args]);
      return '';
    },
    exists: (command) => available.includes(command),
  };
};

describe('parseRemoteUrl', () => {
  it('reads SSH and HTTPS remotes', () => {
    assert.deepStrictEqual(parseRemoteUrl('git@github.com:acme/widgets.git'), { owner: 'acme', name: 'widgets' });
    assert.deepStrictEqual(parseRemoteUrl('https://github.com/acme/widgets'), { owner: 'acme', name: 'widgets' });
  });

  it('returns null for other hosts', () => {
    assert.strictEqual(parseRemoteUrl('https://gitlab.com/acme/widgets.git'), null);
  });
});

describe('parseRepoSlug', () => {
  it('splits owner and name', () => {
    assert.deepStrictEqual(parseRepoSlug(' acme/widgets '), { owner: 'acme', name: 'widgets' });
  });

  it('rejects anything but owner/repo', () => {
    assert.throws(() => parseRepoSlug('widgets'), {
      name: 'UsageError',
      message: "Invalid repository 'widgets'. Use the format owner/repo",
    });
    assert.throws(() => parseRepoSlug('a/b/c'), UsageError);
  });
});

describe('mapProjectFields', () => {
  it('maps every field and option by name', () => {
    const mapping = mapProjectFields(boardProject());

    assert.deepStrictEqual(mapping.missing, []);
    assert.deepStrictEqual(mapping.found, ['Status field', 'Priority field', 'Size field', 'Estimate field']);
    assert.deepStrictEqual(mapping.project, {
      id: 'PVT_board',
      name: 'Sprint Board',
      fields: { status: 'FIELD_STATUS', priority: 'FIELD_PRIORITY', size: 'FIELD_SIZE', estimate: 'FIELD_ESTIMATE' },
      statusOptions: {
        backlog: 'OPT_BACKLOG',
        ready: 'OPT_READY',
        inProgress: 'OPT_IN_PROGRESS',
        inReview: 'OPT_IN_REVIEW',
        done: 'OPT_DONE',
      },
      priorityOptions: { P0: 'OPT_P0', P1: 'OPT_P1', P2: 'OPT_P2' },
      sizeOptions: { XS: 'OPT_XS', S: 'OPT_S', M: 'OPT_M', L: 'OPT_L', XL: 'OPT_XL' },
    });
  });

  it('lists missing fields and options and maps nothing', () => {
    const mapping = mapProjectFields(
      boardProject({
        fields: [
          selectField('Status', ['Backlog', 'Ready', 'In progress', 'In review']),
          selectField('Priority', ['P0', 'P1', 'P2']),
          selectField('Size', ['XS', 'S', 'M', 'L', 'XL']),
        ],
      })
    );

    assert.strictEqual(mapping.project, null);
    assert.deepStrictEqual(mapping.missing, ['Estimate field', "Status option 'Done'"]);
  });
});

describe('runSetup', () => {
  let cwd: string;
  let home: string;
  let connected: Array<{ token: string; repo: RepoRef }>;

  beforeEach(() => {
    cwd = makeTempDir();
    home = makeTempDir();
    connected = [];
  });

  afterEach(() => {
    removeTempDir(cwd);
    removeTempDir(home);
  });

  function deps(prompter: Prompter, overrides: Partial<SetupDeps> = {}, projects = [boardProject()]): SetupDeps {
    const api: SetupApi = {
      repository: {
        getRepository: async () => ({
          nodeId: 'R_widgets',
          fullName: 'acme/widgets',
          defaultBranch: 'master',
          htmlUrl: 'https://github.com/acme/widgets',
        }),
        getAuthenticatedUser: async () => ({ login: 'dev1' }),
      },
      board: { listRepositoryProjects: async () => projects },
    };
    return {
      prompter,
      commands: commands(),
      git: new FakeGit(),
      connect: (token, repo) => {
        connected.push({ token, repo });
        return api;
      },
      log: captureLogger().log,
      env: { GITHUB_TOKEN: 'test-secret' },
      homeDir: home,
      cwd,
      ...overrides,
    };
  }

  it('writes a configuration for the detected repository', async () => {
    const prompter = new ScriptedPrompter(['1'], [true, true]);

    const result = await runSetup({}, deps(prompter));

    const configPath = join(cwd, 'issueflow.config.json');
    assert.deepStrictEqual(
      { ...result, project: result.project?.id },
      { written: true, cancelled: false, configPath, repo: 'acme/widgets', project: 'PVT_board', tokenMethod: 'env' }
    );
    assert.deepStrictEqual(connected, [{ token: 'test-secret', repo: { owner: 'acme', name: 'widgets' } }]);
    assert.deepStrictEqual(prompter.asked, [
      'Found GITHUB_TOKEN in the environment. Use this token?',
      'Use this repository?',
      'Select project [1-1]: ',
    ]);

    const saved: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    assert.deepStrictEqual(saved, {
      version: 2,
      repo: { owner: 'acme', name: 'widgets' },
      token: { method: 'env', envVar: 'GITHUB_TOKEN', file: '~/.github-token', secret: 'github-workflow-token' },
      project: result.project,
      workflow: {
        stateDir: '.claude',
        branch: 'wip',
        baseBranch: 'master',
        prTitle: '[WIP] Sprint Development - Active Work',
        syncStatusLabels: true,
        monitorIntervalSeconds: 30,
      },
      logging: { level: 'info', format: 'pretty' },
    });
    assert.strictEqual(existsSync(join(cwd, '.claude', '.gitkeep')), true);
  });

  it('stores a file token only after the board maps', async () => {
    const prompter = new ScriptedPrompter(['2', 'test-secret', 'acme/widgets', '1']);
    const git = new FakeGit();
    git.remote = null;

    const result = await runSetup({}, deps(prompter, { env: {}, git }));

    assert.strictEqual(result.tokenMethod, 'file');
    assert.strictEqual(readFileSync(join(home, '.github-token'), 'utf-8'), 'test-secret\n');
  });

  it('aborts without writing anything when the board is incomplete', async () => {
    const prompter = new ScriptedPrompter(['2', 'test-secret', '1'], [true]);
    const incomplete = boardProject({ fields: boardProject().fields.slice(0, 3) });

    await assert.rejects(runSetup({}, deps(prompter, { env: {} }, [incomplete])), (error: unknown) => {
      assert.ok(error instanceof WorkflowError);
      assert.strictEqual(error.code, ErrorCode.WORKFLOW_SETUP_ABORTED);
      assert.strictEqual(error.message, 'Project board is missing: Estimate field. Nothing was written');
      return true;
    });
    assert.strictEqual(existsSync(join(cwd, 'issueflow.config.json')), false);
    assert.strictEqual(existsSync(join(home, '.github-token')), false);
  });

  it('fails when the repository has no boards', async () => {
    const prompter = new ScriptedPrompter([], [true, true]);

    await assert.rejects(runSetup({}, deps(prompter, {}, [])), {
      name: 'WorkflowError',
      message: 'No project boards found for acme/widgets',
    });
  });

  it('rejects an out-of-range project selection', async () => {
    const prompter = new ScriptedPrompter(['4'], [true, true]);

    await assert.rejects(runSetup({}, deps(prompter)), { name: 'UsageError', message: "Invalid selection '4'" });
  });

  it('leaves an existing configuration alone when reconfiguring is declined', async () => {
    writeFileSync(join(cwd, '.issueflow.json'), '{}\n', 'utf-8');
    const prompter = new ScriptedPrompter([], [false]);

    const result = await runSetup({}, deps(prompter));

    assert.strictEqual(result.cancelled, true);
    assert.strictEqual(readFileSync(join(cwd, '.issueflow.json'), 'utf-8'), '{}\n');
    assert.deepStrictEqual(prompter.asked, ['Reconfigure?']);
  });

  it('requires git', async () => {
    await assert.rejects(runSetup({}, deps(new ScriptedPrompter(), { commands: commands([]) })), (error: unknown) => {
      assert.ok(error instanceof WorkflowError);
      assert.strictEqual(error.code, ErrorCode.ENV_TOOL_MISSING);
      return true;
    });
  });

  it('only prints the IDs in discover mode', async () => {
    const capture = captureLogger();
    const prompter = new ScriptedPrompter(['1'], [true]);

    const result = await runSetup({ discoverOnly: true }, deps(prompter, { log: capture.log }));

    assert.strictEqual(result.written, false);
    assert.strictEqual(result.project?.fields.status, 'FIELD_STATUS');
    assert.ok(capture.text().includes('Discovery complete. Copy these IDs to your configuration.'));
    assert.strictEqual(existsSync(join(cwd, 'issueflow.config.json')), false);
  });
});
