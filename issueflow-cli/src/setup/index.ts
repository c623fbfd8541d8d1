/**
 * Setup wizard: checks tools, stores the token, finds the repository and
 * its project board, maps the board's field and option IDs and writes the
 * configuration file. `--discover-only` stops after printing the IDs.
 */

import { chmodSync, existsSync, mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { ConfigSchema, type Config, type ProjectConfig, type TokenConfig } from '../config/schema.js';
import { saveConfig, CONFIG_FILE_CANDIDATES } from '../config/index.js';
import { expandHome } from '../config/token.js';
import type { BoardManager, ProjectField, RepositoryProject } from '../github/board.js';
import type { RepositoryManager } from '../github/repository.js';
import type { GitOperations } from '../git/index.js';
import type { Logger } from '../utils/logger.js';
import { UsageError, WorkflowError, ErrorCode } from '../utils/errors.js';
import { requireTool, type CommandRunner } from '../utils/tools.js';
import type { Prompter } from './prompt.js';

export const REQUIRED_BOARD_FIELDS = [
  'Status (single select): Backlog, Ready, In progress, In review, Done',
  'Priority (single select): P0, P1, P2',
  'Size (single select): XS, S, M, L, XL',
  'Estimate (number)',
];

const REMOTE_PATTERN = /github\.com[:/]([^/]+)\/([^/]+?)(\.git)?$/;
const SLUG_PATTERN = /^[^/]+\/[^/]+$/;

export interface RepoRef {
  owner: string;
  name: string;
}

export function parseRemoteUrl(url: string): RepoRef | null {
  const match = REMOTE_PATTERN.exec(url.trim());
  if (!match || !match[1] || !match[2]) return null;
  return { owner: match[1], name: match[2] };
}

export function parseRepoSlug(value: string): RepoRef {
  const trimmed = value.trim();
  if (!SLUG_PATTERN.test(trimmed)) {
    throw new UsageError(`Invalid repository '${value}'. Use the format owner/repo`, {
      argument: 'repository',
      value,
    });
  }
  const [owner = '', name = ''] = trimmed.split('/');
  return { owner, name };
}

export interface FieldMapping {
  project: ProjectConfig | null;
  found: string[];
  missing: string[];
}

/**
 * Map the board's fields and options by name onto configuration IDs. The
 * mapping is complete only when nothing is missing.
 */
export function mapProjectFields(project: RepositoryProject): FieldMapping {
  const found: string[] = [];
  const missing: string[] = [];

  const field = (name: string): ProjectField | undefined => {
    const match = project.fields.find((candidate) => candidate.name === name);
    if (match) found.push(`${name} field`);
    else missing.push(`${name} field`);
    return match;
  };
  const option = (owner: ProjectField | undefined, name: string): string => {
    if (!owner) return '';
    const match = owner.options.find((candidate) => candidate.name === name);
    if (!match) missing.push(`${owner.name} option '${name}'`);
    return match?.id ?? '';
  };

  const status = field('Status');
  const priority = field('Priority');
  const size = field('Size');
  const estimate = field('Estimate');

  const candidate = {
    id: project.id,
    name: project.title,
    fields: {
      status: status?.id ?? '',
      priority: priority?.id ?? '',
      size: size?.id ?? '',
      estimate: estimate?.id ?? '',
    },
    statusOptions: {
      backlog: option(status, 'Backlog'),
      ready: option(status, 'Ready'),
      inProgress: option(status, 'In progress'),
      inReview: option(status, 'In review'),
      done: option(status, 'Done'),
    },
    priorityOptions: {
      P0: option(priority, 'P0'),
      P1: option(priority, 'P1'),
      P2: option(priority, 'P2'),
    },
    sizeOptions: {
      XS: option(size, 'XS'),
      S: option(size, 'S'),
      M: option(size, 'M'),
      L: option(size, 'L'),
      XL: option(size, 'XL'),
    },
  };

  return { project: missing.length === 0 ? candidate : null, found, missing };
}

export interface SetupApi {
  repository: Pick<RepositoryManager, 'getRepository' | 'getAuthenticatedUser'>;
  board: Pick<BoardManager, 'listRepositoryProjects'>;
}

export interface SetupDeps {
  prompter: Prompter;
  commands: CommandRunner;
  git: Pick<GitOperations, 'remoteUrl'>;
  /** Build API access for the chosen repository with the collected token. */
  connect: (token: string, repo: RepoRef) => SetupApi;
  log: Logger;
  env: NodeJS.ProcessEnv;
  homeDir: string;
  cwd: string;
}

export interface SetupOptions {
  discoverOnly?: boolean;
  configPath?: string;
}

export interface SetupResult {
  written: boolean;
  cancelled: boolean;
  configPath: string | null;
  repo: string | null;
  project: ProjectConfig | null;
  tokenMethod: TokenConfig['method'] | null;
}

interface TokenChoice {
  token: string;
  config: TokenConfig;
  /** Stores the token where `config` says; runs only once setup succeeds. */
  persist: () => void;
}

const TOKEN_DEFAULTS: TokenConfig = {
  method: 'env',
  envVar: 'GITHUB_TOKEN',
  file: '~/.github-token',
  secret: 'github-workflow-token',
};

function cancelled(): SetupResult {
  return { written: false, cancelled: true, configPath: null, repo: null, project: null, tokenMethod: null };
}

function checkTools(deps: SetupDeps): void {
  const { commands, log } = deps;
  log.print('Checking dependencies...');
  requireTool(commands, 'git');
  log.success('git found');
  if (commands.exists('gcloud')) {
    log.success('gcloud found (optional)');
  } else {
    log.print('  i gcloud not found (optional, only needed for Google Secret Manager)');
  }
}

async function chooseToken(deps: SetupDeps): Promise<TokenChoice> {
  const { prompter, env, log } = deps;
  const nothing = (): void => undefined;

  const existing = env.GITHUB_TOKEN;
  if (existing && (await prompter.confirm('Found GITHUB_TOKEN in the environment. Use this token?', true))) {
    return { token: existing, config: TOKEN_DEFAULTS, persist: nothing };
  }

  log.print('Choose token storage method:');
  log.print('  1) Environment variable (simplest)');
  log.print('  2) File-based (more secure)');
  log.print('  3) Google Secret Manager (most secure, requires gcloud)');
  const choice = await prompter.question('Choice [1-3]: ');

  switch (choice) {
    case '1': {
      const token = await prompter.secret('Enter your GitHub token (used for discovery, not stored): ');
      log.print("Add GITHUB_TOKEN to your environment, for example in ~/.profile: export GITHUB_TOKEN='your-github-token'");
      return { token, config: TOKEN_DEFAULTS, persist: nothing };
    }
    case '2': {
      const token = await prompter.secret('Enter your GitHub token: ');
      const config: TokenConfig = { ...TOKEN_DEFAULTS, method: 'file' };
      const path = expandHome(config.file, deps.homeDir);
      return {
        token,
        config,
        persist: () => {
          writeFileSync(path, `${token}\n`, { encoding: 'utf-8', mode: 0o600 });
          chmodSync(path, 0o600);
          log.success(`Token saved to ${path}`);
        },
      };
    }
    case '3': {
      requireTool(deps.commands, 'gcloud', 'token method "gcloud"');
      const token = await prompter.secret('Enter your GitHub token: ');
      const config: TokenConfig = { ...TOKEN_DEFAULTS, method: 'gcloud' };
      return {
        token,
        config,
        persist: () => {
          log.info('Creating secret in Google Secret Manager...');
          deps.commands.run('gcloud', ['secrets', 'create', config.secret, '--data-file=-'], token);
          log.success(`Token saved to Google Secret Manager as '${config.secret}'`);
        },
      };
    }
    default:
      throw new UsageError(`Invalid choice '${choice}'`, { argument: 'token method', value: choice, allowed: ['1', '2', '3'] });
  }
}

async function chooseRepository(deps: SetupDeps): Promise<RepoRef> {
  const { prompter, git, log } = deps;

  const remote = await git.remoteUrl('origin');
  const detected = remote ? parseRemoteUrl(remote) : null;
  if (detected) {
    log.print(`Detected repository: ${detected.owner}/${detected.name}`);
    if (await prompter.confirm('Use this repository?', true)) {
      return detected;
    }
  }

  return parseRepoSlug(await prompter.question('Enter repository (format: owner/repo): '));
}

async function discoverProject(repo: RepoRef, api: SetupApi, deps: SetupDeps): Promise<{ selected: RepositoryProject; mapping: FieldMapping }> {
  const { prompter, log } = deps;
  const slug = `${repo.owner}/${repo.name}`;

  log.print('Discovering project boards...');
  const repository = await api.repository.getRepository();
  const projects = await api.board.listRepositoryProjects(repository.nodeId);

  if (projects.length === 0) {
    log.warn(`No project boards found for ${slug}`);
    log.print('Create a project board on GitHub with these fields, then run setup again:');
    for (const line of REQUIRED_BOARD_FIELDS) log.print(`  - ${line}`);
    throw new WorkflowError(ErrorCode.WORKFLOW_SETUP_ABORTED, `No project boards found for ${slug}`, {
      recoveryActions: [{ description: 'Create a project board linked to the repository', automatic: false }],
    });
  }

  log.print('Found project boards:');
  projects.forEach((project, index) => log.print(`  ${index + 1}) ${project.title} (#${project.number})`));
  const answer = await prompter.question(`Select project [1-${projects.length}]: `);
  const index = /^[0-9]+$/.test(answer) ? Number(answer) - 1 : -1;
  const selected = projects[index];
  if (!selected) {
    throw new UsageError(`Invalid selection '${answer}'`, { argument: 'project', value: answer });
  }
  log.success(`Selected: ${selected.title}`);

  const mapping = mapProjectFields(selected);
  for (const name of mapping.found) log.success(`${name} found`);
  for (const name of mapping.missing) log.warn(`${name} not found`);
  return { selected, mapping };
}

export async function runSetup(options: SetupOptions, deps: SetupDeps): Promise<SetupResult> {
  const { prompter, log } = deps;

  log.header('issueflow setup');
  checkTools(deps);

  if (options.discoverOnly) {
    const repo = await chooseRepository(deps);
    const token = deps.env.GITHUB_TOKEN || (await prompter.secret('Enter GitHub token: '));
    const api = deps.connect(token, repo);
    const { mapping, selected } = await discoverProject(repo, api, deps);

    log.print();
    log.print('Discovered IDs:');
    log.print(JSON.stringify(mapping.project ?? { id: selected.id, name: selected.title, fields: selected.fields }, null, 2));
    if (mapping.missing.length > 0) {
      log.warn(`Missing on the board: ${mapping.missing.join(', ')}`);
    }
    log.print('Discovery complete. Copy these IDs to your configuration.');
    return {
      written: false,
      cancelled: false,
      configPath: null,
      repo: `${repo.owner}/${repo.name}`,
      project: mapping.project,
      tokenMethod: null,
    };
  }

  // An unreadable existing file is still offered for reconfiguration.
  const candidates = (options.configPath ? [options.configPath] : [...CONFIG_FILE_CANDIDATES]).map((path) =>
    resolve(deps.cwd, path)
  );
  const existing = candidates.find((path) => existsSync(path));
  const configPath = existing ?? candidates[0];
  if (existing) {
    log.warn(`Configuration already exists at ${existing}`);
    if (!(await prompter.confirm('Reconfigure?', false))) {
      log.print('Setup cancelled.');
      return cancelled();
    }
  }

  const tokenChoice = await chooseToken(deps);
  const repo = await chooseRepository(deps);
  const api = deps.connect(tokenChoice.token, repo);
  const { mapping } = await discoverProject(repo, api, deps);

  if (!mapping.project) {
    throw new WorkflowError(
      ErrorCode.WORKFLOW_SETUP_ABORTED,
      `Project board is missing: ${mapping.missing.join(', ')}. Nothing was written`,
      {
        context: { missing: mapping.missing },
        recoveryActions: REQUIRED_BOARD_FIELDS.map((line) => ({ description: `Add ${line}`, automatic: false })),
      }
    );
  }

  log.print('Testing GitHub API access...');
  const user = await api.repository.getAuthenticatedUser();
  log.success(`Authenticated as @${user.login}`);
  const repository = await api.repository.getRepository();
  log.success(`Can access ${repository.fullName}`);

  const config: Config = ConfigSchema.parse({
    version: 2,
    repo,
    token: tokenChoice.config,
    project: mapping.project,
  });

  tokenChoice.persist();
  saveConfig(configPath, config);
  log.success(`Configuration saved to: ${configPath}`);

  const stateDir = resolve(deps.cwd, config.workflow.stateDir);
  mkdirSync(stateDir, { recursive: true });
  const keep = join(stateDir, '.gitkeep');
  if (!existsSync(keep)) writeFileSync(keep, '', 'utf-8');

  log.print();
  log.print('Next steps:');
  log.print('  1. Review the configuration with: issueflow config');
  log.print('  2. Try it with: issueflow audit issues');

  return {
    written: true,
    cancelled: false,
    configPath,
    repo: `${repo.owner}/${repo.name}`,
    project: mapping.project,
    tokenMethod: tokenChoice.config.method,
  };
}
