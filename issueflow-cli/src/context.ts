import { resolve } from 'path';
import type { Command } from 'commander';
import { loadConfig, type Config } from './config/index.js';
import { resolveToken, defaultTokenDeps, type TokenResolverDeps } from './config/token.js';
import { createGitHubClient, LazyApiClient } from './github/client.js';
import { createGitHub, type GitHub } from './github/index.js';
import { createGitOperations, type GitOperations } from './git/index.js';
import { createSessionStore, type SessionStore } from './session/store.js';
import { logger, type Logger } from './utils/logger.js';

/** Options every command accepts. */
export type GlobalOptions = {
  config?: string;
  json?: boolean;
  verbose?: boolean;
};

export function globalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

export function formatExamples(examples: string[]): string {
  return '\n\nExamples:\n' + examples.map((example) => `  $ ${example}`).join('\n');
}

/**
 * Everything a command needs, built once per invocation from the loaded
 * configuration.
 */
export interface AppContext {
  config: Config;
  github: GitHub;
  git: GitOperations;
  store: SessionStore;
  log: Logger;
}

/**
 * Apply `--json` and `--verbose` to the root logger. Children share its
 * settings, so this covers loggers created earlier too.
 */
export function applyGlobalOptions(options: GlobalOptions): void {
  if (options.json) {
    logger.setFormat('json');
  }
  if (options.verbose) {
    logger.setLevel('debug');
  }
}

export interface ContextOverrides {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  tokenDeps?: TokenResolverDeps;
}

export function loadCommandConfig(options: GlobalOptions, overrides: ContextOverrides = {}): Config {
  const env = overrides.env ?? process.env;
  const config = loadConfig(options.config, { env, cwd: overrides.cwd });

  // Command-line flags and DEBUG win over the configured logging section.
  const debugEnv = Boolean(env.DEBUG) && env.DEBUG !== '0' && env.DEBUG !== 'false';
  if (!options.verbose && !debugEnv) {
    logger.setLevel(config.logging.level);
  }
  if (!options.json) {
    logger.setFormat(config.logging.format);
  }
  return config;
}

export function createContext(options: GlobalOptions, overrides: ContextOverrides = {}): AppContext {
  const cwd = overrides.cwd ?? process.cwd();
  const config = loadCommandConfig(options, overrides);
  const { owner, name } = config.repo;
  // The token is resolved on the first API request, after argument validation.
  const client = new LazyApiClient(owner, name, () =>
    createGitHubClient({ token: resolveToken(config.token, overrides.tokenDeps ?? defaultTokenDeps), owner, repo: name })
  );

  return {
    config,
    github: createGitHub(client, config.project.id),
    git: createGitOperations(cwd),
    store: createSessionStore(resolve(cwd, config.workflow.stateDir)),
    log: logger,
  };
}
