/**
 * GitHub token resolution
 *
 * The token never lives in the configuration file. `token.method` selects
 * where it is read from at run time, and every method fails before any
 * network call when the credential is missing.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { ConfigError, ErrorCode } from '../utils/errors.js';
import { systemCommands, toolMissingError, type CommandRunner } from '../utils/tools.js';
import type { TokenConfig } from './schema.js';

export interface TokenResolverDeps {
  env: NodeJS.ProcessEnv;
  homeDir: string;
  commands: CommandRunner;
  readFile(path: string): string | undefined;
}

export const defaultTokenDeps: TokenResolverDeps = {
  env: process.env,
  homeDir: homedir(),
  commands: systemCommands,
  readFile(path) {
    return existsSync(path) ? readFileSync(path, 'utf-8') : undefined;
  },
};

export function expandHome(path: string, homeDir: string): string {
  if (path === '~') return homeDir;
  if (path.startsWith('~/')) return join(homeDir, path.slice(2));
  return path;
}

function fromEnv(config: TokenConfig, deps: TokenResolverDeps): string {
  const token = deps.env[config.envVar]?.trim();
  if (!token) {
    throw new ConfigError(ErrorCode.CONFIG_TOKEN_UNAVAILABLE, `Environment variable '${config.envVar}' is not set`, {
      field: 'token.envVar',
      recoveryActions: [
        { description: `Run: export ${config.envVar}='your-github-token'`, automatic: false },
        { description: 'Or set token.method to "file" or "gcloud"', automatic: false },
      ],
    });
  }
  return token;
}

function fromFile(config: TokenConfig, deps: TokenResolverDeps): string {
  const path = expandHome(config.file, deps.homeDir);
  const content = deps.readFile(path);
  if (content === undefined) {
    throw new ConfigError(ErrorCode.CONFIG_TOKEN_UNAVAILABLE, `Token file '${path}' not found`, {
      field: 'token.file',
      recoveryActions: [
        { description: `Create it with: echo 'your-token' > ${path} && chmod 600 ${path}`, automatic: false },
      ],
    });
  }

  const token = content.replace(/\n/g, '').trim();
  if (!token) {
    throw new ConfigError(ErrorCode.CONFIG_TOKEN_UNAVAILABLE, `Token file '${path}' is empty`, {
      field: 'token.file',
      recoveryActions: [{ description: `Write your token to ${path} (chmod 600)`, automatic: false }],
    });
  }
  return token;
}

function fromGcloud(config: TokenConfig, deps: TokenResolverDeps): string {
  if (!deps.commands.exists('gcloud')) {
    throw toolMissingError('gcloud', 'token.method is "gcloud"');
  }

  let token = '';
  try {
    token = deps.commands.run('gcloud', ['secrets', 'versions', 'access', 'latest', `--secret=${config.secret}`]);
  } catch (error) {
    throw new ConfigError(
      ErrorCode.CONFIG_TOKEN_UNAVAILABLE,
      'Failed to retrieve token from Google Secret Manager',
      {
        field: 'token.secret',
        recoveryActions: [
          { description: `Ensure secret '${config.secret}' exists and you have access`, automatic: false },
        ],
        cause: error instanceof Error ? error : undefined,
      }
    );
  }

  if (!token) {
    throw new ConfigError(ErrorCode.CONFIG_TOKEN_UNAVAILABLE, `Secret '${config.secret}' is empty`, {
      field: 'token.secret',
    });
  }
  return token;
}

const resolvers: Record<TokenConfig['method'], (config: TokenConfig, deps: TokenResolverDeps) => string> = {
  env: fromEnv,
  file: fromFile,
  gcloud: fromGcloud,
};

export function resolveToken(config: TokenConfig, deps: TokenResolverDeps = defaultTokenDeps): string {
  return resolvers[config.method](config, deps);
}

/**
 * Where the token comes from, for display. Never includes the token.
 */
export function describeTokenSource(config: TokenConfig): string {
  switch (config.method) {
    case 'env':
      return `environment variable ${config.envVar}`;
    case 'file':
      return `file ${config.file}`;
    case 'gcloud':
      return `Google Secret Manager secret ${config.secret}`;
  }
}
