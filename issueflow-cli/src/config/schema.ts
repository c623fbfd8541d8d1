import { z } from 'zod';

/**
 * Current configuration schema version. Bump it together with a migration in
 * migrations.ts whenever the shape changes in a breaking way.
 */
export const CURRENT_CONFIG_VERSION = 2;

export const SUPPORTED_CONFIG_VERSIONS = [1, 2] as const;

export type ConfigVersion = (typeof SUPPORTED_CONFIG_VERSIONS)[number];

export const TOKEN_METHODS = ['env', 'file', 'gcloud'] as const;

export type TokenMethod = (typeof TOKEN_METHODS)[number];

/** Board identifiers look like `PVT_kwDO...` or `PVTSSF_...`; the setup template uses `YOUR_...`. */
const boardIdSchema = z.string()
  .min(1, 'Identifier is required')
  .refine((val) => !val.startsWith('YOUR_'), {
    message: 'Placeholder value; run "issueflow setup" to discover the real identifier',
  });

const repoSegmentSchema = z.string()
  .min(1)
  .max(100)
  .regex(/^[A-Za-z0-9_.-]+$/, 'May only contain letters, digits, ".", "-" and "_"')
  .refine((val) => !val.startsWith('YOUR_'), {
    message: 'Placeholder value; set the real repository',
  });

export const RepoSchema = z.object({
  owner: repoSegmentSchema,
  name: repoSegmentSchema,
});

export const TokenSchema = z.object({
  method: z.enum(TOKEN_METHODS).default('env'),
  envVar: z.string().min(1).default('GITHUB_TOKEN'),
  file: z.string().min(1).default('~/.github-token'),
  secret: z.string().min(1).default('github-workflow-token'),
});

export const ProjectSchema = z.object({
  id: boardIdSchema,
  name: z.string().optional(),
  fields: z.object({
    status: boardIdSchema,
    priority: boardIdSchema,
    size: boardIdSchema,
    estimate: boardIdSchema,
  }),
  statusOptions: z.object({
    backlog: boardIdSchema,
    ready: boardIdSchema,
    inProgress: boardIdSchema,
    inReview: boardIdSchema,
    done: boardIdSchema,
  }),
  priorityOptions: z.object({
    P0: boardIdSchema,
    P1: boardIdSchema,
    P2: boardIdSchema,
  }),
  sizeOptions: z.object({
    XS: boardIdSchema,
    S: boardIdSchema,
    M: boardIdSchema,
    L: boardIdSchema,
    XL: boardIdSchema,
  }),
});

export const WorkflowSchema = z.object({
  stateDir: z.string().min(1).default('.claude'),
  branch: z.string().min(1).default('wip'),
  baseBranch: z.string().min(1).default('master'),
  prTitle: z.string().min(1).default('[WIP] Sprint Development - Active Work'),
  syncStatusLabels: z.boolean().default(true),
  monitorIntervalSeconds: z.number().int().min(1).max(3600).default(30),
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['pretty', 'json']).default('pretty'),
});

export const ConfigSchema = z.object({
  version: z.literal(CURRENT_CONFIG_VERSION).default(CURRENT_CONFIG_VERSION),
  repo: RepoSchema,
  token: TokenSchema.default({}),
  project: ProjectSchema,
  workflow: WorkflowSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigInput = z.input<typeof ConfigSchema>;

export type TokenConfig = z.infer<typeof TokenSchema>;

export type ProjectConfig = z.infer<typeof ProjectSchema>;

export type WorkflowConfig = z.infer<typeof WorkflowSchema>;

/**
 * Defaults applied underneath the config file. Repository and project have no
 * sensible defaults and must come from the file or the environment.
 */
export const defaultConfig = {
  version: CURRENT_CONFIG_VERSION,
  token: {
    method: 'env',
    envVar: 'GITHUB_TOKEN',
    file: '~/.github-token',
    secret: 'github-workflow-token',
  },
  workflow: {
    stateDir: '.claude',
    branch: 'wip',
    baseBranch: 'master',
    prTitle: '[WIP] Sprint Development - Active Work',
    syncStatusLabels: true,
    monitorIntervalSeconds: 30,
  },
  logging: {
    level: 'info',
    format: 'pretty',
  },
} satisfies Partial<ConfigInput>;

const TOKEN_KEYS = ['token', 'githubtoken', 'github_token', 'apikey', 'password'];

const TOKEN_VALUE_PATTERN = /^(ghp_|gho_|ghu_|ghs_|github_pat_)/;

/**
 * Returns the paths of values that look like credentials. The token itself is
 * resolved at run time and never stored in the configuration file.
 */
export function findCredentialsInConfig(config: unknown, prefix = ''): string[] {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    return [];
  }

  const found: string[] = [];
  for (const [key, value] of Object.entries(config)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (typeof value === 'string') {
      if (TOKEN_VALUE_PATTERN.test(value) || TOKEN_KEYS.includes(key.toLowerCase())) {
        found.push(path);
      }
    } else {
      found.push(...findCredentialsInConfig(value, path));
    }
  }
  return found;
}
