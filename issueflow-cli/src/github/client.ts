import { Octokit } from '@octokit/rest';
import { graphql } from '@octokit/graphql';
import type { z } from 'zod';
import { logger } from '../utils/logger.js';
import {
  GitHubError,
  ErrorCode,
  createGitHubErrorFromResponse,
  type ErrorContext,
} from '../utils/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/**
 * The two operations every command is built from. Responses come back as
 * parsed JSON and are validated by the caller with `parseResponse`.
 *
 * No retries, no pagination beyond the `per_page` a caller puts in the path,
 * no rate-limit handling.
 */
export interface ApiClient {
  readonly owner: string;
  readonly repo: string;
  /** `owner/repo` */
  readonly slug: string;
  rest(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<unknown>;
  graphql(query: string, variables?: Record<string, unknown>): Promise<unknown>;
}

export interface GitHubClientOptions {
  token: string;
  owner: string;
  repo: string;
}

type GraphQLClient = typeof graphql;

export class GitHubClient implements ApiClient {
  private readonly octokit: Octokit;
  private readonly graphqlClient: GraphQLClient;
  private readonly log = logger.child('GitHub');
  public readonly owner: string;
  public readonly repo: string;

  constructor(options: GitHubClientOptions) {
    this.octokit = new Octokit({ auth: options.token });
    this.graphqlClient = graphql.defaults({
      headers: {
        authorization: `token ${options.token}`,
        'X-Github-Next-Global-ID': '1',
      },
    });
    this.owner = options.owner;
    this.repo = options.repo;
  }

  get slug(): string {
    return `${this.owner}/${this.repo}`;
  }

  async rest(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<unknown> {
    const endpoint = `${method} ${path}`;
    return this.execute(
      async () => {
        const headers = { accept: 'application/vnd.github.v3+json' };
        const response = await this.octokit.request(endpoint, body === undefined ? { headers } : { headers, data: body });
        const data: unknown = response.data;
        return data;
      },
      endpoint,
      { method, path }
    );
  }

  async graphql(query: string, variables: Record<string, unknown> = {}): Promise<unknown> {
    const operation = /^\s*(query|mutation)\b/.exec(query)?.[1] ?? 'query';
    return this.execute(
      async () => {
        const data: unknown = await this.graphqlClient<unknown>(query, variables);
        return data;
      },
      'POST /graphql',
      { operation, variables }
    );
  }

  /**
   * Run one request, logging it at debug level and converting any failure
   * into a GitHubError.
   */
  async execute<T>(operation: () => Promise<T>, endpoint: string, context?: ErrorContext): Promise<T> {
    const startTime = Date.now();
    this.log.debug(`→ ${endpoint}`, { repository: this.slug });

    try {
      const result = await operation();
      this.log.debug(`← ${endpoint}`, { duration: Date.now() - startTime });
      return result;
    } catch (error) {
      const structured = createGitHubErrorFromResponse(error, endpoint, { repository: this.slug, ...context });
      this.log.debug(`✗ ${endpoint}`, { duration: Date.now() - startTime, code: structured.code });
      throw structured;
    }
  }
}

/**
 * Client that builds its connection, token included, on the first request.
 */
export class LazyApiClient implements ApiClient {
  private client: ApiClient | null = null;

  constructor(
    public readonly owner: string,
    public readonly repo: string,
    private readonly connect: () => ApiClient
  ) {}

  get slug(): string {
    return `${this.owner}/${this.repo}`;
  }

  get connected(): boolean {
    return this.client !== null;
  }

  async rest(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<unknown> {
    return this.target().rest(method, path, body);
  }

  async graphql(query: string, variables?: Record<string, unknown>): Promise<unknown> {
    return this.target().graphql(query, variables);
  }

  private target(): ApiClient {
    if (!this.client) {
      this.client = this.connect();
    }
    return this.client;
  }
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  return new GitHubClient(options);
}

/**
 * Validate an API response against the shape a caller relies on. A response
 * that does not match (including a null payload) is an API error.
 */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, endpoint: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new GitHubError(
      ErrorCode.GITHUB_INVALID_RESPONSE,
      `Unexpected response from ${endpoint}${where}: ${issue?.message ?? 'invalid payload'}`,
      { endpoint, context: { issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`) } }
    );
  }
  return result.data;
}
