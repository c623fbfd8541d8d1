import { z } from 'zod';
import { parseResponse, type ApiClient } from './client.js';
import { logger } from '../utils/logger.js';
import { createGitHubErrorFromResponse, isNotFound } from '../utils/errors.js';

export interface PullRequest {
  number: number;
  title: string;
  body: string;
  state: string;
  draft: boolean;
  htmlUrl: string;
  author: string;
  createdAt: string;
  updatedAt: string;
  head: { ref: string; sha: string };
  base: { ref: string };
  /** Only populated by a single-PR fetch; GitHub computes it lazily. */
  mergeable: boolean | null;
  mergeableState: string;
}

export interface Review {
  state: string;
  author: string;
}

export interface CheckRun {
  name: string;
  status: string;
  conclusion: string | null;
}

export interface CreatePullRequestOptions {
  title: string;
  body: string;
  head: string;
  base: string;
  draft?: boolean;
}

export interface PRManager {
  listOpenPRs(): Promise<PullRequest[]>;
  /** Returns null when the PR does not exist. */
  getPR(number: number): Promise<PullRequest | null>;
  /** Open PR whose head is `<owner>:<branch>` against `base`, if any. */
  findOpenPR(branch: string, base: string): Promise<PullRequest | null>;
  createPR(options: CreatePullRequestOptions): Promise<PullRequest>;
  updateBody(number: number, body: string): Promise<void>;
  listReviews(number: number): Promise<Review[]>;
  listCheckRuns(sha: string): Promise<CheckRun[]>;
}

const rawPullSchema = z.object({
  number: z.number(),
  title: z.string(),
  body: z.string().nullable().optional(),
  state: z.string(),
  draft: z.boolean().nullable().optional(),
  html_url: z.string(),
  user: z.object({ login: z.string() }).nullable().optional(),
  created_at: z.string(),
  updated_at: z.string(),
  head: z.object({ ref: z.string(), sha: z.string() }),
  base: z.object({ ref: z.string() }),
  mergeable: z.boolean().nullable().optional(),
  mergeable_state: z.string().nullable().optional(),
});

const rawReviewSchema = z.object({
  state: z.string(),
  user: z.object({ login: z.string() }).nullable().optional(),
});

const rawCheckRunsSchema = z.object({
  check_runs: z.array(
    z.object({
      name: z.string(),
      status: z.string(),
      conclusion: z.string().nullable().optional(),
    })
  ),
});

function mapPullRequest(pr: z.output<typeof rawPullSchema>): PullRequest {
  return {
    number: pr.number,
    title: pr.title,
    body: pr.body ?? '',
    state: pr.state,
    draft: pr.draft ?? false,
    htmlUrl: pr.html_url,
    author: pr.user?.login ?? 'ghost',
    createdAt: pr.created_at,
    updatedAt: pr.updated_at,
    head: { ref: pr.head.ref, sha: pr.head.sha },
    base: { ref: pr.base.ref },
    mergeable: pr.mergeable ?? null,
    mergeableState: pr.mergeable_state ?? 'unknown',
  };
}

export function createPRManager(client: ApiClient): PRManager {
  const { owner, slug } = client;
  const log = logger.child('Pulls');

  const handleError = (error: unknown, operation: string, context?: Record<string, unknown>): never => {
    const structuredError = createGitHubErrorFromResponse(error, operation, { repository: slug, ...context });
    log.debug(`Failed to ${operation}`, { error: structuredError.message, ...context });
    throw structuredError;
  };

  return {
    async listOpenPRs(): Promise<PullRequest[]> {
      const endpoint = `/repos/${slug}/pulls?state=open&per_page=100`;
      try {
        const data = await client.rest('GET', endpoint);
        return parseResponse(z.array(rawPullSchema), data, endpoint).map(mapPullRequest);
      } catch (error) {
        return handleError(error, 'list pull requests');
      }
    },

    async getPR(number: number): Promise<PullRequest | null> {
      const endpoint = `/repos/${slug}/pulls/${number}`;
      try {
        const data = await client.rest('GET', endpoint);
        return mapPullRequest(parseResponse(rawPullSchema, data, endpoint));
      } catch (error) {
        if (isNotFound(error)) {
          return null;
        }
        return handleError(error, 'get pull request', { prNumber: number });
      }
    },

    async findOpenPR(branch: string, base: string): Promise<PullRequest | null> {
      const head = encodeURIComponent(`${owner}:${branch}`);
      const endpoint = `/repos/${slug}/pulls?state=open&head=${head}&base=${encodeURIComponent(base)}`;
      try {
        const data = await client.rest('GET', endpoint);
        const pulls = parseResponse(z.array(rawPullSchema), data, endpoint);
        return pulls.length > 0 ? mapPullRequest(pulls[0]) : null;
      } catch (error) {
        return handleError(error, 'find pull request', { branch, base });
      }
    },

    async createPR(options: CreatePullRequestOptions): Promise<PullRequest> {
      const endpoint = `/repos/${slug}/pulls`;
      try {
        const data = await client.rest('POST', endpoint, {
          title: options.title,
          body: options.body,
          head: options.head,
          base: options.base,
          draft: options.draft ?? false,
        });
        const pr = mapPullRequest(parseResponse(rawPullSchema, data, endpoint));
        log.debug(`Created PR #${pr.number}`, { head: options.head, base: options.base });
        return pr;
      } catch (error) {
        return handleError(error, 'create pull request', { head: options.head, base: options.base });
      }
    },

    async updateBody(number: number, body: string): Promise<void> {
      try {
        await client.rest('PATCH', `/repos/${slug}/pulls/${number}`, { body });
      } catch (error) {
        handleError(error, 'update pull request', { prNumber: number });
      }
    },

    async listReviews(number: number): Promise<Review[]> {
      const endpoint = `/repos/${slug}/pulls/${number}/reviews`;
      try {
        const data = await client.rest('GET', endpoint);
        return parseResponse(z.array(rawReviewSchema), data, endpoint).map((review) => ({
          state: review.state,
          author: review.user?.login ?? 'ghost',
        }));
      } catch (error) {
        return handleError(error, 'list reviews', { prNumber: number });
      }
    },

    async listCheckRuns(sha: string): Promise<CheckRun[]> {
      const endpoint = `/repos/${slug}/commits/${sha}/check-runs`;
      try {
        const data = await client.rest('GET', endpoint);
        return parseResponse(rawCheckRunsSchema, data, endpoint).check_runs.map((run) => ({
          name: run.name,
          status: run.status,
          conclusion: run.conclusion ?? null,
        }));
      } catch (error) {
        return handleError(error, 'list check runs', { sha });
      }
    },
  };
}
