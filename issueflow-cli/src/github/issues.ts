import { z } from 'zod';
import { parseResponse, type ApiClient } from './client.js';
import { logger } from '../utils/logger.js';
import { createGitHubErrorFromResponse, isNotFound } from '../utils/errors.js';

export interface Issue {
  number: number;
  nodeId: string;
  title: string;
  body: string;
  state: string;
  labels: string[];
  assignees: string[];
  author: string;
  htmlUrl: string;
  createdAt: string;
  updatedAt: string;
  comments: number;
  isPullRequest: boolean;
}

export interface IssueComment {
  id: number;
  author: string;
  body: string;
  createdAt: string;
  updatedAt: string;
  htmlUrl: string;
}

export interface CreateIssueOptions {
  title: string;
  body: string;
  labels?: string[];
}

export interface IssueManager {
  getIssue(number: number): Promise<Issue>;
  /** Open issues only (pull requests are filtered out), one page of 100. */
  listOpenIssues(): Promise<Issue[]>;
  createIssue(options: CreateIssueOptions): Promise<Issue>;
  addLabels(issueNumber: number, labels: string[]): Promise<void>;
  /** Returns false when the label was not on the issue. */
  removeLabel(issueNumber: number, label: string): Promise<boolean>;
  /** One page of comments, oldest first. */
  listComments(issueNumber: number, page?: number): Promise<IssueComment[]>;
  addComment(issueNumber: number, body: string): Promise<IssueComment>;
}

export const COMMENTS_PAGE_SIZE = 100;

const userSchema = z.object({ login: z.string() }).nullable().optional();

const labelSchema = z.union([
  z.string(),
  z.object({ name: z.string().nullable().optional() }),
]);

export const rawIssueSchema = z.object({
  number: z.number(),
  node_id: z.string(),
  title: z.string(),
  body: z.string().nullable().optional(),
  state: z.string(),
  labels: z.array(labelSchema).default([]),
  assignees: z.array(z.object({ login: z.string() })).nullable().optional(),
  user: userSchema,
  html_url: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  comments: z.number().default(0),
  pull_request: z.unknown().optional(),
});

const rawCommentSchema = z.object({
  id: z.number(),
  user: userSchema,
  body: z.string().nullable().optional(),
  created_at: z.string(),
  updated_at: z.string(),
  html_url: z.string(),
});

/**
 * Helper function to map GitHub API issue response to Issue type
 */
export function mapIssue(issue: z.output<typeof rawIssueSchema>): Issue {
  return {
    number: issue.number,
    nodeId: issue.node_id,
    title: issue.title,
    body: issue.body ?? '',
    state: issue.state,
    labels: issue.labels
      .map((l) => (typeof l === 'string' ? l : l.name ?? ''))
      .filter((name) => name !== ''),
    assignees: (issue.assignees ?? []).map((a) => a.login),
    author: issue.user?.login ?? 'ghost',
    htmlUrl: issue.html_url,
    createdAt: issue.created_at,
    updatedAt: issue.updated_at,
    comments: issue.comments,
    isPullRequest: issue.pull_request !== undefined && issue.pull_request !== null,
  };
}

export function mapComment(comment: z.output<typeof rawCommentSchema>): IssueComment {
  return {
    id: comment.id,
    author: comment.user?.login ?? 'ghost',
    body: comment.body ?? '',
    createdAt: comment.created_at,
    updatedAt: comment.updated_at,
    htmlUrl: comment.html_url,
  };
}

export function createIssueManager(client: ApiClient): IssueManager {
  const { slug } = client;
  const log = logger.child('Issues');

  /**
   * Log the failure with its context and rethrow it as a GitHubError
   */
  const handleError = (error: unknown, operation: string, context?: Record<string, unknown>): never => {
    const structuredError = createGitHubErrorFromResponse(error, operation, { repository: slug, ...context });
    log.debug(`Failed to ${operation}`, { error: structuredError.message, ...context });
    throw structuredError;
  };

  return {
    async getIssue(number: number): Promise<Issue> {
      const endpoint = `/repos/${slug}/issues/${number}`;
      try {
        const data = await client.rest('GET', endpoint);
        return mapIssue(parseResponse(rawIssueSchema, data, endpoint));
      } catch (error) {
        return handleError(error, 'get issue', { issueNumber: number });
      }
    },

    async listOpenIssues(): Promise<Issue[]> {
      const endpoint = `/repos/${slug}/issues?state=open&per_page=100`;
      try {
        const data = await client.rest('GET', endpoint);
        return parseResponse(z.array(rawIssueSchema), data, endpoint)
          .map(mapIssue)
          .filter((issue) => !issue.isPullRequest);
      } catch (error) {
        return handleError(error, 'list issues');
      }
    },

    async createIssue(options: CreateIssueOptions): Promise<Issue> {
      const endpoint = `/repos/${slug}/issues`;
      const payload: Record<string, unknown> = { title: options.title, body: options.body };
      if (options.labels && options.labels.length > 0) {
        payload.labels = options.labels;
      }

      try {
        const data = await client.rest('POST', endpoint, payload);
        const issue = mapIssue(parseResponse(rawIssueSchema, data, endpoint));
        log.debug(`Created issue #${issue.number}`, { title: issue.title });
        return issue;
      } catch (error) {
        return handleError(error, 'create issue', { title: options.title });
      }
    },

    async addLabels(issueNumber: number, labels: string[]): Promise<void> {
      try {
        await client.rest('POST', `/repos/${slug}/issues/${issueNumber}/labels`, { labels });
      } catch (error) {
        handleError(error, 'add labels', { issueNumber, labels });
      }
    },

    async removeLabel(issueNumber: number, label: string): Promise<boolean> {
      try {
        await client.rest('DELETE', `/repos/${slug}/issues/${issueNumber}/labels/${encodeURIComponent(label)}`);
        return true;
      } catch (error) {
        if (isNotFound(error)) {
          return false;
        }
        return handleError(error, 'remove label', { issueNumber, label });
      }
    },

    async listComments(issueNumber: number, page = 1): Promise<IssueComment[]> {
      const query = page > 1 ? `per_page=${COMMENTS_PAGE_SIZE}&page=${page}` : `per_page=${COMMENTS_PAGE_SIZE}`;
      const endpoint = `/repos/${slug}/issues/${issueNumber}/comments?${query}`;
      try {
        const data = await client.rest('GET', endpoint);
        return parseResponse(z.array(rawCommentSchema), data, endpoint).map(mapComment);
      } catch (error) {
        return handleError(error, 'list comments', { issueNumber });
      }
    },

    async addComment(issueNumber: number, body: string): Promise<IssueComment> {
      const endpoint = `/repos/${slug}/issues/${issueNumber}/comments`;
      try {
        const data = await client.rest('POST', endpoint, { body });
        return mapComment(parseResponse(rawCommentSchema, data, endpoint));
      } catch (error) {
        return handleError(error, 'add comment', { issueNumber });
      }
    },
  };
}
