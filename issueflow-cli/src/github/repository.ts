import { z } from 'zod';
import { parseResponse, type ApiClient } from './client.js';
import { createGitHubErrorFromResponse } from '../utils/errors.js';

export interface Repository {
  nodeId: string;
  fullName: string;
  defaultBranch: string;
  htmlUrl: string;
}

export interface AuthenticatedUser {
  login: string;
}

export interface RepositoryManager {
  getRepository(): Promise<Repository>;
  /** `GET /user`, used as the token smoke test. */
  getAuthenticatedUser(): Promise<AuthenticatedUser>;
}

const rawRepositorySchema = z.object({
  node_id: z.string(),
  full_name: z.string(),
  default_branch: z.string().default('main'),
  html_url: z.string(),
});

const rawUserSchema = z.object({ login: z.string() });

export function createRepositoryManager(client: ApiClient): RepositoryManager {
  return {
    async getRepository(): Promise<Repository> {
      const endpoint = `/repos/${client.slug}`;
      try {
        const repo = parseResponse(rawRepositorySchema, await client.rest('GET', endpoint), endpoint);
        return {
          nodeId: repo.node_id,
          fullName: repo.full_name,
          defaultBranch: repo.default_branch,
          htmlUrl: repo.html_url,
        };
      } catch (error) {
        throw createGitHubErrorFromResponse(error, 'get repository', { repository: client.slug });
      }
    },

    async getAuthenticatedUser(): Promise<AuthenticatedUser> {
      try {
        return parseResponse(rawUserSchema, await client.rest('GET', '/user'), '/user');
      } catch (error) {
        throw createGitHubErrorFromResponse(error, 'get authenticated user');
      }
    },
  };
}
