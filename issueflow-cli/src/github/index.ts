export { GitHubClient, createGitHubClient, parseResponse, type ApiClient, type HttpMethod, type GitHubClientOptions } from './client.js';
export { createIssueManager, type IssueManager, type Issue, type IssueComment, type CreateIssueOptions } from './issues.js';
export {
  createPRManager,
  type PRManager,
  type PullRequest,
  type Review,
  type CheckRun,
  type CreatePullRequestOptions,
} from './pulls.js';
export { createRepositoryManager, type RepositoryManager, type Repository, type AuthenticatedUser } from './repository.js';
export {
  createBoardManager,
  type BoardManager,
  type BoardItem,
  type BoardLookup,
  type RepositoryProject,
  type ProjectField,
  type ProjectFieldOption,
} from './board.js';

import type { ApiClient } from './client.js';
import { createIssueManager, type IssueManager } from './issues.js';
import { createPRManager, type PRManager } from './pulls.js';
import { createRepositoryManager, type RepositoryManager } from './repository.js';
import { createBoardManager, type BoardManager } from './board.js';

export interface GitHub {
  client: ApiClient;
  issues: IssueManager;
  pulls: PRManager;
  repository: RepositoryManager;
  board: BoardManager;
}

export function createGitHub(client: ApiClient, projectId: string): GitHub {
  return {
    client,
    issues: createIssueManager(client),
    pulls: createPRManager(client),
    repository: createRepositoryManager(client),
    board: createBoardManager(client, projectId),
  };
}
