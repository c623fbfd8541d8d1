/**
 * In-process stand-ins shared by the tests: an ApiClient that answers from
 * registered routes, stateful fakes of the managers and git, a config
 * fixture and a logger that records its lines.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import type { ApiClient, HttpMethod } from '../github/client.js';
import type { BoardItem, BoardLookup, BoardManager, RepositoryProject } from '../github/board.js';
import type { CreateIssueOptions, Issue, IssueComment, IssueManager } from '../github/issues.js';
import type { CheckRun, CreatePullRequestOptions, PRManager, PullRequest, Review } from '../github/pulls.js';
import type { GitOperations } from '../git/index.js';
import type { Config, WorkflowConfig } from '../config/schema.js';
import { Logger, type LogFormat, type StructuredLogEntry } from '../utils/logger.js';
import { createGitHubErrorFromResponse, type GitHubError } from '../utils/errors.js';
import type { Clock } from '../utils/time.js';

// Plain strings in assertions.
chalk.level = 0;

export function testConfig(workflow: Partial<WorkflowConfig> = {}): Config {
  return {
    version: 2,
    repo: { owner: 'acme', name: 'widgets' },
    token: { method: 'env', envVar: 'GITHUB_TOKEN', file: '~/.github-token', secret: 'github-workflow-token' },
    project: {
      id: 'PVT_test',
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
    },
    workflow: {
      stateDir: '.claude',
      branch: 'wip',
      baseBranch: 'master',
      prTitle: '[WIP] Sprint Development - Active Work',
      syncStatusLabels: true,
      monitorIntervalSeconds: 30,
      ...workflow,
    },
    logging: { level: 'info', format: 'pretty' },
  };
}

export function fixedClock(iso: string): Clock {
  return () => new Date(iso);
}

export function makeTempDir(prefix = 'issueflow-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

// ---------------------------------------------------------------------------
// Logger

export interface CapturedLine {
  stream: 'out' | 'err';
  line: string;
}

export interface LogCapture {
  log: Logger;
  lines: CapturedLine[];
  /** Every line in write order */
  text(): string[];
  /** Parsed JSON lines (json format only) */
  entries(): StructuredLogEntry[];
}

export function captureLogger(format: LogFormat = 'pretty'): LogCapture {
  const log = new Logger({ level: 'info', format });
  const lines: CapturedLine[] = [];
  log.setSink({
    out: (line) => lines.push({ stream: 'out', line }),
    err: (line) => lines.push({ stream: 'err', line }),
  });

  return {
    log,
    lines,
    text: () => lines.map((entry) => entry.line),
    entries: () =>
      lines
        .filter((entry) => entry.line.startsWith('{'))
        .map((entry): StructuredLogEntry => JSON.parse(entry.line)),
  };
}

/** Messages of one level from a json-format capture. */
export function messagesAt(capture: LogCapture, level: StructuredLogEntry['level']): string[] {
  return capture
    .entries()
    .filter((entry) => entry.level === level)
    .map((entry) => entry.message);
}

// ---------------------------------------------------------------------------
// API client

export function httpError(status: number, message = `HTTP ${status}`): GitHubError {
  return createGitHubErrorFromResponse({ status, message }, 'fake');
}

export interface RecordedRequest {
  kind: 'rest' | 'graphql';
  method: HttpMethod | 'POST';
  path: string;
  body?: Record<string, unknown>;
  variables?: Record<string, unknown>;
}

type RestHandler = (body: Record<string, unknown> | undefined) => unknown;
type GraphqlHandler = (variables: Record<string, unknown>) => unknown;

/**
 * ApiClient answering from routes registered per test. REST routes match on
 * method and exact path; GraphQL routes on a fragment of the query text.
 * Anything unrouted fails the call.
 */
export class FakeApiClient implements ApiClient {
  readonly requests: RecordedRequest[] = [];
  private readonly restRoutes = new Map<string, RestHandler>();
  private readonly graphqlRoutes: Array<{ fragment: string; handler: GraphqlHandler }> = [];

  constructor(
    readonly owner = 'acme',
    readonly repo = 'widgets'
  ) {}

  get slug(): string {
    return `${this.owner}/${this.repo}`;
  }

  onRest(method: HttpMethod, path: string, handler: RestHandler): this {
    this.restRoutes.set(`${method} ${path}`, handler);
    return this;
  }

  onGraphql(fragment: string, handler: GraphqlHandler): this {
    this.graphqlRoutes.push({ fragment, handler });
    return this;
  }

  async rest(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<unknown> {
    this.requests.push({ kind: 'rest', method, path, body });
    const handler = this.restRoutes.get(`${method} ${path}`);
    if (!handler) {
      throw new Error(`Unexpected request: ${method} ${path}`);
    }
    return handler(body);
  }

  async graphql(query: string, variables: Record<string, unknown> = {}): Promise<unknown> {
    this.requests.push({ kind: 'graphql', method: 'POST', path: '/graphql', variables });
    const route = this.graphqlRoutes.find((candidate) => query.includes(candidate.fragment));
    if (!route) {
      throw new Error(`Unexpected GraphQL query: ${query.slice(0, 60)}`);
    }
    return route.handler(variables);
  }
}

// ---------------------------------------------------------------------------
// Fixtures

export function makeIssue(number: number, overrides: Partial<Issue> = {}): Issue {
  return {
    number,
    nodeId: `I_${number}`,
    title: `Issue ${number}`,
    body: '',
    state: 'open',
    labels: [],
    assignees: [],
    author: 'octo',
    htmlUrl: `https://github.com/acme/widgets/issues/${number}`,
    createdAt: '2024-05-01T09:00:00Z',
    updatedAt: '2024-05-01T09:00:00Z',
    comments: 0,
    isPullRequest: false,
    ...overrides,
  };
}

export function makeComment(id: number, overrides: Partial<IssueComment> = {}): IssueComment {
  return {
    id,
    author: 'octo',
    body: `Comment ${id}`,
    createdAt: '2024-05-01T10:00:00Z',
    updatedAt: '2024-05-01T10:00:00Z',
    htmlUrl: `https://github.com/acme/widgets/issues/1#issuecomment-${id}`,
    ...overrides,
  };
}

export function makePR(number: number, overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    number,
    title: `PR ${number}`,
    body: '',
    state: 'open',
    draft: false,
    htmlUrl: `https://github.com/acme/widgets/pull/${number}`,
    author: 'octo',
    createdAt: '2024-05-01T09:00:00Z',
    updatedAt: '2024-05-01T09:00:00Z',
    head: { ref: 'wip', sha: `sha${number}` },
    base: { ref: 'master' },
    mergeable: null,
    mergeableState: 'unknown',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Managers

export class FakeIssues implements IssueManager {
  readonly issues = new Map<number, Issue>();
  readonly comments = new Map<number, IssueComment[]>();
  readonly labelsAdded: Array<{ issueNumber: number; labels: string[] }> = [];
  readonly labelsRemoved: Array<{ issueNumber: number; label: string }> = [];
  readonly created: CreateIssueOptions[] = [];
  readonly posted: Array<{ issueNumber: number; body: string }> = [];
  private nextNumber = 100;
  private nextCommentId = 9000;

  add(issue: Issue, comments: IssueComment[] = []): this {
    this.issues.set(issue.number, issue);
    this.comments.set(issue.number, comments);
    return this;
  }

  async getIssue(number: number): Promise<Issue> {
    const issue = this.issues.get(number);
    if (!issue) throw httpError(404, 'Not Found');
    return issue;
  }

  async listOpenIssues(): Promise<Issue[]> {
    return [...this.issues.values()].filter((issue) => issue.state === 'open' && !issue.isPullRequest);
  }

  async createIssue(options: CreateIssueOptions): Promise<Issue> {
    this.created.push(options);
    const issue = makeIssue(this.nextNumber++, {
      title: options.title,
      body: options.body,
      labels: options.labels ?? [],
    });
    this.add(issue);
    return issue;
  }

  async addLabels(issueNumber: number, labels: string[]): Promise<void> {
    this.labelsAdded.push({ issueNumber, labels });
  }

  async removeLabel(issueNumber: number, label: string): Promise<boolean> {
    this.labelsRemoved.push({ issueNumber, label });
    return true;
  }

  async listComments(issueNumber: number, page = 1): Promise<IssueComment[]> {
    return (this.comments.get(issueNumber) ?? []).slice((page - 1) * 100, page * 100);
  }

  async addComment(issueNumber: number, body: string): Promise<IssueComment> {
    this.posted.push({ issueNumber, body });
    const id = this.nextCommentId++;
    return makeComment(id, { body, htmlUrl: `https://github.com/acme/widgets/issues/${issueNumber}#issuecomment-${id}` });
  }
}

export class FakePulls implements PRManager {
  readonly pulls = new Map<number, PullRequest>();
  readonly reviews = new Map<number, Review[]>();
  readonly checkRuns = new Map<string, CheckRun[]>();
  readonly created: CreatePullRequestOptions[] = [];
  readonly bodyUpdates: Array<{ number: number; body: string }> = [];
  failCreate: Error | null = null;
  private nextNumber = 500;

  add(pr: PullRequest): this {
    this.pulls.set(pr.number, pr);
    return this;
  }

  async listOpenPRs(): Promise<PullRequest[]> {
    return [...this.pulls.values()].filter((pr) => pr.state === 'open');
  }

  async getPR(number: number): Promise<PullRequest | null> {
    return this.pulls.get(number) ?? null;
  }

  async findOpenPR(branch: string, base: string): Promise<PullRequest | null> {
    return (
      [...this.pulls.values()].find((pr) => pr.state === 'open' && pr.head.ref === branch && pr.base.ref === base) ??
      null
    );
  }

  async createPR(options: CreatePullRequestOptions): Promise<PullRequest> {
    this.created.push(options);
    if (this.failCreate) throw this.failCreate;
    const pr = makePR(this.nextNumber++, {
      title: options.title,
      body: options.body,
      draft: options.draft ?? false,
      head: { ref: options.head, sha: 'sha-new' },
      base: { ref: options.base },
    });
    this.add(pr);
    return pr;
  }

  async updateBody(number: number, body: string): Promise<void> {
    this.bodyUpdates.push({ number, body });
    const pr = this.pulls.get(number);
    if (pr) this.pulls.set(number, { ...pr, body });
  }

  async listReviews(number: number): Promise<Review[]> {
    return this.reviews.get(number) ?? [];
  }

  async listCheckRuns(sha: string): Promise<CheckRun[]> {
    return this.checkRuns.get(sha) ?? [];
  }
}

const FIELD_NAMES: Record<string, string> = {
  FIELD_STATUS: 'Status',
  FIELD_PRIORITY: 'Priority',
  FIELD_SIZE: 'Size',
  FIELD_ESTIMATE: 'Estimate',
};

/** Option id → option name for the options in `testConfig()`. */
const OPTION_NAMES: Record<string, string> = {
  OPT_BACKLOG: 'Backlog',
  OPT_READY: 'Ready',
  OPT_IN_PROGRESS: 'In progress',
  OPT_IN_REVIEW: 'In review',
  OPT_DONE: 'Done',
  OPT_P0: 'P0',
  OPT_P1: 'P1',
  OPT_P2: 'P2',
  OPT_XS: 'XS',
  OPT_S: 'S',
  OPT_M: 'M',
  OPT_L: 'L',
  OPT_XL: 'XL',
};

/**
 * Board holding items in memory. Issue content ids are `I_<number>`, as
 * `makeIssue` produces them.
 */
export class FakeBoard implements BoardManager {
  readonly items: BoardItem[] = [];
  readonly updates: Array<{ itemId: string; fieldId: string; value: string | number }> = [];
  readonly projects: RepositoryProject[] = [];
  readonly failures: Partial<Record<'listItems' | 'addItem' | 'setSingleSelect' | 'setNumber', Error>> = {};
  /** Field ids whose updates fail */
  readonly failingFields = new Set<string>();
  private nextItem = 1;

  put(issueNumber: number, values: Record<string, string> = {}): BoardItem {
    const item: BoardItem = {
      itemId: `ITEM_${this.nextItem++}`,
      issueNumber,
      contentType: 'Issue',
      fieldValues: {},
      fieldValuesById: {},
    };
    for (const [fieldId, value] of Object.entries(values)) {
      this.assign(item, fieldId, value);
    }
    this.items.push(item);
    return item;
  }

  valueOf(issueNumber: number, fieldId: string): string | undefined {
    return this.items.find((item) => item.issueNumber === issueNumber)?.fieldValuesById[fieldId];
  }

  async listItems(): Promise<BoardItem[]> {
    if (this.failures.listItems) throw this.failures.listItems;
    return this.items.map((item) => ({
      ...item,
      fieldValues: { ...item.fieldValues },
      fieldValuesById: { ...item.fieldValuesById },
    }));
  }

  async findItemByIssueNumber(issueNumber: number): Promise<BoardLookup> {
    const items = await this.listItems();
    const item = items.find((candidate) => candidate.issueNumber === issueNumber);
    return item ? { found: true, item } : { found: false, scanned: items.length };
  }

  async getItemFieldValue(issueNumber: number, fieldId: string): Promise<string | null> {
    const lookup = await this.findItemByIssueNumber(issueNumber);
    return lookup.found ? lookup.item.fieldValuesById[fieldId] ?? null : null;
  }

  async addItem(contentId: string): Promise<string> {
    if (this.failures.addItem) throw this.failures.addItem;
    const match = /^I_(\d+)$/.exec(contentId);
    const item = this.put(match ? Number(match[1]) : 0);
    return item.itemId;
  }

  async setSingleSelect(itemId: string, fieldId: string, optionId: string): Promise<string | null> {
    if (this.failures.setSingleSelect || this.failingFields.has(fieldId)) {
      throw this.failures.setSingleSelect ?? new Error(`update of ${fieldId} failed`);
    }
    this.updates.push({ itemId, fieldId, value: optionId });
    const name = OPTION_NAMES[optionId] ?? optionId;
    const item = this.items.find((candidate) => candidate.itemId === itemId);
    if (item) this.assign(item, fieldId, name);
    return name;
  }

  async setNumber(itemId: string, fieldId: string, value: number): Promise<void> {
    if (this.failures.setNumber || this.failingFields.has(fieldId)) {
      throw this.failures.setNumber ?? new Error(`update of ${fieldId} failed`);
    }
    this.updates.push({ itemId, fieldId, value });
    const item = this.items.find((candidate) => candidate.itemId === itemId);
    if (item) this.assign(item, fieldId, String(value));
  }

  async listRepositoryProjects(): Promise<RepositoryProject[]> {
    return this.projects;
  }

  private assign(item: BoardItem, fieldId: string, value: string): void {
    item.fieldValuesById[fieldId] = value;
    item.fieldValues[FIELD_NAMES[fieldId] ?? fieldId] = value;
  }
}

// ---------------------------------------------------------------------------
// Git

export class FakeGit implements GitOperations {
  clean = true;
  branch = 'master';
  readonly branches = new Set<string>(['master']);
  modified: string[] = [];
  commits: string[] = [];
  user: string | null = 'Test Developer';
  remote: string | null = 'git@github.com:acme/widgets.git';
  pullFails = false;
  readonly calls: string[] = [];

  async isClean(): Promise<boolean> {
    return this.clean;
  }

  async currentBranch(): Promise<string> {
    return this.branch;
  }

  async localBranchExists(name: string): Promise<boolean> {
    return this.branches.has(name);
  }

  async checkout(name: string): Promise<void> {
    this.calls.push(`checkout ${name}`);
    this.branch = name;
  }

  async createBranch(name: string): Promise<void> {
    this.calls.push(`create ${name}`);
    this.branches.add(name);
    this.branch = name;
  }

  async pull(branch: string): Promise<void> {
    this.calls.push(`pull ${branch}`);
    if (this.pullFails) throw new Error("couldn't find remote ref");
  }

  async modifiedFiles(): Promise<string[]> {
    return this.modified;
  }

  async commitsForIssue(): Promise<string[]> {
    return this.commits;
  }

  async userName(): Promise<string | null> {
    return this.user;
  }

  async remoteUrl(): Promise<string | null> {
    return this.remote;
  }
}
