import { COMMENTS_PAGE_SIZE, type IssueComment, type IssueManager } from '../github/issues.js';
import type { Logger } from '../utils/logger.js';
import { UsageError } from '../utils/errors.js';
import { formatUtcMinute } from '../utils/time.js';

export const DEFAULT_COMMENT_LIMIT = 5;
const PREVIEW_LINES = 3;

export interface AddCommentResult {
  issueNumber: number;
  id: number;
  url: string;
  preview: string;
}

export interface CommentListing {
  issue: { number: number; title: string; state: string; url: string; isPullRequest: boolean };
  /** Oldest first */
  comments: IssueComment[];
  limit: number;
}

/** First three lines, plus `...` when there are more. */
export function commentPreview(body: string): string {
  const lines = body.split('\n');
  const head = lines.slice(0, PREVIEW_LINES);
  return lines.length > PREVIEW_LINES ? [...head, '...'].join('\n') : head.join('\n');
}

export function parseCommentLimit(value: string | undefined): number {
  if (value === undefined) return DEFAULT_COMMENT_LIMIT;
  if (!/^[0-9]+$/.test(value.trim()) || Number(value) < 1) {
    throw new UsageError(`Invalid limit '${value}'. Use a positive whole number`, {
      argument: 'limit',
      value,
    });
  }
  return Number(value);
}

function utcMinute(timestamp: string): string {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? timestamp : formatUtcMinute(date);
}

export async function addComment(
  issueNumber: number,
  text: string,
  deps: { issues: Pick<IssueManager, 'addComment'>; log: Logger }
): Promise<AddCommentResult> {
  if (!text.trim()) {
    throw new UsageError('Comment text must not be empty', { argument: 'text' });
  }

  deps.log.header(`Adding comment to issue #${issueNumber}`);
  const comment = await deps.issues.addComment(issueNumber, text);
  const preview = commentPreview(text);

  deps.log.success('Comment added successfully');
  deps.log.print(`Comment URL: ${comment.htmlUrl}`);
  deps.log.print();
  deps.log.print('Preview:');
  deps.log.print(preview);

  return { issueNumber, id: comment.id, url: comment.htmlUrl, preview };
}

/**
 * The newest `limit` comments of an issue. GitHub lists comments oldest
 * first with no descending sort, so the last page is fetched (plus the one
 * before it when the last page is short) and sorted here.
 */
export async function listRecentComments(
  issueNumber: number,
  limit: number,
  deps: { issues: Pick<IssueManager, 'getIssue' | 'listComments'> }
): Promise<CommentListing> {
  const issue = await deps.issues.getIssue(issueNumber);
  const lastPage = Math.max(1, Math.ceil(issue.comments / COMMENTS_PAGE_SIZE));
  let all = await deps.issues.listComments(issueNumber, lastPage);
  if (lastPage > 1 && all.length < limit) {
    all = [...(await deps.issues.listComments(issueNumber, lastPage - 1)), ...all];
  }

  const newest = [...all]
    .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt))
    .slice(0, limit)
    .reverse();

  return {
    issue: {
      number: issue.number,
      title: issue.title,
      state: issue.state,
      url: issue.htmlUrl,
      isPullRequest: issue.isPullRequest,
    },
    comments: newest,
    limit,
  };
}

export function printCommentListing(listing: CommentListing, log: Logger): void {
  const rule = '─'.repeat(42);

  log.header(`Recent comments on issue #${listing.issue.number}`);
  log.print(`Title: ${listing.issue.title}`);
  log.print(`State: ${listing.issue.state}`);
  log.print(`URL: ${listing.issue.url}`);
  log.print();

  if (listing.comments.length === 0) {
    log.warn('No comments found on this issue');
    return;
  }

  log.print(`Last ${listing.limit} comments:`);
  log.print();
  for (const comment of listing.comments) {
    log.print(rule);
    log.print(`${utcMinute(comment.createdAt)} by @${comment.author}`);
    if (comment.updatedAt !== comment.createdAt) {
      log.print(`Updated: ${utcMinute(comment.updatedAt)}`);
    }
    log.print();
    log.print(comment.body);
  }
  log.print(rule);
  log.print();
  log.print(`Showing ${listing.comments.length} of last ${listing.limit} comments`);

  if (listing.issue.isPullRequest) {
    log.print();
    log.print('Note: this issue is a pull request');
  }
}
