import type { Issue, IssueComment } from '../github/issues.js';
import type { WorkSession } from '../session/schema.js';

const PREVIEW_LENGTH = 100;

/**
 * Markdown cache of an issue and its whole comment thread, written to
 * `<stateDir>/issue-<n>-details.md` when work starts.
 */
export function renderIssueDetails(issue: Issue, comments: IssueComment[]): string {
  const lines = [
    `# GitHub Issue #${issue.number}: ${issue.title}`,
    '',
    `**Status:** ${issue.state}`,
    `**Labels:** ${issue.labels.length > 0 ? issue.labels.join(',') : 'none'}`,
    `**Assignee:** ${issue.assignees[0] ?? 'unassigned'}`,
    `**Created:** ${issue.createdAt}`,
    `**Updated:** ${issue.updatedAt}`,
    `**URL:** ${issue.htmlUrl}`,
    '',
    '## Description',
    '',
    issue.body || 'No description provided',
    '',
    '## Comments',
    '',
  ];

  if (comments.length === 0) {
    lines.push('No comments yet.');
  } else {
    for (const comment of comments) {
      lines.push(`### Comment by ${comment.author} on ${comment.createdAt}`, '', comment.body, '', '---', '');
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * One line per comment for the newest `count` comments, newest first. Only
 * the first line of each body is shown, cut at 100 characters.
 */
export function recentCommentLines(comments: IssueComment[], count: number): string[] {
  return comments
    .slice(-count)
    .reverse()
    .map((comment) => {
      const firstLine = comment.body.split('\n')[0] ?? '';
      const preview =
        firstLine.length > PREVIEW_LENGTH ? `${firstLine.slice(0, PREVIEW_LENGTH)}...` : firstLine;
      return `  ${comment.createdAt} by ${comment.author}: ${preview}`;
    });
}

export interface WorkSummaryInput {
  session: WorkSession;
  commits: string[];
  testInstructions: string;
}

/**
 * Comment posted on the issue by `work review`, ending with the checklist
 * the reviewer fills in.
 */
export function buildWorkSummary({ session, commits, testInstructions }: WorkSummaryInput): string {
  const lines = [
    '## Work Completed',
    '',
    `**Branch**: ${session.branch}`,
    `**PR**: ${session.prNumber === null ? 'none' : `#${session.prNumber}`}`,
    `**Started**: ${session.startedAt}`,
    '',
  ];

  if (session.filesModified.length > 0) {
    lines.push('**Files Modified**:');
    for (const file of session.filesModified) {
      lines.push(`- ${file}`);
    }
    lines.push('');
  }

  if (commits.length > 0) {
    lines.push('**Commits**:', '```', ...commits, '```', '');
  }

  if (testInstructions.trim()) {
    lines.push('**Test Instructions**:', testInstructions.trim(), '');
  }

  lines.push(
    '**Status**: Ready for testing',
    '',
    '---',
    '',
    '## Testing Feedback',
    '',
    '_Reviewer: add testing instructions and results here. Update this comment with:_',
    '- [ ] Manual testing steps and results',
    '- [ ] Any issues found',
    '- [ ] Changes requested',
    '- [ ] Approval to merge'
  );

  return lines.join('\n');
}
