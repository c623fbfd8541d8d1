import { Command } from 'commander';
import { createContext, formatExamples, globalOptions } from '../context.js';
import {
  addComment,
  DEFAULT_COMMENT_LIMIT,
  listRecentComments,
  parseCommentLimit,
  printCommentListing,
} from '../comments/index.js';
import { parseIssueNumber } from '../workflow/fields.js';
import { wrapCommand } from '../utils/errorHandler.js';

export const commentCommand = new Command('comment').description('Add or read issue comments');

commentCommand
  .command('add')
  .description(
    'Post a comment on an issue or pull request.' +
      formatExamples(['issueflow comment add 42 "Reproduced on main, see logs below"'])
  )
  .argument('<issue>', 'Issue number')
  .argument('<text>', 'Comment body (markdown)')
  .action(
    wrapCommand(
      'adding comment',
      async (issue: string, text: string, _options: unknown, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const { github, log } = createContext(globalOptions(cmd));
        const result = await addComment(issueNumber, text, { issues: github.issues, log });
        log.result('comment-add', result);
      },
      (_issue, _text, _options, cmd) => globalOptions(cmd)
    )
  );

commentCommand
  .command('list')
  .description(
    `Show the most recent comments of an issue, oldest first (default ${DEFAULT_COMMENT_LIMIT}).` +
      formatExamples(['issueflow comment list 42', 'issueflow comment list 42 20'])
  )
  .argument('<issue>', 'Issue number')
  .argument('[limit]', 'Number of comments to show')
  .action(
    wrapCommand(
      'listing comments',
      async (issue: string, limit: string | undefined, _options: unknown, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const count = parseCommentLimit(limit);
        const { github, log } = createContext(globalOptions(cmd));
        const listing = await listRecentComments(issueNumber, count, { issues: github.issues });
        printCommentListing(listing, log);
        log.result('comment-list', listing);
      },
      (_issue, _limit, _options, cmd) => globalOptions(cmd)
    )
  );
