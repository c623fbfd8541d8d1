import { Command } from 'commander';
import { createContext, formatExamples, globalOptions } from '../context.js';
import { createIssue } from '../workflow/create.js';
import { updateField } from '../workflow/update-field.js';
import { changeStatus } from '../workflow/status.js';
import {
  parseIssueNumber,
  parseStatusKeyword,
  PRIORITIES,
  SIZES,
  STATUS_KEYWORDS,
  UPDATABLE_FIELDS,
} from '../workflow/fields.js';
import { wrapCommand } from '../utils/errorHandler.js';

interface CreateIssueOptions {
  labels?: string;
  priority?: string;
  size?: string;
}

export const createIssueCommand = new Command('create-issue')
  .description(
    'Create an issue and add it to the project board as Backlog.\n\n' +
      'Priority and Size are set on the board and Estimate is derived from Size\n' +
      '(XS=1, S=2, M=4, L=8, XL=16 hours).' +
      formatExamples([
        'issueflow create-issue "Fix login redirect" "Users land on /404 after login" -l bug -p P1 -s S',
        'issueflow create-issue "Write onboarding docs"',
      ])
  )
  .argument('<title>', 'Issue title')
  .argument('[body]', 'Issue body (markdown)')
  .option('-l, --labels <labels>', 'Comma-separated labels')
  .option('-p, --priority <priority>', `Priority (${PRIORITIES.join(', ')})`, 'P2')
  .option('-s, --size <size>', `Size (${SIZES.join(', ')})`, 'M')
  .action(
    wrapCommand(
      'creating issue',
      async (title: string, body: string | undefined, options: CreateIssueOptions, cmd: Command) => {
        const { config, github, log } = createContext(globalOptions(cmd));
        const result = await createIssue(
          { title, body, labels: options.labels, priority: options.priority, size: options.size },
          { config, issues: github.issues, board: github.board, log }
        );
        log.result('create-issue', result);
      },
      (_title, _body, _options, cmd) => globalOptions(cmd)
    )
  );

export const updateFieldCommand = new Command('update-field')
  .description(
    `Set one board field of an issue (${UPDATABLE_FIELDS.join(', ')}).` +
      formatExamples(['issueflow update-field 42 priority P0', 'issueflow update-field 42 size L', 'issueflow update-field 42 estimate 6'])
  )
  .argument('<issue>', 'Issue number')
  .argument('<field>', `Field to update (${UPDATABLE_FIELDS.join(', ')})`)
  .argument('<value>', 'New value')
  .action(
    wrapCommand(
      'updating field',
      async (issue: string, field: string, value: string, _options: unknown, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const { config, github, log } = createContext(globalOptions(cmd));
        const result = await updateField(issueNumber, field, value, { config, board: github.board, log });
        log.result('update-field', result);
      },
      (_issue, _field, _value, _options, cmd) => globalOptions(cmd)
    )
  );

export const statusCommand = new Command('status')
  .description(
    `Move an issue to a board status (${STATUS_KEYWORDS.join(', ')}).\n\n` +
      'Issues not yet on the board are added first. With workflow.syncStatusLabels,\n' +
      'in-progress and in-review also set the matching issue label.' +
      formatExamples(['issueflow status 42 ready', 'issueflow status 42 in-review'])
  )
  .argument('<issue>', 'Issue number')
  .argument('<status>', 'Status keyword')
  .action(
    wrapCommand(
      'changing status',
      async (issue: string, status: string, _options: unknown, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const keyword = parseStatusKeyword(status);
        const { config, github, log } = createContext(globalOptions(cmd));
        const result = await changeStatus(issueNumber, keyword, {
          config,
          board: github.board,
          issues: github.issues,
          log,
        });
        log.result('status', result);
      },
      (_issue, _status, _options, cmd) => globalOptions(cmd)
    )
  );
