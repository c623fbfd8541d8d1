import { Command } from 'commander';
import { createContext, formatExamples, globalOptions, type AppContext } from '../context.js';
import { continueWork, finishWork, reviewWork, startWork, type WorkSessionDeps } from '../workflow/session.js';
import { parseIssueNumber } from '../workflow/fields.js';
import { wrapCommand } from '../utils/errorHandler.js';

function workDeps(context: AppContext): WorkSessionDeps {
  return {
    config: context.config,
    issues: context.github.issues,
    pulls: context.github.pulls,
    board: context.github.board,
    git: context.git,
    store: context.store,
    log: context.log,
  };
}

export const workCommand = new Command('work').description(
  'Work sessions: every issue in progress shares one branch and one draft pull request.\n\n' +
    'Lifecycle: Ready -> start -> In progress -> review -> In review -> done -> Done.\n' +
    'When a reviewer moves an issue back to In progress, run "work continue".'
);

workCommand
  .command('start')
  .description(
    'Start work on a Ready issue: check out the shared branch, move the issue to\n' +
      'In progress, add it to the shared pull request and record a session.' +
      formatExamples(['issueflow work start 42'])
  )
  .argument('<issue>', 'Issue number')
  .action(
    wrapCommand(
      'starting work',
      async (issue: string, _options: unknown, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const context = createContext(globalOptions(cmd));
        const result = await startWork(issueNumber, workDeps(context));
        context.log.result('work-start', result);
      },
      (_issue, _options, cmd) => globalOptions(cmd)
    )
  );

workCommand
  .command('continue')
  .description(
    'Resume work on an In progress issue. Starts a session when there is none.' +
      formatExamples(['issueflow work continue 42'])
  )
  .argument('<issue>', 'Issue number')
  .action(
    wrapCommand(
      'continuing work',
      async (issue: string, _options: unknown, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const context = createContext(globalOptions(cmd));
        const result = await continueWork(issueNumber, workDeps(context));
        context.log.result('work-continue', result);
      },
      (_issue, _options, cmd) => globalOptions(cmd)
    )
  );

workCommand
  .command('review')
  .description(
    'Post a work summary on the issue and move it to In review.' +
      formatExamples([
        'issueflow work review 42',
        'issueflow work review 42 --test-instructions "Log in, open /settings, change the avatar"',
      ])
  )
  .argument('<issue>', 'Issue number')
  .option('-t, --test-instructions <text>', 'How the reviewer should test the change')
  .action(
    wrapCommand(
      'marking ready for review',
      async (issue: string, options: { testInstructions?: string }, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const context = createContext(globalOptions(cmd));
        const result = await reviewWork(issueNumber, { testInstructions: options.testInstructions }, workDeps(context));
        context.log.result('work-review', result);
      },
      (_issue, _options, cmd) => globalOptions(cmd)
    )
  );

workCommand
  .command('done')
  .description('Move an issue to Done and archive its session.' + formatExamples(['issueflow work done 42']))
  .argument('<issue>', 'Issue number')
  .action(
    wrapCommand(
      'finishing work',
      async (issue: string, _options: unknown, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const context = createContext(globalOptions(cmd));
        const result = await finishWork(issueNumber, workDeps(context));
        context.log.result('work-done', result);
      },
      (_issue, _options, cmd) => globalOptions(cmd)
    )
  );
