import { Command } from 'commander';
import { createContext, formatExamples, globalOptions } from '../context.js';
import { StatusMonitor } from '../workflow/monitor.js';
import { parseIssueNumber } from '../workflow/fields.js';
import { UsageError } from '../utils/errors.js';
import { wrapCommand } from '../utils/errorHandler.js';

function parseInterval(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[0-9]+$/.test(value) || Number(value) === 0) {
    throw new UsageError(`Invalid interval '${value}'. Use a positive number of seconds`, {
      argument: 'interval',
      value,
    });
  }
  return Number(value) * 1000;
}

export const monitorCommand = new Command('monitor')
  .description(
    'Poll an issue\'s board status and ring the bell when it comes back to\n' +
      'In progress. Runs until Ctrl+C.' +
      formatExamples(['issueflow monitor 42', 'issueflow monitor 42 --interval 60'])
  )
  .argument('<issue>', 'Issue number')
  .option('-i, --interval <seconds>', 'Seconds between polls (default: workflow.monitorIntervalSeconds)')
  .action(
    wrapCommand(
      'monitoring issue',
      async (issue: string, options: { interval?: string }, cmd: Command) => {
        const issueNumber = parseIssueNumber(issue);
        const intervalMs = parseInterval(options.interval);
        const { config, github, store, log } = createContext(globalOptions(cmd));

        const monitor = new StatusMonitor(issueNumber, { config, board: github.board, store, log }, { intervalMs });
        await monitor.start();
        log.result('monitor', { issueNumber, lastStatus: monitor.currentStatus });
      },
      (_issue, _options, cmd) => globalOptions(cmd)
    )
  );
