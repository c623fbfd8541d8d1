import { Command } from 'commander';
import { createContext, globalOptions } from '../context.js';
import { openAllPRs } from '../open-prs/index.js';
import { wrapCommand } from '../utils/errorHandler.js';

export const openPRsCommand = new Command('open-prs')
  .description('Open every open pull request of the repository in the default browser')
  .action(
    wrapCommand(
      'opening pull requests',
      async (_options: unknown, cmd: Command) => {
        const { github, log } = createContext(globalOptions(cmd));
        const result = await openAllPRs({ pulls: github.pulls, log });
        log.result('open-prs', result);
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );
