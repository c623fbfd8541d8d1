import { homedir } from 'os';
import { Command } from 'commander';
import { formatExamples, globalOptions } from '../context.js';
import { runSetup, type RepoRef, type SetupApi } from '../setup/index.js';
import { createReadlinePrompter } from '../setup/prompt.js';
import { createGitHubClient } from '../github/client.js';
import { createRepositoryManager } from '../github/repository.js';
import { createBoardManager } from '../github/board.js';
import { createGitOperations } from '../git/index.js';
import { systemCommands } from '../utils/tools.js';
import { logger } from '../utils/logger.js';
import { wrapCommand } from '../utils/errorHandler.js';

function connect(token: string, repo: RepoRef): SetupApi {
  const client = createGitHubClient({ token, owner: repo.owner, repo: repo.name });
  // Project discovery queries the repository, so no project id yet.
  return { repository: createRepositoryManager(client), board: createBoardManager(client, '') };
}

export const setupCommand = new Command('setup')
  .description(
    'Interactive wizard that finds the repository and project board, maps the\n' +
      'Status, Priority, Size and Estimate fields and writes issueflow.config.json.\n\n' +
      'Nothing is written when the board lacks a required field or option.' +
      formatExamples(['issueflow setup', 'issueflow setup --discover-only'])
  )
  .option('--discover-only', 'Print the discovered project and field IDs without writing anything')
  .action(
    wrapCommand(
      'running setup',
      async (options: { discoverOnly?: boolean }, cmd: Command) => {
        const globals = globalOptions(cmd);
        const cwd = process.cwd();
        const prompter = createReadlinePrompter();
        try {
          const result = await runSetup(
            { discoverOnly: options.discoverOnly, configPath: globals.config },
            {
              prompter,
              commands: systemCommands,
              git: createGitOperations(cwd),
              connect,
              log: logger,
              env: process.env,
              homeDir: homedir(),
              cwd,
            }
          );
          logger.result('setup', result);
        } finally {
          prompter.close();
        }
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );
