import { Command } from 'commander';
import { applyGlobalOptions } from './context.js';
import { createIssueCommand, statusCommand, updateFieldCommand } from './commands/issues.js';
import { auditCommand } from './commands/audit.js';
import { commentCommand } from './commands/comment.js';
import { openPRsCommand } from './commands/open-prs.js';
import { workCommand } from './commands/work.js';
import { monitorCommand } from './commands/monitor.js';
import { keepaliveCommand } from './commands/keepalive.js';
import { setupCommand } from './commands/setup.js';
import { configCommand, helpConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('issueflow')
    .description(
      'GitHub issue, pull request and project board workflow.\n\n' +
        'Quick Start:\n' +
        '  1. Run "issueflow setup" to map your project board and write a config file\n' +
        '  2. Run "issueflow create-issue <title>" to file work into Backlog\n' +
        '  3. Run "issueflow work start <issue>" on a Ready issue\n' +
        '  4. Run "issueflow work review <issue>" when it is ready for testing\n\n' +
        'For more information on a specific command, run:\n' +
        '  issueflow <command> --help'
    )
    .version(VERSION)
    .option('-c, --config <path>', 'Path to configuration file (JSON format)')
    .option('--json', 'Machine-readable output: JSON log lines and a final result object')
    .option('-v, --verbose', 'Enable verbose/debug logging output')
    .hook('preAction', (_program, actionCommand) => {
      applyGlobalOptions(actionCommand.optsWithGlobals());
    });

  program.addCommand(createIssueCommand);
  program.addCommand(updateFieldCommand);
  program.addCommand(statusCommand);
  program.addCommand(auditCommand);
  program.addCommand(commentCommand);
  program.addCommand(openPRsCommand);
  program.addCommand(workCommand);
  program.addCommand(monitorCommand);
  program.addCommand(keepaliveCommand);
  program.addCommand(setupCommand);
  program.addCommand(configCommand);
  program.addCommand(helpConfigCommand);

  return program;
}
