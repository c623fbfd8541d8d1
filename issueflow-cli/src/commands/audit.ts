import { Command } from 'commander';
import { createContext, formatExamples, globalOptions } from '../context.js';
import { auditIssues, printIssueAudit } from '../audit/issues.js';
import { auditPRs, printPRAudit } from '../audit/prs.js';
import { wrapCommand } from '../utils/errorHandler.js';
import { withSpinner } from '../utils/progress.js';

export const auditCommand = new Command('audit').description(
  'Read-only reports on open issues and pull requests'
);

auditCommand
  .command('issues')
  .description(
    'Report every open issue: age, activity, labels, assignees, referenced\n' +
      'files, linked pull requests, board fields and notes.' +
      formatExamples(['issueflow audit issues', 'issueflow --json audit issues > issues.json'])
  )
  .action(
    wrapCommand(
      'auditing issues',
      async (_options: unknown, cmd: Command) => {
        const { config, github, log } = createContext(globalOptions(cmd));
        const report = await withSpinner(
          'Auditing open issues...',
          () => auditIssues({ config, issues: github.issues, pulls: github.pulls, board: github.board, log }),
          { enabled: !log.isJson() && Boolean(process.stdout.isTTY), successText: (r) => `Audited ${r.summary.total} open issues` }
        );
        printIssueAudit(report, log);
        log.result('audit-issues', report);
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );

auditCommand
  .command('prs')
  .description(
    'Report every open pull request: reviews, checks, mergeability and a\n' +
      'TODO list of what stands between it and a merge.' +
      formatExamples(['issueflow audit prs'])
  )
  .action(
    wrapCommand(
      'auditing pull requests',
      async (_options: unknown, cmd: Command) => {
        const { config, github, log } = createContext(globalOptions(cmd));
        const report = await withSpinner(
          'Auditing open pull requests...',
          () => auditPRs({ config, pulls: github.pulls, issues: github.issues, log }),
          {
            enabled: !log.isJson() && Boolean(process.stdout.isTTY),
            successText: (r) => `Audited ${r.summary.total} open pull requests`,
          }
        );
        printPRAudit(report, log);
        log.result('audit-prs', report);
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );
