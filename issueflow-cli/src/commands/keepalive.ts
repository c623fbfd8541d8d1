import { Command } from 'commander';
import { globalOptions } from '../context.js';
import {
  keepaliveStatus,
  runKeepalive,
  startDetachedKeepalive,
  stopDetachedKeepalive,
} from '../keepalive/index.js';
import { logger } from '../utils/logger.js';
import { wrapCommand } from '../utils/errorHandler.js';

const DEFAULT_DIR = '.claude';

interface KeepaliveCommandOptions {
  dir: string;
}

export const keepaliveCommand = new Command('keepalive').description(
  'Heartbeat supervisor that keeps a long-lived workspace session marked active.\n\n' +
    'Writes keepalive.log every 3 minutes; a watchdog checks it every minute and\n' +
    'logs to monitor.log. Neither reads the issueflow configuration.'
);

keepaliveCommand
  .command('run')
  .description('Run the supervisor in the foreground until Ctrl+C')
  .option('-d, --dir <path>', 'Directory for keepalive.log and monitor.log', DEFAULT_DIR)
  .action(
    wrapCommand(
      'running keepalive',
      async (options: KeepaliveCommandOptions, _cmd: Command) => {
        await runKeepalive({ dir: options.dir });
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );

keepaliveCommand
  .command('start')
  .description('Start the supervisor as a background process')
  .option('-d, --dir <path>', 'Directory for keepalive.log, monitor.log and the pid file', DEFAULT_DIR)
  .action(
    wrapCommand(
      'starting keepalive',
      async (options: KeepaliveCommandOptions, _cmd: Command) => {
        const status = startDetachedKeepalive(options.dir);
        logger.success(`Keepalive running with PID ${status.pid}`);
        logger.print(`Logs: ${options.dir}/keepalive.log, ${options.dir}/monitor.log`);
        logger.print('Stop with: issueflow keepalive stop');
        logger.result('keepalive-start', status);
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );

keepaliveCommand
  .command('stop')
  .description('Stop the background supervisor')
  .option('-d, --dir <path>', 'Directory holding the pid file', DEFAULT_DIR)
  .action(
    wrapCommand(
      'stopping keepalive',
      async (options: KeepaliveCommandOptions, _cmd: Command) => {
        const before = keepaliveStatus(options.dir);
        const status = stopDetachedKeepalive(options.dir);
        if (before.running) {
          logger.success(`Stopped keepalive (PID ${before.pid})`);
        } else {
          logger.info('Keepalive is not running');
        }
        logger.result('keepalive-stop', status);
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );

keepaliveCommand
  .command('status')
  .description('Report whether the background supervisor is running')
  .option('-d, --dir <path>', 'Directory holding the pid file', DEFAULT_DIR)
  .action(
    wrapCommand(
      'checking keepalive',
      async (options: KeepaliveCommandOptions, _cmd: Command) => {
        const status = keepaliveStatus(options.dir);
        if (status.running) {
          logger.success(`Keepalive running with PID ${status.pid}`);
        } else {
          logger.info('Keepalive is not running');
        }
        logger.result('keepalive-status', status);
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );
