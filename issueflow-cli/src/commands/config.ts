import chalk from 'chalk';
import { Command } from 'commander';
import { formatExamples, globalOptions, loadCommandConfig } from '../context.js';
import {
  CONFIG_FILE_CANDIDATES,
  describeValidationErrors,
  formatMigrationSummary,
  getConfigHelp,
  upgradeConfig,
  type Config,
} from '../config/index.js';
import { describeTokenSource } from '../config/token.js';
import { ConfigError, ErrorCode } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { wrapCommand } from '../utils/errorHandler.js';

function printConfig(config: Config): void {
  logger.header('Configuration');

  logger.print(chalk.bold('Repository:'));
  logger.print(`  Slug:        ${config.repo.owner}/${config.repo.name}`);
  logger.print(`  Token:       ${describeTokenSource(config.token)} ${chalk.gray('(value not shown)')}`);
  logger.print();

  logger.print(chalk.bold('Project:'));
  logger.print(`  ID:          ${config.project.id}`);
  if (config.project.name) logger.print(`  Name:        ${config.project.name}`);
  logger.print(`  Status:      ${config.project.fields.status}`);
  logger.print(`  Priority:    ${config.project.fields.priority}`);
  logger.print(`  Size:        ${config.project.fields.size}`);
  logger.print(`  Estimate:    ${config.project.fields.estimate}`);
  logger.print();

  logger.print(chalk.bold('Workflow:'));
  logger.print(`  State Dir:   ${config.workflow.stateDir}`);
  logger.print(`  Branch:      ${config.workflow.branch} -> ${config.workflow.baseBranch}`);
  logger.print(`  PR Title:    ${config.workflow.prTitle}`);
  logger.print(`  Labels:      ${config.workflow.syncStatusLabels ? chalk.green('✓ synced') : chalk.gray('not synced')}`);
  logger.print(`  Monitor:     every ${config.workflow.monitorIntervalSeconds}s`);
  logger.print();

  logger.print(chalk.bold('Logging:'));
  logger.print(`  Level:       ${config.logging.level}`);
  logger.print(`  Format:      ${config.logging.format}`);
}

export const configCommand = new Command('config')
  .description(
    'Show, validate or upgrade the configuration.\n\n' +
      'Configuration precedence (highest to lowest):\n' +
      '  1. Environment variables (ISSUEFLOW_*, LOG_LEVEL, LOG_FORMAT)\n' +
      '  2. Config file\n' +
      '  3. Default values' +
      formatExamples(['issueflow config', 'issueflow config --validate', 'issueflow config --upgrade']) +
      '\n\nConfig file locations (searched in order):\n' +
      CONFIG_FILE_CANDIDATES.map((path) => `  • ${path}`).join('\n')
  )
  .option('--validate', 'Only validate configuration, do not show details')
  .option('--upgrade', 'Migrate an older config file to the current version (keeps a .backup copy)')
  .action(
    wrapCommand(
      'loading configuration',
      async (options: { validate?: boolean; upgrade?: boolean }, cmd: Command) => {
        const globals = globalOptions(cmd);

        if (options.upgrade) {
          const result = upgradeConfig(globals.config);
          if (!result.success) {
            throw new ConfigError(ErrorCode.CONFIG_MIGRATION_FAILED, result.error ?? 'Configuration upgrade failed', {
              context: { configPath: result.configPath },
            });
          }
          if (result.backupPath && result.migrationResult) {
            logger.print(formatMigrationSummary(result.migrationResult));
            logger.success(`Upgraded ${result.configPath} (backup: ${result.backupPath})`);
          } else {
            logger.success(`${result.configPath} is already at the current version`);
          }
          logger.result('config-upgrade', result);
          return;
        }

        let config: Config;
        try {
          config = loadCommandConfig(globals);
        } catch (error) {
          if (options.validate && error instanceof ConfigError) {
            for (const line of describeValidationErrors(error)) {
              logger.print(chalk.yellow(line));
            }
          }
          throw error;
        }

        if (options.validate) {
          logger.success('Configuration is valid');
          logger.result('config-validate', { valid: true });
          return;
        }

        printConfig(config);
        logger.result('config', { ...config, tokenSource: describeTokenSource(config.token) });
      },
      (_options, cmd) => globalOptions(cmd)
    )
  );

export const helpConfigCommand = new Command('help-config')
  .description('Show documentation for every configuration option and environment variable')
  .action(() => {
    logger.header('Configuration Reference');
    logger.print(getConfigHelp());
  });
