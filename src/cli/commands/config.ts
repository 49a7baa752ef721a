import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import {
  DEFAULT_RUNTIME_CONFIG,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  saveRuntimeConfig,
} from '../../infra/config/index.js';

function showConfig(): void {
  const configPath = getRuntimeConfigPath();
  const config = loadRuntimeConfig();

  console.log(chalk.cyan('\nCurrent Configuration:\n'));
  console.log(chalk.white('  File:'), fs.existsSync(configPath) ? configPath : `${configPath} (not created)`);
  console.log(chalk.white('  Max time steps:'), config.scheduler.maxTimeSteps);
  console.log(
    chalk.white('  Warn on default conditions:'),
    config.scheduler.warnOnDefaultConditions ? chalk.green('Yes') : chalk.red('No')
  );
  console.log(
    chalk.white('  Debug logging:'),
    config.debug.loggingEnabled ? chalk.green('Yes') : chalk.red('No')
  );
  console.log();
}

function initConfig(options: { force?: boolean }): void {
  const configPath = getRuntimeConfigPath();
  if (fs.existsSync(configPath) && !options.force) {
    console.log(chalk.yellow(`${configPath} already exists (use --force to overwrite)`));
    return;
  }

  saveRuntimeConfig(DEFAULT_RUNTIME_CONFIG);
  console.log(chalk.green(`✓ Wrote ${configPath}`));
}

export const configCommand = new Command('config')
  .description('Manage runtime configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .action(showConfig);

configCommand
  .command('init')
  .description('Write a default tickgraph.json')
  .option('-f, --force', 'Overwrite an existing file')
  .action(initConfig);
