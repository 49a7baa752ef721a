#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from './commands/run.js';
import { validateCommand } from './commands/validate.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('tickgraph')
  .description('Condition-gated scheduling over dependency graphs')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(validateCommand);
program.addCommand(configCommand);

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `tickgraph --help` for available commands'));
  process.exit(1);
});

program.parse();
