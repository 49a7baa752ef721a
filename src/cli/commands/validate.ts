import { Command } from 'commander';
import chalk from 'chalk';
import { loadScheduleFile } from '../../infra/schedule-file/index.js';
import { exitWithError } from '../lib/errors.js';
import { formatConsiderationQueue } from '../lib/format.js';

function validateSchedule(file: string): void {
  try {
    const { scheduler, termination } = loadScheduleFile(file, { warnOnDefaultConditions: false });

    // run() performs the condition and termination checks; nothing is stepped.
    scheduler.run(termination).return();

    console.log(chalk.green(`✓ ${file} is valid`));
    console.log(chalk.cyan('\nConsideration queue:'));
    for (const line of formatConsiderationQueue(scheduler.considerationQueue)) {
      console.log(`  ${line}`);
    }
    console.log();
  } catch (error) {
    exitWithError(error);
  }
}

export const validateCommand = new Command('validate')
  .description('Check a schedule file and print its consideration queue')
  .argument('<file>', 'Path to a schedule JSON file')
  .action(validateSchedule);
