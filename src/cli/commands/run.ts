import { Command } from 'commander';
import chalk from 'chalk';
import { debugEmitter } from '../../debug/index.js';
import { loadRuntimeConfig } from '../../infra/config/index.js';
import { loadScheduleFile } from '../../infra/schedule-file/index.js';
import { exitWithError } from '../lib/errors.js';
import { formatTimeStep } from '../lib/format.js';
import { runLoadedSchedule } from '../lib/schedule-runner.js';

interface RunOptions {
  maxSteps?: string;
  json?: boolean;
  debug?: boolean;
}

function runSchedule(file: string, options: RunOptions): void {
  const config = loadRuntimeConfig();
  const maxTimeSteps = options.maxSteps
    ? Number.parseInt(options.maxSteps, 10)
    : config.scheduler.maxTimeSteps;

  if (!Number.isInteger(maxTimeSteps) || maxTimeSteps <= 0) {
    console.error(chalk.red(`--max-steps must be a positive integer, got ${options.maxSteps}`));
    process.exit(1);
  }

  const verbose = options.debug || config.debug.loggingEnabled;
  if (verbose) {
    debugEmitter.enable();
    debugEmitter.onDebug((event) => {
      console.error(chalk.gray(`${event.type} ${JSON.stringify(event.data)}`));
    });
  }

  try {
    const loaded = loadScheduleFile(file, {
      debug: verbose,
      warnOnDefaultConditions: config.scheduler.warnOnDefaultConditions && !options.json,
    });

    if (!options.json) {
      console.log(chalk.bold.cyan(`\n⏱  ${file}\n`));
    }

    const outcome = runLoadedSchedule(loaded, maxTimeSteps, (index, nodes) => {
      if (!options.json) {
        const line = formatTimeStep(index, nodes);
        console.log(nodes.length === 0 ? chalk.yellow(line) : line);
      }
    });

    if (options.json) {
      console.log(JSON.stringify(outcome, null, 2));
      return;
    }

    console.log();
    if (outcome.truncated) {
      console.log(chalk.yellow(`Stopped after ${maxTimeSteps} time steps (--max-steps).`));
    } else {
      console.log(chalk.green(`✓ Trial finished after ${outcome.timeSteps.length} time steps (${outcome.status})`));
    }
  } catch (error) {
    exitWithError(error);
  }
}

export const runCommand = new Command('run')
  .description('Run a schedule file and print each time step')
  .argument('<file>', 'Path to a schedule JSON file')
  .option('-m, --max-steps <n>', 'Stop after this many time steps')
  .option('--json', 'Print the result as JSON')
  .option('--debug', 'Print scheduler debug events')
  .action(runSchedule);
