/**
 * scanprobe CLI - Identification test runner for the insect identifier app
 */

import 'dotenv/config';
import { CommanderError } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@scanprobe/shared';
import { displayCompactBanner } from './ui/banner.js';
import { createProgram } from './program.js';

async function main() {
  displayCompactBanner();

  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code !== 'commander.helpDisplayed' && error.code !== 'commander.version') {
        process.exit(error.exitCode);
      }
      return;
    }
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}

void main();
