import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { Logger, errorMessage, formatDuration, isInterruption } from '@scanprobe/shared';
import type { ImageType } from '@scanprobe/evaluation';
import { createRun, loadConfig, type RunConfig, type UploadMethod } from '@scanprobe/runner';
import { printSummary } from '../ui/summary.js';

interface RunCommandOptions {
  testId?: string;
  type?: ImageType;
  manual?: boolean;
  upload?: UploadMethod;
  config?: string;
  device?: string;
  verbose?: boolean;
}

function parseUploadMethod(value: string): UploadMethod {
  if (value === 'gallery' || value === 'intent') return value;
  throw new InvalidArgumentError('Expected "gallery" or "intent".');
}

function parseImageType(value: string): ImageType {
  if (value === 'original' || value === 'augmented') return value;
  throw new InvalidArgumentError('Expected "original" or "augmented".');
}

/**
 * Ctrl+C once to stop after the current step, twice to exit immediately.
 */
function trapInterrupts(controller: AbortController): () => void {
  const onSigint = () => {
    if (controller.signal.aborted) {
      console.log(chalk.red('\nExiting now.'));
      process.exit(130);
    }
    console.log(chalk.yellow('\n⚠️  Interrupting after the current step (Ctrl+C again to exit now)...'));
    controller.abort();
  };
  process.on('SIGINT', onSigint);
  return () => {
    process.off('SIGINT', onSigint);
  };
}

export function createRunCommand(): Command {
  const cmd = new Command('run')
    .description('Run identification tests against the app on a connected device')
    .option('--test-id <id>', 'Run a single test case')
    .option('--type <imageType>', 'Only run original or augmented cases', parseImageType)
    .option('--manual', 'Select each image on the device yourself')
    .option('--upload <method>', 'Upload method: gallery or intent', parseUploadMethod)
    .option('-c, --config <path>', 'Config file (default: ./scanprobe.config.yaml)')
    .option('-d, --device <udid>', 'Device serial (default: the only connected device)')
    .option('--verbose', 'Debug logging')
    .action(async (options: RunCommandOptions) => {
      console.log(chalk.bold.blue('\n🐞 scanprobe run\n'));

      let config: RunConfig;
      try {
        config = await loadConfig({
          configFile: options.config,
          overrides: {
            deviceId: options.device,
            manualMode: options.manual ? true : undefined,
            uploadMethod: options.upload,
            logLevel: options.verbose ? 'debug' : undefined,
          },
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exit(1);
      }

      const logger = new Logger({ level: config.logLevel, logFile: config.logFile });
      const controller = new AbortController();
      const { store, orchestrator, profile } = createRun(config, { logger, signal: controller.signal });

      let testCases = await store.load();
      if (options.testId) {
        testCases = testCases.filter((testCase) => testCase.testId === options.testId);
        if (testCases.length === 0) {
          console.error(chalk.red(`Error: Test case ${options.testId} not found!`));
          process.exit(1);
        }
      }
      if (options.type) {
        testCases = testCases.filter((testCase) => testCase.imageType === options.type);
      }
      if (testCases.length === 0) {
        console.error(chalk.red('Error: No test cases found! Create test cases first.'));
        process.exit(1);
      }

      console.log(chalk.cyan('App:'), `${profile.app.name} (${profile.app.packageName})`);
      console.log(chalk.cyan('Device:'), config.deviceId ?? 'default');
      console.log(chalk.cyan('Mode:'), config.manualMode ? 'manual' : `automated (${config.uploadMethod})`);
      console.log(chalk.cyan('Test cases:'), testCases.length);
      console.log('');

      const releaseInterrupts = trapInterrupts(controller);
      try {
        const spinner = ora('Setting up test environment...').start();
        try {
          await orchestrator.setup();
          spinner.succeed('Test environment ready');
        } catch (error) {
          if (isInterruption(error)) {
            spinner.warn('Interrupted during setup. No tests were run.');
            return;
          }
          spinner.fail(`Failed to set up test environment: ${errorMessage(error)}`);
          process.exitCode = 1;
          return;
        }

        const outcome = await orchestrator.runAll(testCases);

        if (outcome.state === 'interrupted') {
          console.log(chalk.yellow.bold('\n⚠️  INTERRUPTED BY USER (Ctrl+C)'));
          console.log(chalk.yellow(`Completed ${outcome.results.length}/${outcome.total} test(s)\n`));
        }

        const written = await orchestrator.writeReport(config.reportsDir);
        if (!written) {
          console.log(chalk.yellow('\n⚠️  No test results to report.'));
          return;
        }

        console.log('');
        printSummary(written.report);
        console.log(chalk.cyan('\nReport:'), written.path);
        console.log(chalk.cyan('Duration:'), formatDuration(outcome.durationMs));
      } finally {
        releaseInterrupts();
        await orchestrator.teardown();
      }
    });

  return cmd;
}
