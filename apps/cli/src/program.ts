import { Command } from 'commander';
import chalk from 'chalk';
import { execa } from 'execa';
import fs from 'fs-extra';
import { Logger, errorMessage } from '@scanprobe/shared';
import { AdbDeviceControl } from '@scanprobe/device';
import { loadProfile } from '@scanprobe/interactions';
import { loadConfig } from '@scanprobe/runner';
import { createRunCommand } from './commands/run.js';
import { createImagesCommand } from './commands/images.js';
import { createGenerateCasesCommand } from './commands/generate-cases.js';
import { createDevicesCommand } from './commands/devices.js';

export const VERSION = '0.1.0';

function createDoctorCommand(): Command {
  return new Command('doctor')
    .description('Check if all dependencies are installed')
    .option('-c, --config <path>', 'Config file')
    .action(async (options: { config?: string }) => {
      console.log(chalk.bold.blue('🔍 scanprobe doctor\n'));

      const config = await loadConfig({ configFile: options.config });
      const adb = new AdbDeviceControl({
        deviceId: config.deviceId,
        adbPath: config.adbPath,
        logger: new Logger({ level: 'error' }),
      });
      const packageName = config.appPackage ?? loadProfile(config.profilePath).app.packageName;

      const checks = [
        {
          name: 'Node.js',
          check: async () => process.version,
        },
        {
          name: 'adb',
          check: async () => {
            const version = await adb.version();
            if (!version) throw new Error('not found');
            return version;
          },
        },
        {
          name: 'Maestro CLI',
          check: async () => {
            const { stdout } = await execa(config.maestroPath, ['--version'], { timeout: 15000 });
            return stdout.trim();
          },
        },
        {
          name: 'Connected devices',
          check: async () => {
            const ready = (await adb.listDevices()).filter((device) => device.state === 'device');
            if (ready.length === 0) throw new Error('none');
            return ready.map((device) => device.serial).join(', ');
          },
        },
        {
          name: `App ${packageName}`,
          check: async () => {
            if (!(await adb.isPackageInstalled(packageName))) throw new Error('not installed');
            return chalk.green('Installed ✓');
          },
        },
        {
          name: 'Test cases',
          check: async () =>
            (await fs.pathExists(config.testCasesFile))
              ? config.testCasesFile
              : chalk.yellow('Not created yet (created on first run)'),
        },
      ];

      for (const { name, check } of checks) {
        try {
          const result = await check();
          console.log(chalk.green('✓'), chalk.white(name + ':'), chalk.gray(result));
        } catch (error) {
          console.log(chalk.red('✗'), chalk.white(name + ':'), chalk.red(errorMessage(error)));
        }
      }

      console.log('');
    });
}

/**
 * The `scanprobe` program with every command attached. Commander errors are
 * thrown as `CommanderError` instead of exiting.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('scanprobe')
    .description('Drive the insect identifier app through its test images and report accuracy')
    .version(VERSION);

  program.addCommand(createRunCommand());
  program.addCommand(createImagesCommand());
  program.addCommand(createGenerateCasesCommand());
  program.addCommand(createDevicesCommand());
  program.addCommand(createDoctorCommand());

  program.exitOverride();
  return program;
}
