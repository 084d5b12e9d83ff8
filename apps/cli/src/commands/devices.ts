import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { Logger } from '@scanprobe/shared';
import { AdbDeviceControl } from '@scanprobe/device';
import { loadConfig } from '@scanprobe/runner';

export function createDevicesCommand(): Command {
  const cmd = new Command('devices')
    .description('List connected Android devices')
    .option('-c, --config <path>', 'Config file')
    .action(async (options: { config?: string }) => {
      const config = await loadConfig({ configFile: options.config });
      const adb = new AdbDeviceControl({ adbPath: config.adbPath, logger: new Logger({ level: 'error' }) });

      const spinner = ora('Looking for devices...').start();
      const devices = await adb.listDevices();
      spinner.stop();

      if (devices.length === 0) {
        console.log(chalk.yellow('No devices found. Start an emulator or connect a device with USB debugging on.'));
        return;
      }

      console.log(chalk.bold(`\n📱 ${devices.length} device(s)\n`));
      for (const device of devices) {
        if (device.state !== 'device') {
          console.log(chalk.yellow(`  ${device.serial}`), chalk.gray(`(${device.state})`));
          continue;
        }
        const info = await adb.getDeviceInfo(device.serial);
        console.log(
          chalk.green(`  ${info.serial}`),
          `${info.manufacturer} ${info.model}`,
          chalk.gray(`Android ${info.androidVersion} (SDK ${info.sdkVersion})`)
        );
      }
      console.log('');
    });

  return cmd;
}
