import { Command } from 'commander';
import chalk from 'chalk';
import { Logger } from '@scanprobe/shared';
import { createTestCaseStore, loadConfig } from '@scanprobe/runner';

export function createImagesCommand(): Command {
  const cmd = new Command('images')
    .description('List the test images found on this machine')
    .option('-c, --config <path>', 'Config file')
    .action(async (options: { config?: string }) => {
      const config = await loadConfig({ configFile: options.config });
      const store = createTestCaseStore(config, new Logger({ level: 'error' }));

      for (const imageType of ['original', 'augmented'] as const) {
        const images = await store.listImages(imageType);
        console.log(chalk.bold(`\nAvailable ${imageType} images`), chalk.gray(`(${store.imageDir(imageType)})`));
        if (images.length === 0) {
          console.log(chalk.gray('  none'));
        }
        for (const image of images) {
          console.log(`  - ${image}`);
        }
      }
      console.log('');
    });

  return cmd;
}
