import { Command } from 'commander';
import chalk from 'chalk';
import { Logger } from '@scanprobe/shared';
import { DEFAULT_AUGMENTATION_EFFECTS, createTestCaseStore, loadConfig } from '@scanprobe/runner';

interface GenerateCasesOptions {
  config?: string;
  effects: string[];
  fromImages?: boolean;
  augment: boolean;
}

function parseEffects(value: string): string[] {
  return value
    .split(',')
    .map((effect) => effect.trim())
    .filter(Boolean);
}

export function createGenerateCasesCommand(): Command {
  const cmd = new Command('generate-cases')
    .description('Add augmented test cases for every dragonfly image')
    .option('-c, --config <path>', 'Config file')
    .option('--effects <list>', 'Comma-separated augmentation effects', parseEffects, DEFAULT_AUGMENTATION_EFFECTS)
    .option('--from-images', 'First replace the case file with one case per original image')
    .option('--no-augment', 'Skip adding augmented cases')
    .action(async (options: GenerateCasesOptions) => {
      const config = await loadConfig({ configFile: options.config });
      const logger = new Logger({ level: config.logLevel, logFile: config.logFile });
      const store = createTestCaseStore(config, logger);

      if (options.fromImages) {
        const generated = await store.generateFromImages();
        console.log(chalk.green(`✓ Generated ${generated.length} original test case(s)`));
      }

      if (options.augment) {
        const added = await store.addAugmentedForAll(options.effects);
        console.log(
          chalk.green(`✓ Added ${added.length} augmented test case(s)`),
          chalk.gray(`(${options.effects.join(', ')})`)
        );
      }

      console.log(chalk.cyan('Test cases:'), store.filePath);
    });

  return cmd;
}
