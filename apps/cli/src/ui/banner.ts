import chalk from 'chalk';

export function displayCompactBanner(): void {
  console.log(chalk.bold.green('scanprobe') + chalk.gray(' · insect identifier test runner\n'));
}
