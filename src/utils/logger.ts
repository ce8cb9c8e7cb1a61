import chalk from 'chalk';

class Logger {
  private verbose = false;

  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  info(message: string) {
    console.log(`${chalk.blue('ℹ')} ${message}`);
  }

  success(message: string) {
    console.log(`${chalk.green('✓')} ${message}`);
  }

  warn(message: string) {
    console.warn(`${chalk.yellow('⚠')} ${chalk.yellow(message)}`);
  }

  error(message: string) {
    console.error(`${chalk.red('✗')} ${chalk.red(message)}`);
  }

  debug(message: string) {
    if (!this.verbose) return;
    console.log(chalk.gray(`  ${message}`));
  }
}

export const logger = new Logger();
