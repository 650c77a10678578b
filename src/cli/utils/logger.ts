/**
 * CLI logging utilities
 */

import chalk from 'chalk';
import ora from 'ora';
import type { DeployReporter } from '../../types/deployer.js';

/**
 * Log info message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Log success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Log warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Log error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Log a numbered step, e.g. `[2/4] Uploading archive`
 */
export function step(index: number, total: number, message: string): void {
  console.log(chalk.bold.cyan(`[${index}/${total}]`), message);
}

/**
 * Log verbose message (only in verbose mode)
 */
export function verbose(message: string, isVerbose: boolean = false): void {
  if (isVerbose) {
    console.log(chalk.gray('[verbose]'), message);
  }
}

/**
 * Log section header
 */
export function section(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`━━━ ${title} ━━━`));
  console.log();
}

/**
 * Log key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.log(chalk.gray(`${key}:`), chalk.white(value));
}

/**
 * Reporter that prints deployment progress to the terminal.
 * Archive creation runs under a spinner; scp and ssh write to the
 * terminal themselves, so no spinner is shown while they run.
 */
export function createConsoleReporter(isVerbose: boolean = false): DeployReporter {
  return {
    step,
    info,
    success,
    verbose: (message) => verbose(message, isVerbose),
    async task<T>(message: string, run: () => Promise<T>): Promise<T> {
      const spinner = ora(message).start();
      try {
        const result = await run();
        spinner.stop();
        return result;
      } catch (taskError) {
        spinner.fail(message);
        throw taskError;
      }
    },
  };
}
