import chalk from 'chalk';
import type { LogType } from '../types';

const chalkColors: Record<Exclude<LogType, 'raw'>, (text: string) => string> =
  {
    error: chalk.red,
    info: chalk.white,
    warn: chalk.yellow,
    success: chalk.green,
    notice: chalk.blue,
    debug: chalk.gray,
  };

/**
 * Colorize text for terminal output
 */
export function colorize(type: Exclude<LogType, 'raw'>, text: string): string {
  return chalkColors[type](text);
}
