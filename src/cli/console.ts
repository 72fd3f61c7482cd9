import chalk from 'chalk';
import type { LogMessage } from '../progress/ProgressChannel.js';

export type Output = {
  write(chunk: string): unknown;
};

export type Printer = (message: LogMessage) => void;

/** Prints operation messages one per line, errors in red. */
export function createPrinter(out: Output): Printer {
  return (message) => {
    out.write(`${message.level === 'error' ? chalk.red(message.text) : message.text}\n`);
  };
}
