import type { Command } from 'commander';
import { createPrinter } from '../console.js';
import { Session, splitCommandQueue } from '../session.js';
import { runShell } from '../shell.js';
import type { LoggerFactory } from './archive.js';

export function registerShellCommand(program: Command, loggerFor: LoggerFactory): void {
  program
    .command('shell')
    .description('Start an interactive session; commands after -- run before the first prompt')
    .argument('[commands...]', 'startup commands, e.g. -- -cipherKey phrase -targetPath ./docs')
    .action(async (commands: string[], _opts: Record<string, never>, command: Command) => {
      const session = new Session({ print: createPrinter(process.stdout), logger: loggerFor(command) });
      await runShell({
        session,
        queued: splitCommandQueue(commands),
        input: process.stdin,
        output: process.stdout
      });
    });
}
