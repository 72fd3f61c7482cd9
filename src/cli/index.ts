#!/usr/bin/env node

/**
 * cipherpack CLI: encrypt and decrypt passphrase-protected archives.
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS, createDiagnosticLogger, isLogLevel, type Logger } from '../logger.js';
import { VERSION } from '../version.js';
import { registerArchiveCommands } from './commands/archive.js';
import { registerShellCommand } from './commands/shell.js';

function loggerFor(command: Command): Logger {
  const { logLevel } = command.optsWithGlobals<{ logLevel?: string }>();
  return createDiagnosticLogger(logLevel !== undefined && isLogLevel(logLevel) ? logLevel : 'warn');
}

const program = new Command();

program
  .name('cipherpack')
  .description('Passphrase-encrypted, gzip-compressed file archives')
  .version(VERSION)
  .addOption(
    new Option('--log-level <level>', 'diagnostic log level on stderr')
      .choices([...LOG_LEVELS])
      .default('warn')
      .env('CIPHERPACK_LOG_LEVEL')
  );

registerArchiveCommands(program, loggerFor);
registerShellCommand(program, loggerFor);

await program.parseAsync();
