import { InvalidArgumentError, type Command } from 'commander';
import type { ArchiveSettings } from '../../config.js';
import type { Logger } from '../../logger.js';
import { decrypt, encrypt, type RunOptions } from '../../operation/run.js';
import { createPrinter } from '../console.js';

type ArchiveCommandOptions = {
  key: string;
  filter?: string;
  recurse: boolean;
  removeOriginals?: boolean;
  bufferSize?: number;
  compressionLevel?: number;
};

export type LoggerFactory = (command: Command) => Logger;

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/** Register `encrypt` and `decrypt`; each exits with code 1 when its operation fails. */
export function registerArchiveCommands(program: Command, loggerFor: LoggerFactory): void {
  addArchiveOptions(
    program
      .command('encrypt')
      .description('Encrypt and compress a file or directory into one archive file')
      .argument('<target>', 'file or directory to encrypt')
      .argument('<destination>', 'archive file to create, with an extension')
  ).action(async (target: string, destination: string, opts: ArchiveCommandOptions, command: Command) => {
    await runArchiveCommand(encrypt, toRunOptions(target, destination, opts, loggerFor(command)));
  });

  addArchiveOptions(
    program
      .command('decrypt')
      .description('Decrypt an archive file into a directory')
      .argument('<archive>', 'archive file to decrypt')
      .argument('<destination>', 'directory to extract into, without an extension')
  ).action(async (archive: string, destination: string, opts: ArchiveCommandOptions, command: Command) => {
    await runArchiveCommand(decrypt, toRunOptions(archive, destination, opts, loggerFor(command)));
  });
}

function addArchiveOptions(command: Command): Command {
  return command
    .requiredOption('-k, --key <key>', 'cipher passphrase; files cannot be recovered without it')
    .option('-f, --filter <glob>', 'only include files whose name matches the glob')
    .option('--no-recurse', 'ignore files in subdirectories')
    .option('--remove-originals', 'delete the target after a successful run')
    .option('--buffer-size <bytes>', 'working buffer size in bytes', parseIntegerOption)
    .option('--compression-level <level>', 'gzip level 0-9', parseIntegerOption);
}

function toRunOptions(target: string, destination: string, opts: ArchiveCommandOptions, logger: Logger): RunOptions {
  const settings: ArchiveSettings = {
    ...(opts.bufferSize !== undefined ? { bufferSize: opts.bufferSize } : {}),
    ...(opts.compressionLevel !== undefined ? { compressionLevel: opts.compressionLevel } : {})
  };
  return {
    key: opts.key,
    targetPath: target,
    destinationPath: destination,
    recurse: opts.recurse,
    removeOriginals: opts.removeOriginals ?? false,
    settings,
    logger,
    ...(opts.filter !== undefined ? { filter: opts.filter } : {})
  };
}

async function runArchiveCommand(run: (options: RunOptions) => Promise<boolean>, options: RunOptions): Promise<void> {
  const print = createPrinter(process.stdout);
  const ok = await run({ ...options, onMessage: print });
  if (!ok) {
    print({ level: 'error', text: 'Operation failed' });
    process.exitCode = 1;
    return;
  }
  print({ level: 'info', text: 'Operation complete' });
}
