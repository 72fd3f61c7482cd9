import type { ArchiveSettings } from '../config.js';
import type { Logger } from '../logger.js';
import { decrypt, encrypt, type RunOptions } from '../operation/run.js';
import type { Printer } from './console.js';

/** Values the interactive commands assign and the operations read. */
export type SessionSettings = {
  cipherKey: string;
  targetPath: string;
  destinationPath: string;
  removeOriginals: boolean;
  includeSubDirectories: boolean;
  filter: string;
};

export type SessionRunner = {
  encrypt(options: RunOptions): Promise<boolean>;
  decrypt(options: RunOptions): Promise<boolean>;
};

export type SessionOptions = {
  print: Printer;
  runner?: SessionRunner;
  logger?: Logger;
  archiveSettings?: ArchiveSettings;
};

type SessionCommand = {
  name: string;
  description: string;
  example: string;
  run(session: Session, argument: string): void | Promise<void>;
};

export const DEFAULT_SESSION_SETTINGS: Readonly<SessionSettings> = Object.freeze({
  cipherKey: '',
  targetPath: '',
  destinationPath: '',
  removeOriginals: false,
  includeSubDirectories: true,
  filter: '*'
});

const COMMANDS: readonly SessionCommand[] = [
  {
    name: '-cipherKey',
    description:
      'Set the phrase used to encrypt or decrypt file data. Encrypted files cannot be recovered without it',
    example: '-cipherKey phrase',
    run: (session, argument) => {
      session.settings.cipherKey = argument;
    }
  },
  {
    name: '-targetPath',
    description: 'The file or directory to encrypt, or the archive to decrypt',
    example: '-targetPath filepath',
    run: (session, argument) => {
      session.settings.targetPath = argument;
    }
  },
  {
    name: '-destinationPath',
    description: 'The archive file to create when encrypting, or the directory to decrypt into',
    example: '-destinationPath filepath',
    run: (session, argument) => {
      session.settings.destinationPath = argument;
    }
  },
  {
    name: '-removeOriginals',
    description: 'Delete the target once an operation succeeds. Defaults to false',
    example: '-removeOriginals (true/false)',
    run: (session, argument) => session.setFlag('-removeOriginals', 'removeOriginals', argument)
  },
  {
    name: '-includeSubDirectories',
    description: 'Include the contents of subdirectories of a directory target. Defaults to true',
    example: '-includeSubDirectories (true/false)',
    run: (session, argument) => session.setFlag('-includeSubDirectories', 'includeSubDirectories', argument)
  },
  {
    name: '-filter',
    description: 'Glob matched against file names, such as *.txt. Defaults to *',
    example: '-filter *.txt',
    run: (session, argument) => {
      session.settings.filter = argument === '' ? DEFAULT_SESSION_SETTINGS.filter : argument;
    }
  },
  {
    name: '-encrypt',
    description: 'Begin an encryption operation with the current settings',
    example: '-encrypt',
    run: (session) => session.runOperation('encrypt')
  },
  {
    name: '-decrypt',
    description: 'Begin a decryption operation with the current settings',
    example: '-decrypt',
    run: (session) => session.runOperation('decrypt')
  },
  {
    name: '-help',
    description: 'Display the available commands',
    example: '-help',
    run: (session) => session.printHelp()
  },
  {
    name: '-exit',
    description: 'Close the session',
    example: '-exit',
    run: (session) => {
      session.exited = true;
    }
  }
];

const COMMAND_TABLE: ReadonlyMap<string, SessionCommand> = new Map(
  COMMANDS.map((command) => [command.name.toLowerCase(), command])
);

/** Names of the commands a session understands, in help order. */
export function sessionCommandNames(): string[] {
  return COMMANDS.map((command) => command.name);
}

/**
 * Group startup arguments into command lines. A new line starts at every
 * token beginning with `-`; other tokens join the current line.
 */
export function splitCommandQueue(args: readonly string[]): string[] {
  const queue: string[] = [];
  let buffer = '';
  for (const arg of args) {
    if (arg.startsWith('-')) {
      if (buffer !== '') queue.push(buffer);
      buffer = arg;
    } else {
      buffer += ` ${arg}`;
    }
  }
  if (buffer !== '') queue.push(buffer);
  return queue;
}

/** `true`/`false` in any case, surrounding whitespace ignored. */
export function parseBool(text: string): boolean | undefined {
  const value = text.trim().toLowerCase();
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

/** Interprets command lines against a mutable set of {@link SessionSettings}. */
export class Session {
  readonly settings: SessionSettings = { ...DEFAULT_SESSION_SETTINGS };
  exited = false;
  private readonly runner: SessionRunner;

  constructor(private readonly options: SessionOptions) {
    this.runner = options.runner ?? { encrypt, decrypt };
  }

  /** Run one command line. Blank lines do nothing. */
  async execute(line: string): Promise<void> {
    const trimmed = line.trim();
    if (trimmed === '') return;
    const space = trimmed.search(/\s/);
    const name = (space < 0 ? trimmed : trimmed.slice(0, space)).toLowerCase();
    const argument = space < 0 ? '' : trimmed.slice(space + 1).trim();
    const command = COMMAND_TABLE.get(name);
    if (!command) {
      this.print('error', `Unknown command '${line}', use '-help' to see available options`);
      return;
    }
    await command.run(this, argument);
  }

  setFlag(name: string, field: 'removeOriginals' | 'includeSubDirectories', argument: string): void {
    const value = parseBool(argument);
    if (value === undefined) {
      this.print('error', `Unable to parse '${argument}' as a boolean value (true/false) for '${name}'`);
      return;
    }
    this.settings[field] = value;
  }

  async runOperation(kind: 'encrypt' | 'decrypt'): Promise<void> {
    const { settings } = this;
    const options: RunOptions = {
      key: settings.cipherKey,
      targetPath: settings.targetPath,
      destinationPath: settings.destinationPath,
      recurse: settings.includeSubDirectories,
      filter: settings.filter,
      removeOriginals: settings.removeOriginals,
      onMessage: this.options.print,
      ...(this.options.logger ? { logger: this.options.logger } : {}),
      ...(this.options.archiveSettings ? { settings: this.options.archiveSettings } : {})
    };
    const ok = await this.runner[kind](options);
    this.print(ok ? 'info' : 'error', ok ? `${capitalize(kind)} succeeded` : `${capitalize(kind)} failed`);
  }

  printHelp(): void {
    this.print('info', 'Available commands:');
    for (const command of COMMANDS) {
      this.print('info', `  ${command.name}\n      ${command.description}\n      e.g. ${command.example}`);
    }
  }

  private print(level: 'info' | 'error', text: string): void {
    this.options.print({ level, text });
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
