import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import type { KeyStream } from '../crypto/keyStream.js';
import { CipherArchiveError } from '../errors.js';
import { readArchive } from '../reader/ArchiveReader.js';
import { ArchiveOperation, type IdentifyResult, type OperationOptions, type OperationResult } from './ArchiveOperation.js';

/** Unpacks one archive file into a destination directory. */
export class DecryptOperation extends ArchiveOperation {
  readonly kind = 'decrypt';
  private archivePath: string | undefined;

  constructor(options: OperationOptions) {
    super(options);
  }

  protected async identifyInputs(): Promise<IdentifyResult> {
    const absolute = path.resolve(this.options.targetPath);
    let stats: Stats;
    try {
      stats = await stat(absolute);
    } catch (err) {
      return {
        ok: false,
        error: new CipherArchiveError('ARCHIVE_PATH_NOT_FOUND', `No archive exists at '${this.options.targetPath}'`, {
          cause: err
        })
      };
    }
    if (!stats.isFile()) {
      return {
        ok: false,
        error: new CipherArchiveError(
          'ARCHIVE_INVALID_TARGET',
          `'${this.options.targetPath}' is not a file; only one archive can be decrypted at a time`
        )
      };
    }
    this.archivePath = absolute;
    return { ok: true, files: 1 };
  }

  protected async execute(key: KeyStream): Promise<OperationResult> {
    const archivePath = this.archivePath ?? path.resolve(this.options.targetPath);
    const result = await readArchive(archivePath, key, this.options.destinationPath, {
      reporter: this.channel,
      logger: this.logger,
      ...(this.options.settings ? { settings: this.options.settings } : {})
    });
    return {
      kind: this.kind,
      success: result.success,
      files: result.extracted.length,
      ...(result.error ? { error: result.error } : {})
    };
  }
}
