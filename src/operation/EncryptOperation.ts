import type { KeyStream } from '../crypto/keyStream.js';
import { resolveFileSet, type FileSet } from '../fileSet.js';
import { writeArchive } from '../writer/ArchiveWriter.js';
import { ArchiveOperation, type IdentifyResult, type OperationOptions, type OperationResult } from './ArchiveOperation.js';

/** Packs a file or directory into one archive file. */
export class EncryptOperation extends ArchiveOperation {
  readonly kind = 'encrypt';
  private fileSet: FileSet | undefined;

  constructor(options: OperationOptions) {
    super(options);
  }

  protected async identifyInputs(): Promise<IdentifyResult> {
    const resolved = await resolveFileSet(this.options.targetPath, {
      recurse: this.options.recurse ?? true,
      ...(this.options.filter !== undefined ? { filter: this.options.filter } : {})
    });
    if (!resolved.ok) return resolved;
    this.fileSet = { root: resolved.root, files: resolved.files };
    return { ok: true, files: resolved.files.length };
  }

  protected async execute(key: KeyStream): Promise<OperationResult> {
    const fileSet = this.fileSet ?? { root: '', files: [] };
    const result = await writeArchive(fileSet, key, this.options.destinationPath, {
      reporter: this.channel,
      logger: this.logger,
      ...(this.options.settings ? { settings: this.options.settings } : {})
    });
    return {
      kind: this.kind,
      success: result.success,
      files: result.entries,
      ...(result.error ? { error: result.error } : {})
    };
  }
}
