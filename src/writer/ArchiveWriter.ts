import { rm } from 'node:fs/promises';
import { resolveSettings, type ArchiveSettings } from '../config.js';
import type { KeyStream } from '../crypto/keyStream.js';
import { CipherArchiveError, describeError, toCipherArchiveError } from '../errors.js';
import type { FileSet } from '../fileSet.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ProgressReporter } from '../progress/ProgressChannel.js';
import { EntryEncoder, writeEntry } from './entryWriter.js';
import { GzipFileSink } from './Sink.js';

export type ArchiveWriteOptions = {
  reporter: ProgressReporter;
  settings?: ArchiveSettings;
  logger?: Logger;
};

export type ArchiveWriteResult = {
  success: boolean;
  /** Entries fully written before the run ended. */
  entries: number;
  /** Uncompressed bytes handed to the compressor. */
  bytesWritten: bigint;
  error?: CipherArchiveError;
};

/**
 * Pack every file of `fileSet` into `destinationPath`.
 *
 * Layout: encrypted int32 entry count, then per file the encrypted path,
 * int64 length and content, all inside one gzip stream. The first failing file
 * stops the run; the partial archive is then deleted. Completion is reported to
 * `options.reporter` before returning.
 */
export async function writeArchive(
  fileSet: FileSet,
  key: KeyStream,
  destinationPath: string,
  options: ArchiveWriteOptions
): Promise<ArchiveWriteResult> {
  const { reporter } = options;
  const logger = (options.logger ?? silentLogger).child({ component: 'archive-writer' });
  const files = fileSet.files;
  if (files.length === 0) {
    const error = new CipherArchiveError('ARCHIVE_NO_FILES', 'No files were identified for packing');
    reporter.log(error.message, 'error');
    reporter.finish(false);
    return { success: false, entries: 0, bytesWritten: 0n, error };
  }

  const settings = resolveSettings(options.settings);
  const share = 1 / files.length;
  let entries = 0;
  let error: CipherArchiveError | undefined;
  let sink: GzipFileSink | undefined;

  try {
    sink = await GzipFileSink.open(destinationPath, settings.compressionLevel);
    const encoder = new EntryEncoder(sink, key, settings.bufferSize);
    await encoder.writeInt32(files.length);

    for (const file of files) {
      try {
        await writeEntry(encoder, file);
      } catch (err) {
        error = toCipherArchiveError(err, 'ARCHIVE_IO_FAILURE', `Failed to pack '${file.path}'`, file.relativePath);
        reporter.log(error.message, 'error');
        break;
      }
      entries += 1;
      reporter.advance(share);
      logger.debug({ entry: file.relativePath, size: file.size }, 'entry written');
    }

    if (!error) await sink.close();
  } catch (err) {
    error = toCipherArchiveError(err, 'ARCHIVE_IO_FAILURE', 'Unexpected error while writing the archive');
    reporter.log(`Unable to complete the archive: ${error.message}`, 'error');
  }

  const bytesWritten = sink?.position ?? 0n;
  if (error) {
    await sink?.abort(error);
    try {
      await rm(destinationPath, { force: true });
    } catch (err) {
      reporter.log(`Failed to remove partial archive '${destinationPath}': ${describeError(err)}`, 'error');
    }
    logger.warn({ err: error, entries }, 'archive write failed');
  } else {
    logger.info({ entries, bytesWritten: bytesWritten.toString() }, 'archive written');
  }

  reporter.finish(!error);
  return error ? { success: false, entries, bytesWritten, error } : { success: true, entries, bytesWritten };
}
