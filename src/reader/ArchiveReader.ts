import { createReadStream } from 'node:fs';
import path from 'node:path';
import { createGzipDecompressor } from '../compression/gzip.js';
import { resolveSettings, type ArchiveSettings } from '../config.js';
import type { KeyStream } from '../crypto/keyStream.js';
import { describeError, toCipherArchiveError, type CipherArchiveError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ProgressReporter } from '../progress/ProgressChannel.js';
import { toWebReadable } from '../streams/adapters.js';
import { FileSink } from '../writer/Sink.js';
import { ByteSource } from './ByteSource.js';
import { EntryDecoder, type EntryHeader } from './entryReader.js';
import { StagingArea, commitStagedFile, resolveEntryPath } from './staging.js';

/** Share of the progress bar spent decoding; the rest covers relocation. */
const DECODE_SHARE = 0.75;
const RELOCATE_SHARE = 0.25;

export type ArchiveReadOptions = {
  reporter: ProgressReporter;
  settings?: ArchiveSettings;
  logger?: Logger;
};

export type ArchiveReadResult = {
  success: boolean;
  /** Entries decoded from the stream. */
  entries: number;
  /** Relative paths committed to the destination. */
  extracted: string[];
  /** Relative paths whose relocation failed. */
  failed: string[];
  error?: CipherArchiveError;
};

/**
 * Unpack `archivePath` into `destinationRoot`.
 *
 * Entries are decoded into a private staging directory first. Only when the
 * whole stream decodes cleanly are staged files moved into place; a decode
 * failure leaves the destination untouched. A failed move is logged and the
 * remaining files are still moved. Completion is reported to `options.reporter`
 * before returning.
 */
export async function readArchive(
  archivePath: string,
  key: KeyStream,
  destinationRoot: string,
  options: ArchiveReadOptions
): Promise<ArchiveReadResult> {
  const { reporter } = options;
  const logger = (options.logger ?? silentLogger).child({ component: 'archive-reader' });
  const settings = resolveSettings(options.settings);
  const destination = path.resolve(destinationRoot);

  let staging: StagingArea | undefined;
  let source: ByteSource | undefined;
  let error: CipherArchiveError | undefined;
  let entries = 0;
  const extracted: string[] = [];
  const failed: string[] = [];

  try {
    staging = await StagingArea.create(settings.stagingDir);
    const compressed = toWebReadable(createReadStream(archivePath, { highWaterMark: settings.bufferSize }));
    source = ByteSource.fromStream(compressed.pipeThrough(createGzipDecompressor()));
    const decoder = new EntryDecoder(source, key);

    const count = await decoder.readEntryCount();
    const share = count > 0 ? DECODE_SHARE / count : 0;
    logger.debug({ count }, 'archive header decoded');

    for (let i = 0; i < count; i += 1) {
      const header = await decoder.readHeader(settings.maxPathLength);
      const finalPath = resolveEntryPath(destination, header.relativePath);
      try {
        await decodeEntry(decoder, header, staging, finalPath, settings.bufferSize);
      } catch (err) {
        error = toCipherArchiveError(err, 'ARCHIVE_IO_FAILURE', `Failed to decode '${header.relativePath}'`, header.relativePath);
        reporter.log(error.message, 'error');
        break;
      }
      entries += 1;
      reporter.advance(share);
    }
  } catch (err) {
    error = toCipherArchiveError(err, 'ARCHIVE_IO_FAILURE', 'Unexpected error while reading the archive');
    reporter.log(`Unable to decode the archive: ${error.message}`, 'error');
  } finally {
    await source?.close();
  }

  if (!error && staging) {
    const share = staging.files.length > 0 ? RELOCATE_SHARE / staging.files.length : 0;
    for (const staged of staging.files) {
      try {
        await commitStagedFile(staged);
        extracted.push(staged.relativePath);
        reporter.advance(share);
      } catch (err) {
        failed.push(staged.relativePath);
        reporter.log(`Failed to move decoded file to '${staged.finalPath}': ${describeError(err)}`, 'error');
      }
    }
  }

  if (staging) {
    try {
      await staging.dispose();
    } catch (err) {
      reporter.log(`Failed to clean up staging directory '${staging.dir}': ${describeError(err)}`, 'error');
    }
  }

  const success = !error && failed.length === 0;
  if (success) {
    logger.info({ entries, extracted: extracted.length }, 'archive extracted');
  } else {
    logger.warn({ err: error, entries, failed }, 'archive extraction failed');
  }
  reporter.finish(success);
  return error ? { success, entries, extracted, failed, error } : { success, entries, extracted, failed };
}

async function decodeEntry(
  decoder: EntryDecoder,
  header: EntryHeader,
  staging: StagingArea,
  finalPath: string,
  chunkSize: number
): Promise<void> {
  const staged = staging.allocate(header.relativePath, finalPath);
  const sink = await FileSink.open(staged.tempPath);
  try {
    await decoder.copyContent(header, sink, chunkSize);
  } finally {
    await sink.close();
  }
}
