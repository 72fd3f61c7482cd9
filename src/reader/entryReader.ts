import { CODE_UNIT_BYTES, INT32_BYTES, INT64_BYTES, decodeCodeUnitsBE, readInt32BE, readInt64BE } from '../binary.js';
import type { KeyStream } from '../crypto/keyStream.js';
import { CipherArchiveError } from '../errors.js';
import type { Sink } from '../writer/Sink.js';
import type { ByteSource } from './ByteSource.js';

export const WRONG_KEY_HINT = 'the archive is damaged or the cipher key is wrong';

/** Header fields of one decoded entry. */
export type EntryHeader = {
  relativePath: string;
  size: number;
};

/** Decrypts archive fields in wire order from a decompressed source. */
export class EntryDecoder {
  constructor(
    private readonly source: ByteSource,
    private readonly key: KeyStream
  ) {}

  async readInt32(label: string): Promise<number> {
    return readInt32BE(await this.readDecrypted(INT32_BYTES, label));
  }

  async readInt64(label: string): Promise<bigint> {
    return readInt64BE(await this.readDecrypted(INT64_BYTES, label));
  }

  async readEntryCount(): Promise<number> {
    const count = await this.readInt32('entry count');
    if (count < 0) {
      throw new CipherArchiveError('ARCHIVE_BAD_HEADER', `Invalid entry count ${count}; ${WRONG_KEY_HINT}`);
    }
    return count;
  }

  async readHeader(maxPathLength: number): Promise<EntryHeader> {
    const pathLength = await this.readInt32('entry path length');
    if (pathLength <= 0 || pathLength > maxPathLength) {
      throw new CipherArchiveError('ARCHIVE_BAD_HEADER', `Invalid entry path length ${pathLength}; ${WRONG_KEY_HINT}`);
    }
    const relativePath = decodeCodeUnitsBE(await this.readDecrypted(pathLength * CODE_UNIT_BYTES, 'entry path'));
    const size = await this.readInt64('entry length');
    if (size < 0n || size > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new CipherArchiveError('ARCHIVE_BAD_HEADER', `Invalid entry length ${size}; ${WRONG_KEY_HINT}`, {
        entryName: relativePath
      });
    }
    return { relativePath, size: Number(size) };
  }

  /** Decrypt `header.size` content bytes into `sink`, in chunks of at most `chunkSize`. */
  async copyContent(header: EntryHeader, sink: Sink, chunkSize: number): Promise<void> {
    let remaining = header.size;
    while (remaining > 0) {
      const part = await this.source.readUpTo(Math.min(chunkSize, remaining));
      if (!part) {
        throw new CipherArchiveError(
          'ARCHIVE_TRUNCATED',
          `Archive ended with ${remaining} of ${header.size} bytes of '${header.relativePath}' unread; ${WRONG_KEY_HINT}`,
          { entryName: header.relativePath }
        );
      }
      this.key.decrypt(part);
      await sink.write(part);
      remaining -= part.length;
    }
  }

  private async readDecrypted(length: number, label: string): Promise<Uint8Array> {
    const bytes = await this.source.readExact(length, label);
    this.key.decrypt(bytes);
    return bytes;
  }
}
