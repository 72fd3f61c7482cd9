import { open } from 'node:fs/promises';
import { CODE_UNIT_BYTES, encodeInt32BE, encodeInt64BE, writeCodeUnitBE } from '../binary.js';
import type { KeyStream } from '../crypto/keyStream.js';
import { CipherArchiveError } from '../errors.js';
import type { FileDescriptor } from '../fileSet.js';
import type { Sink } from './Sink.js';

/**
 * Encrypts archive fields into a sink. All fields share one keystream, so the
 * call order here is the wire order.
 */
export class EntryEncoder {
  private readonly buffer: Uint8Array;

  constructor(
    private readonly sink: Sink,
    private readonly key: KeyStream,
    bufferSize: number
  ) {
    this.buffer = new Uint8Array(Math.max(CODE_UNIT_BYTES, bufferSize - (bufferSize % CODE_UNIT_BYTES)));
  }

  async writeInt32(value: number): Promise<void> {
    await this.writeEncrypted(encodeInt32BE(value));
  }

  async writeInt64(value: bigint): Promise<void> {
    await this.writeEncrypted(encodeInt64BE(value));
  }

  /** Write the code-unit count followed by the big-endian code units. */
  async writePath(relativePath: string): Promise<void> {
    await this.writeInt32(relativePath.length);
    let used = 0;
    for (let i = 0; i < relativePath.length; i += 1) {
      if (used + CODE_UNIT_BYTES > this.buffer.length) {
        await this.flush(used);
        used = 0;
      }
      writeCodeUnitBE(this.buffer, used, relativePath.charCodeAt(i));
      used += CODE_UNIT_BYTES;
    }
    await this.flush(used);
  }

  /** Stream exactly `file.size` bytes of the file's content. */
  async writeContent(file: FileDescriptor): Promise<void> {
    const handle = await open(file.path, 'r');
    try {
      let position = 0;
      while (position < file.size) {
        const want = Math.min(this.buffer.length, file.size - position);
        const { bytesRead } = await handle.read(this.buffer, 0, want, position);
        if (bytesRead === 0) {
          throw new CipherArchiveError(
            'ARCHIVE_IO_FAILURE',
            `'${file.path}' ended after ${position} of ${file.size} bytes`,
            { entryName: file.relativePath }
          );
        }
        await this.flush(bytesRead);
        position += bytesRead;
      }
    } finally {
      await handle.close();
    }
  }

  private async flush(count: number): Promise<void> {
    if (count === 0) return;
    await this.writeEncrypted(this.buffer.slice(0, count));
  }

  private async writeEncrypted(bytes: Uint8Array): Promise<void> {
    this.key.encrypt(bytes);
    await this.sink.write(bytes);
  }
}

/** Write one complete entry: path, declared length, then content. */
export async function writeEntry(encoder: EntryEncoder, file: FileDescriptor): Promise<void> {
  await encoder.writePath(file.relativePath);
  await encoder.writeInt64(BigInt(file.size));
  await encoder.writeContent(file);
}
