import { isGzipError, isTruncatedGzipError } from '../compression/gzip.js';
import { CipherArchiveError } from '../errors.js';
import { WRONG_KEY_HINT } from './entryReader.js';

const EMPTY = new Uint8Array(0);

/** Pull-based reader that hands out exact byte counts from a chunked stream. */
export class ByteSource {
  /** Bytes handed out so far. */
  consumed = 0n;
  private chunk: Uint8Array = EMPTY;
  private offset = 0;
  private ended = false;

  constructor(private readonly reader: ReadableStreamDefaultReader<Uint8Array>) {}

  static fromStream(stream: ReadableStream<Uint8Array>): ByteSource {
    return new ByteSource(stream.getReader());
  }

  /** Read exactly `length` bytes or fail with ARCHIVE_TRUNCATED. */
  async readExact(length: number, label: string): Promise<Uint8Array> {
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const part = await this.readUpTo(length - filled);
      if (!part) {
        throw new CipherArchiveError(
          'ARCHIVE_TRUNCATED',
          `Archive ended while reading ${label}: ${length - filled} of ${length} bytes missing; ${WRONG_KEY_HINT}`,
          { context: { offset: this.consumed.toString() } }
        );
      }
      out.set(part, filled);
      filled += part.length;
    }
    return out;
  }

  /** Next 1..max bytes as a fresh copy, or null at end of stream. */
  async readUpTo(max: number): Promise<Uint8Array | null> {
    if (max <= 0) return EMPTY;
    if (this.offset >= this.chunk.length && !(await this.fill())) return null;
    const take = Math.min(max, this.chunk.length - this.offset);
    const out = this.chunk.slice(this.offset, this.offset + take);
    this.offset += take;
    this.consumed += BigInt(take);
    return out;
  }

  async close(): Promise<void> {
    if (!this.ended) {
      this.ended = true;
      await this.reader.cancel().catch(() => undefined);
    }
    this.reader.releaseLock();
  }

  private async fill(): Promise<boolean> {
    while (!this.ended) {
      const result = await this.reader.read().catch((err: unknown) => {
        this.ended = true;
        throw mapStreamError(err, this.consumed);
      });
      if (result.done) {
        this.ended = true;
        return false;
      }
      if (result.value.length === 0) continue;
      this.chunk = result.value;
      this.offset = 0;
      return true;
    }
    return false;
  }
}

function mapStreamError(err: unknown, consumed: bigint): unknown {
  const context = { offset: consumed.toString() };
  if (isTruncatedGzipError(err)) {
    return new CipherArchiveError('ARCHIVE_TRUNCATED', 'Compressed archive stream ended unexpectedly', {
      context,
      cause: err
    });
  }
  if (isGzipError(err)) {
    return new CipherArchiveError('ARCHIVE_CORRUPT', 'Archive is not a valid compressed stream', {
      context,
      cause: err
    });
  }
  return err;
}
