import { open, type FileHandle } from 'node:fs/promises';
import { createGzipCompressor } from '../compression/gzip.js';
import { toWebWritable } from '../streams/adapters.js';

export interface Sink {
  position: bigint;
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/** A sink whose partial output can be thrown away. */
export interface AbortableSink extends Sink {
  abort(reason: unknown): Promise<void>;
}

/** Writes sequentially into a file through a positioned handle. */
export class FileSink implements Sink {
  position: bigint = 0n;
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly handle: FileHandle
  ) {}

  /** Create (or truncate) `path` and return a sink writing into it. */
  static async open(path: string): Promise<FileSink> {
    return new FileSink(path, await open(path, 'w'));
  }

  async write(chunk: Uint8Array): Promise<void> {
    let written = 0;
    while (written < chunk.length) {
      const { bytesWritten } = await this.handle.write(chunk, written, chunk.length - written, Number(this.position));
      written += bytesWritten;
      this.position += BigInt(bytesWritten);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * gzip-compresses everything written to it into a file. `position` counts the
 * uncompressed bytes accepted so far.
 */
export class GzipFileSink implements AbortableSink {
  position: bigint = 0n;
  private readonly writer: WritableStreamDefaultWriter<Uint8Array>;
  private readonly piping: Promise<void>;
  private settled = false;

  private constructor(readonly path: string, handle: FileHandle, level?: number) {
    const pipe = createGzipCompressor(level);
    this.writer = pipe.writable.getWriter();
    this.piping = pipe.readable.pipeTo(toWebWritable(handle.createWriteStream()));
    // rejection is observed by close() or abort()
    void this.piping.catch(() => undefined);
  }

  /** Create (or truncate) `path` and return a compressing sink writing into it. */
  static async open(path: string, level?: number): Promise<GzipFileSink> {
    return new GzipFileSink(path, await open(path, 'w'), level);
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    await this.writer.write(chunk);
    this.position += BigInt(chunk.length);
  }

  async close(): Promise<void> {
    if (this.settled) return;
    this.settled = true;
    await this.writer.close();
    await this.piping;
  }

  async abort(reason: unknown): Promise<void> {
    if (this.settled) return;
    this.settled = true;
    await this.writer.abort(reason).catch(() => undefined);
    await this.piping.catch(() => undefined);
  }
}
