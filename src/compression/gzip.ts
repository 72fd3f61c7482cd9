import { Duplex } from 'node:stream';
import { createGunzip, createGzip } from 'node:zlib';

/** Writable/readable halves of a byte transform. */
export type BytePipe = {
  readable: ReadableStream<Uint8Array>;
  writable: WritableStream<Uint8Array>;
};

/** zlib error codes raised when a gzip stream ends before its trailer. */
const TRUNCATION_CODES = new Set(['Z_BUF_ERROR']);

function toWebTransform(duplex: Duplex): BytePipe {
  const { readable, writable } = Duplex.toWeb(duplex);
  return {
    readable: readable as ReadableStream<Uint8Array>,
    writable: writable as WritableStream<Uint8Array>
  };
}

export function createGzipCompressor(level?: number): BytePipe {
  return toWebTransform(createGzip(level !== undefined ? { level } : undefined));
}

export function createGzipDecompressor(): BytePipe {
  return toWebTransform(createGunzip());
}

/** True when a zlib failure means the compressed input stopped early. */
export function isTruncatedGzipError(err: unknown): boolean {
  if (!err || typeof err !== 'object' || !('code' in err)) return false;
  return typeof err.code === 'string' && TRUNCATION_CODES.has(err.code);
}

/** True for any error raised by zlib while inflating. */
export function isGzipError(err: unknown): boolean {
  if (!err || typeof err !== 'object' || !('code' in err)) return false;
  return typeof err.code === 'string' && err.code.startsWith('Z_');
}
