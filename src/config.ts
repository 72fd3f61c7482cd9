import { tmpdir } from 'node:os';
import { CipherArchiveError } from './errors.js';

/** Tunables shared by archive writers, readers and the operation monitor. */
export type ArchiveSettings = {
  /** Working buffer size for file content and path code units, in bytes. */
  bufferSize?: number;
  /** Delay between monitor polls, in milliseconds. */
  pollIntervalMs?: number;
  /** gzip level applied to the encrypted stream (0-9). */
  compressionLevel?: number;
  /** Largest relative path, in UTF-16 code units, a reader accepts. */
  maxPathLength?: number;
  /** Directory under which per-run staging directories are created. */
  stagingDir?: string;
};

const DEFAULT_SETTINGS = Object.freeze({
  bufferSize: 64 * 1024,
  pollIntervalMs: 100,
  compressionLevel: 6,
  maxPathLength: 32767,
  stagingDir: tmpdir()
} satisfies Required<ArchiveSettings>);

export const DEFAULT_ARCHIVE_SETTINGS: Readonly<Required<ArchiveSettings>> = DEFAULT_SETTINGS;

/** Fill in defaults and reject values outside their supported ranges. */
export function resolveSettings(settings?: ArchiveSettings): Required<ArchiveSettings> {
  const resolved: Required<ArchiveSettings> = {
    bufferSize: settings?.bufferSize ?? DEFAULT_SETTINGS.bufferSize,
    pollIntervalMs: settings?.pollIntervalMs ?? DEFAULT_SETTINGS.pollIntervalMs,
    compressionLevel: settings?.compressionLevel ?? DEFAULT_SETTINGS.compressionLevel,
    maxPathLength: settings?.maxPathLength ?? DEFAULT_SETTINGS.maxPathLength,
    stagingDir: settings?.stagingDir ?? DEFAULT_SETTINGS.stagingDir
  };
  requireInteger('bufferSize', resolved.bufferSize, 2, 0x7fffffff);
  requireInteger('pollIntervalMs', resolved.pollIntervalMs, 0, 60_000);
  requireInteger('compressionLevel', resolved.compressionLevel, 0, 9);
  requireInteger('maxPathLength', resolved.maxPathLength, 1, 0x7fffffff);
  if (resolved.stagingDir.length === 0) {
    throw new CipherArchiveError('ARCHIVE_INVALID_SETTINGS', 'stagingDir must not be empty', {
      context: { setting: 'stagingDir' }
    });
  }
  return resolved;
}

function requireInteger(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new CipherArchiveError('ARCHIVE_INVALID_SETTINGS', `${name} must be an integer in [${min}, ${max}], got ${value}`, {
      context: { setting: name, value: String(value) }
    });
  }
}
