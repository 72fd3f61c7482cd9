import { copyFile, mkdir, mkdtemp, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { CipherArchiveError } from '../errors.js';

/** A decoded entry waiting in the staging directory. */
export type StagedFile = {
  tempPath: string;
  finalPath: string;
  relativePath: string;
};

/** Per-run directory holding decoded files until they are committed. */
export class StagingArea {
  readonly files: StagedFile[] = [];
  private counter = 0;

  private constructor(readonly dir: string) {}

  static async create(parentDir: string): Promise<StagingArea> {
    await mkdir(parentDir, { recursive: true });
    return new StagingArea(await mkdtemp(path.join(parentDir, 'cipherpack-')));
  }

  /** Reserve a fresh temp path for `relativePath`, destined for `finalPath`. */
  allocate(relativePath: string, finalPath: string): StagedFile {
    this.counter += 1;
    const staged = {
      tempPath: path.join(this.dir, `entry-${this.counter}.bin`),
      finalPath,
      relativePath
    };
    this.files.push(staged);
    return staged;
  }

  /** Delete every staged file and the staging directory. */
  async dispose(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true });
  }
}

/**
 * Map an archive path onto `baseDir`, rejecting absolute paths, `..` segments
 * and anything else that would land outside it.
 */
export function resolveEntryPath(baseDir: string, entryName: string): string {
  if (entryName.includes('\u0000')) {
    throw new CipherArchiveError('ARCHIVE_PATH_TRAVERSAL', 'Entry path contains NUL', { entryName });
  }
  const normalized = entryName.replace(/\\/g, '/');
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    throw new CipherArchiveError('ARCHIVE_PATH_TRAVERSAL', 'Absolute entry paths are not allowed', { entryName });
  }
  const parts = normalized.split('/').filter((part) => part.length > 0 && part !== '.');
  if (parts.length === 0) {
    throw new CipherArchiveError('ARCHIVE_BAD_HEADER', 'Entry path is empty', { entryName });
  }
  if (parts.some((part) => part === '..')) {
    throw new CipherArchiveError('ARCHIVE_PATH_TRAVERSAL', 'Path traversal detected in entry path', { entryName });
  }
  const baseResolved = path.resolve(baseDir);
  const resolved = path.resolve(baseResolved, ...parts);
  if (!resolved.startsWith(baseResolved + path.sep)) {
    throw new CipherArchiveError('ARCHIVE_PATH_TRAVERSAL', 'Entry path escapes destination directory', { entryName });
  }
  return resolved;
}

/** Move a staged file into place, replacing whatever file is there. */
export async function commitStagedFile(staged: StagedFile): Promise<void> {
  await mkdir(path.dirname(staged.finalPath), { recursive: true });
  await rm(staged.finalPath, { force: true });
  await moveFile(staged.tempPath, staged.finalPath);
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    if (!isCrossDeviceError(err)) throw err;
    await copyFile(from, to);
    await rm(from, { force: true });
  }
}

function isCrossDeviceError(err: unknown): boolean {
  return !!err && typeof err === 'object' && 'code' in err && err.code === 'EXDEV';
}
