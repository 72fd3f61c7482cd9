import type { Stats } from 'node:fs';
import { mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { CipherArchiveError } from '../errors.js';

export type PathCheck = { ok: true } | { ok: false; error: CipherArchiveError };

/**
 * Encrypt inputs: the target must exist and the destination must name a file
 * (have an extension). The destination's directory is created.
 */
export async function prepareEncryptPaths(targetPath: string, destinationPath: string): Promise<PathCheck> {
  if (!(await statOrUndefined(targetPath))) {
    return fail('ARCHIVE_PATH_NOT_FOUND', `Target path '${targetPath}' does not exist`);
  }
  if (path.extname(destinationPath) === '') {
    return fail('ARCHIVE_INVALID_TARGET', `Destination '${destinationPath}' must be a file path with an extension`);
  }
  await mkdir(path.dirname(path.resolve(destinationPath)), { recursive: true });
  return { ok: true };
}

/**
 * Decrypt inputs: the target must be a file and the destination must name a
 * directory (no extension). The destination directory is created.
 */
export async function prepareDecryptPaths(targetPath: string, destinationPath: string): Promise<PathCheck> {
  const stats = await statOrUndefined(targetPath);
  if (!stats) {
    return fail('ARCHIVE_PATH_NOT_FOUND', `Archive '${targetPath}' does not exist`);
  }
  if (!stats.isFile()) {
    return fail('ARCHIVE_INVALID_TARGET', `Archive '${targetPath}' is not a file`);
  }
  if (path.extname(destinationPath) !== '') {
    return fail('ARCHIVE_INVALID_TARGET', `Destination '${destinationPath}' must be a directory path without an extension`);
  }
  await mkdir(path.resolve(destinationPath), { recursive: true });
  return { ok: true };
}

async function statOrUndefined(target: string): Promise<Stats | undefined> {
  try {
    return await stat(target);
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  if (!err || typeof err !== 'object' || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

function fail(code: CipherArchiveError['code'], message: string): PathCheck {
  return { ok: false, error: new CipherArchiveError(code, message) };
}
