import type { Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { minimatch } from 'minimatch';
import { CipherArchiveError, toCipherArchiveError } from './errors.js';

/** A file picked up by {@link resolveFileSet}. */
export type FileDescriptor = {
  /** Absolute path on disk. */
  path: string;
  /** Size in bytes at identification time. */
  size: number;
  /** Path below the resolution root, `/`-separated. */
  relativePath: string;
};

export type FileSet = {
  /** The target directory, or the parent of a single-file target. */
  root: string;
  files: FileDescriptor[];
};

export type FileSetResult = ({ ok: true } & FileSet) | { ok: false; error: CipherArchiveError };

export type FileSetOptions = {
  recurse?: boolean;
  /** Glob matched against file base names; `*`, `*.*` and `` select everything. */
  filter?: string;
};

/** Build a base-name predicate for an extension filter. */
export function createNameFilter(filter: string | undefined): (name: string) => boolean {
  const pattern = filter?.trim() ?? '';
  if (pattern === '' || pattern === '*' || pattern === '*.*') {
    return () => true;
  }
  return (name) => minimatch(name, pattern, { dot: true, nocase: process.platform === 'win32' });
}

/**
 * Resolve a file or directory into an ordered list of files.
 *
 * Directory entries keep listing order; a directory's own files come before the
 * contents of its subdirectories. Symlinks to regular files are packed as the
 * files they point at; symlinked directories are not followed.
 */
export async function resolveFileSet(target: string, options?: FileSetOptions): Promise<FileSetResult> {
  const absolute = path.resolve(target);
  let stats: Stats;
  try {
    stats = await stat(absolute);
  } catch (err) {
    return {
      ok: false,
      error: new CipherArchiveError('ARCHIVE_PATH_NOT_FOUND', `No file or directory exists at '${target}'`, {
        cause: err
      })
    };
  }

  if (stats.isFile()) {
    return {
      ok: true,
      root: path.dirname(absolute),
      files: [{ path: absolute, size: stats.size, relativePath: path.basename(absolute) }]
    };
  }
  if (!stats.isDirectory()) {
    return {
      ok: false,
      error: new CipherArchiveError('ARCHIVE_INVALID_TARGET', `'${target}' is neither a file nor a directory`)
    };
  }

  const files: FileDescriptor[] = [];
  try {
    await collect(absolute, absolute, createNameFilter(options?.filter), options?.recurse ?? true, files);
  } catch (err) {
    return { ok: false, error: toCipherArchiveError(err, 'ARCHIVE_IO_FAILURE', `Failed to list '${target}'`) };
  }
  if (files.length === 0) {
    return {
      ok: false,
      error: new CipherArchiveError('ARCHIVE_NO_FILES', `No files matching '${options?.filter ?? '*'}' under '${target}'`)
    };
  }
  return { ok: true, root: absolute, files };
}

async function collect(
  root: string,
  dir: string,
  matches: (name: string) => boolean,
  recurse: boolean,
  out: FileDescriptor[]
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  const subdirs: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recurse) subdirs.push(full);
      continue;
    }
    if (!(entry.isFile() || entry.isSymbolicLink()) || !matches(entry.name)) continue;
    const stats = entry.isSymbolicLink() ? await linkedFileStats(full) : await stat(full);
    if (!stats) continue;
    out.push({ path: full, size: stats.size, relativePath: toArchivePath(root, full) });
  }
  for (const sub of subdirs) {
    await collect(root, sub, matches, recurse, out);
  }
}

/** Stats of the regular file a symlink points at; undefined for dangling or non-file links. */
async function linkedFileStats(link: string): Promise<Stats | undefined> {
  try {
    const stats = await stat(link);
    return stats.isFile() ? stats : undefined;
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && (err.code === 'ENOENT' || err.code === 'ELOOP')) {
      return undefined;
    }
    throw err;
  }
}

function toArchivePath(root: string, file: string): string {
  return path.relative(root, file).split(path.sep).join('/');
}
