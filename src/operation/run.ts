import { rm } from 'node:fs/promises';
import { describeError } from '../errors.js';
import type { LogMessage } from '../progress/ProgressChannel.js';
import type { ArchiveOperation, OperationOptions } from './ArchiveOperation.js';
import { DecryptOperation } from './DecryptOperation.js';
import { EncryptOperation } from './EncryptOperation.js';
import { monitorOperation } from './monitor.js';
import { prepareDecryptPaths, prepareEncryptPaths, type PathCheck } from './paths.js';

export type RunOptions = OperationOptions & {
  /** Delete the target once the operation succeeds. */
  removeOriginals?: boolean;
  /** Receives progress lines and operation messages. Defaults to dropping them. */
  onMessage?: (message: LogMessage) => void;
};

/** Pack `targetPath` into the archive file `destinationPath`. */
export async function encrypt(options: RunOptions): Promise<boolean> {
  return run(options, prepareEncryptPaths, new EncryptOperation(options));
}

/** Unpack the archive `targetPath` into the directory `destinationPath`. */
export async function decrypt(options: RunOptions): Promise<boolean> {
  return run(options, prepareDecryptPaths, new DecryptOperation(options));
}

async function run(
  options: RunOptions,
  prepare: (targetPath: string, destinationPath: string) => Promise<PathCheck>,
  operation: ArchiveOperation
): Promise<boolean> {
  const onMessage = options.onMessage ?? (() => undefined);
  let check: PathCheck;
  try {
    check = await prepare(options.targetPath, options.destinationPath);
  } catch (err) {
    onMessage({ level: 'error', text: `Unable to prepare paths: ${describeError(err)}` });
    return false;
  }
  if (!check.ok) {
    onMessage({ level: 'error', text: check.error.message });
    return false;
  }

  const result = await monitorOperation(operation, {
    onMessage,
    ...(options.settings?.pollIntervalMs !== undefined ? { pollIntervalMs: options.settings.pollIntervalMs } : {})
  });

  if (!options.removeOriginals) return result.success;
  if (!result.success) {
    onMessage({ level: 'error', text: 'Operation failed, not removing original files' });
  } else {
    try {
      await rm(options.targetPath, { recursive: true, force: true });
      onMessage({ level: 'info', text: `Removed original '${options.targetPath}'` });
    } catch (err) {
      onMessage({ level: 'error', text: `Failed to remove original '${options.targetPath}': ${describeError(err)}` });
    }
  }
  return result.success;
}
