import { setTimeout as sleep } from 'node:timers/promises';
import { DEFAULT_ARCHIVE_SETTINGS } from '../config.js';
import type { LogMessage } from '../progress/ProgressChannel.js';
import type { ArchiveOperation, OperationResult } from './ArchiveOperation.js';

export type MonitorOptions = {
  /** Delay between polls, in milliseconds. */
  pollIntervalMs?: number;
  /** Receives progress lines and queued operation messages in order. */
  onMessage: (message: LogMessage) => void;
};

/** `Progress: 42.00%` style line, with two decimals. */
export function formatProgress(progress: number): string {
  return `\tProgress: ${(progress * 100).toFixed(2)}%`;
}

/**
 * Identify, start and poll an operation until it completes and every queued
 * message has been forwarded. Resolves with the operation's own result.
 */
export async function monitorOperation(operation: ArchiveOperation, options: MonitorOptions): Promise<OperationResult> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_ARCHIVE_SETTINGS.pollIntervalMs;
  const channel = operation.channel;

  const identified = await operation.identify();
  if (!identified.ok) {
    for (const message of channel.drain()) options.onMessage(message);
    return { kind: operation.kind, success: false, files: 0, error: identified.error };
  }

  const task = operation.start();
  let reported = 0;
  let complete = false;
  while (!complete || channel.hasMessages) {
    await sleep(pollIntervalMs);
    const snapshot = channel.snapshot();
    complete = snapshot.complete;
    if (snapshot.progress > reported) {
      reported = snapshot.progress;
      options.onMessage({ level: 'info', text: formatProgress(reported) });
    }
    for (const message of channel.drain()) options.onMessage(message);
  }
  return task;
}
