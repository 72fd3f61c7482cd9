import type { ArchiveSettings } from '../config.js';
import { KeyStream } from '../crypto/keyStream.js';
import { CipherArchiveError, toCipherArchiveError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ProgressChannel } from '../progress/ProgressChannel.js';

export type OperationState = 'created' | 'identified' | 'running' | 'complete';

export type OperationKind = 'encrypt' | 'decrypt';

/** Inputs shared by both operation kinds. */
export type OperationOptions = {
  /** Passphrase the keystream is derived from. */
  key: string;
  /** File or directory to pack, or the archive to unpack. */
  targetPath: string;
  /** Archive file to create, or directory to unpack into. */
  destinationPath: string;
  recurse?: boolean;
  filter?: string;
  settings?: ArchiveSettings;
  logger?: Logger;
};

export type IdentifyResult = { ok: true; files: number } | { ok: false; error: CipherArchiveError };

export type OperationResult = {
  kind: OperationKind;
  success: boolean;
  /** Files packed or extracted. */
  files: number;
  error?: CipherArchiveError;
};

/**
 * One archive run: `created -> identified -> running -> complete`.
 *
 * `identify()` resolves the inputs, `start()` launches the archive task and
 * returns its join promise. The task is the only writer of the progress fields
 * on {@link ArchiveOperation.channel}; callers poll that channel or await the
 * promise. An instance runs at most once.
 */
export abstract class ArchiveOperation {
  abstract readonly kind: OperationKind;
  readonly channel = new ProgressChannel();
  protected readonly logger: Logger;
  private currentState: OperationState = 'created';
  private task: Promise<OperationResult> | undefined;

  protected constructor(protected readonly options: OperationOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get state(): OperationState {
    return this.currentState;
  }

  /** Resolve the files this run works on. A failure completes the operation. */
  async identify(): Promise<IdentifyResult> {
    this.requireState('created', 'identify');
    let result: IdentifyResult;
    try {
      result = await this.identifyInputs();
    } catch (err) {
      result = { ok: false, error: toCipherArchiveError(err, 'ARCHIVE_IO_FAILURE', 'Failed to identify files') };
    }
    if (!result.ok) {
      this.channel.log(result.error.message, 'error');
      this.channel.finish(false);
      this.currentState = 'complete';
      this.logger.warn({ kind: this.kind, err: result.error }, 'identification failed');
      return result;
    }
    this.currentState = 'identified';
    this.logger.debug({ kind: this.kind, files: result.files }, 'files identified');
    return result;
  }

  /** Launch the archive task; the returned promise settles when it completes. */
  start(): Promise<OperationResult> {
    this.requireState('identified', 'start');
    this.currentState = 'running';
    const key = KeyStream.derive(this.options.key);
    this.task = this.execute(key).then(
      (result) => this.settle(result),
      (err: unknown) => {
        const error = toCipherArchiveError(err, 'ARCHIVE_IO_FAILURE', `Unexpected ${this.kind} failure`);
        this.channel.log(error.message, 'error');
        return this.settle({ kind: this.kind, success: false, files: 0, error });
      }
    );
    return this.task;
  }

  /** Join promise of a started run. */
  join(): Promise<OperationResult> {
    if (!this.task) {
      throw new CipherArchiveError('ARCHIVE_INVALID_STATE', `Cannot join a ${this.kind} operation that was never started`);
    }
    return this.task;
  }

  protected abstract identifyInputs(): Promise<IdentifyResult>;

  protected abstract execute(key: KeyStream): Promise<OperationResult>;

  private settle(result: OperationResult): OperationResult {
    this.channel.finish(result.success);
    this.currentState = 'complete';
    this.logger.info({ kind: this.kind, success: result.success, files: result.files }, 'operation complete');
    return result;
  }

  private requireState(expected: OperationState, action: string): void {
    if (this.currentState !== expected) {
      throw new CipherArchiveError(
        'ARCHIVE_INVALID_STATE',
        `Cannot ${action} a ${this.kind} operation in state '${this.currentState}'`,
        { context: { state: this.currentState, expected } }
      );
    }
  }
}
