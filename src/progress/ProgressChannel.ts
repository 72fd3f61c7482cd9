export type LogLevel = 'info' | 'error';

/** One queued message for the controlling side. */
export type LogMessage = {
  level: LogLevel;
  text: string;
};

/** Progress, completion and success read as one consistent unit. */
export type ProgressSnapshot = {
  progress: number;
  complete: boolean;
  success: boolean;
};

/** The half of a channel a running archive task writes to. */
export interface ProgressReporter {
  advance(delta: number): void;
  log(text: string, level?: LogLevel): void;
  finish(success: boolean): void;
}

/** The half of a channel a controller polls. */
export interface ProgressSource {
  snapshot(): ProgressSnapshot;
  readonly hasMessages: boolean;
  nextMessage(): LogMessage | undefined;
  drain(): LogMessage[];
  whenComplete(): Promise<ProgressSnapshot>;
}

/**
 * Shared state between one archive task and whoever watches it.
 *
 * Every mutation is a single synchronous call, so a reader on the same event
 * loop never observes a half-applied update. Completion is sticky: once
 * {@link ProgressChannel.finish} runs, further progress updates are ignored.
 */
export class ProgressChannel implements ProgressReporter, ProgressSource {
  private state: ProgressSnapshot = { progress: 0, complete: false, success: false };
  private readonly queue: LogMessage[] = [];
  private readonly waiters: Array<(snapshot: ProgressSnapshot) => void> = [];

  get progress(): number {
    return this.state.progress;
  }

  get complete(): boolean {
    return this.state.complete;
  }

  get success(): boolean {
    return this.state.success;
  }

  snapshot(): ProgressSnapshot {
    return { ...this.state };
  }

  advance(delta: number): void {
    if (this.state.complete || !Number.isFinite(delta)) return;
    this.state = { ...this.state, progress: clampUnit(this.state.progress + delta) };
  }

  finish(success: boolean): void {
    if (this.state.complete) return;
    this.state = { progress: success ? 1 : this.state.progress, complete: true, success };
    const snapshot = this.snapshot();
    for (const resolve of this.waiters.splice(0)) {
      resolve(snapshot);
    }
  }

  log(text: string, level: LogLevel = 'info'): void {
    this.queue.push({ level, text });
  }

  get hasMessages(): boolean {
    return this.queue.length > 0;
  }

  nextMessage(): LogMessage | undefined {
    return this.queue.shift();
  }

  drain(): LogMessage[] {
    return this.queue.splice(0);
  }

  /** Resolve once the task has reported completion. */
  whenComplete(): Promise<ProgressSnapshot> {
    if (this.state.complete) return Promise.resolve(this.snapshot());
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

function clampUnit(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}
