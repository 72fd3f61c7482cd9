import { createInterface } from 'node:readline/promises';
import type { Output } from './console.js';
import type { Session } from './session.js';

export const PROMPT = 'cipherpack-> ';

export type ShellOptions = {
  session: Session;
  /** Command lines run, and echoed, before the first prompt. */
  queued: readonly string[];
  input: NodeJS.ReadableStream;
  output: Output & NodeJS.WritableStream;
};

/** Run queued commands, then read commands from `input` until `-exit` or end of input. */
export async function runShell(options: ShellOptions): Promise<void> {
  const { session, output } = options;
  for (const line of options.queued) {
    output.write(`${PROMPT}${line}\n`);
    await session.execute(line);
    output.write('\n');
    if (session.exited) return;
  }

  const rl = createInterface({ input: options.input, output, prompt: PROMPT });
  try {
    rl.prompt();
    for await (const line of rl) {
      await session.execute(line);
      output.write('\n');
      if (session.exited) break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
