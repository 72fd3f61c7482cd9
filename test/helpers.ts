import { mkdir, mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { LogMessage } from '../src/progress/ProgressChannel.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'cipherpack-test-'));
}

/** Write `{ 'a.txt': 'hello', 'b/c.txt': 'world' }` style trees below `root`. */
export async function writeTree(root: string, files: Record<string, string | Uint8Array>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const target = path.join(root, ...name.split('/'));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/** Read every file below `root` into a `/`-keyed record of UTF-8 strings. */
export async function readTree(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  await walk(root, '', out);
  return out;
}

async function walk(dir: string, prefix: string, out: Record<string, string>): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    const relative = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
    if (entry.isDirectory()) {
      await walk(full, relative, out);
    } else if (entry.isFile()) {
      out[relative] = await readFile(full, 'utf8');
    }
  }
}

export function collectMessages(): { messages: LogMessage[]; onMessage: (message: LogMessage) => void } {
  const messages: LogMessage[] = [];
  return { messages, onMessage: (message) => messages.push(message) };
}
