import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { gunzipSync, gzipSync } from 'node:zlib';
import { KeyStream } from '../src/crypto/keyStream.js';
import { resolveFileSet, type FileSet } from '../src/fileSet.js';
import { ProgressChannel, type ProgressReporter } from '../src/progress/ProgressChannel.js';
import { readArchive } from '../src/reader/ArchiveReader.js';
import { writeArchive } from '../src/writer/ArchiveWriter.js';
import { makeTempDir, readTree, writeTree } from './helpers.js';

async function packTree(work: string, key = 'secret'): Promise<string> {
  const source = path.join(work, 'src');
  await writeTree(source, { 'a.txt': 'hello', 'b/c.txt': 'world' });
  const fileSet = await resolveFileSet(source);
  assert.ok(fileSet.ok);
  const archive = path.join(work, 'out.cpk');
  const result = await writeArchive(fileSet, KeyStream.derive(key), archive, { reporter: new ProgressChannel() });
  assert.equal(result.success, true);
  return archive;
}

test('a truncated payload fails with ARCHIVE_TRUNCATED and leaves the destination empty', async () => {
  const work = await makeTempDir();
  try {
    const archive = await packTree(work);
    const plain = gunzipSync(await readFile(archive));
    await writeFile(archive, gzipSync(plain.subarray(0, plain.length - 3)));

    const destination = path.join(work, 'out');
    await mkdir(destination);
    const staging = path.join(work, 'staging');
    const channel = new ProgressChannel();
    const read = await readArchive(archive, KeyStream.derive('secret'), destination, {
      reporter: channel,
      settings: { stagingDir: staging }
    });
    assert.equal(read.success, false);
    assert.equal(read.error?.code, 'ARCHIVE_TRUNCATED');
    assert.equal(read.error?.entryName, 'b/c.txt');
    assert.ok(read.error?.message.endsWith('; the archive is damaged or the cipher key is wrong'));
    assert.equal(read.entries, 1);
    assert.deepEqual(read.extracted, []);
    assert.deepEqual(await readdir(destination), []);
    assert.deepEqual(await readdir(staging), []);
    assert.deepEqual(channel.snapshot(), { progress: 0.375, complete: true, success: false });
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('an archive cut inside an entry header names the missing field', async () => {
  const work = await makeTempDir();
  try {
    const archive = await packTree(work);
    const plain = gunzipSync(await readFile(archive));
    // count, then a.txt: length, 5 code units, size, 5 content bytes
    const firstEntryEnd = 4 + 4 + 10 + 8 + 5;
    await writeFile(archive, gzipSync(plain.subarray(0, firstEntryEnd + 4 + 6)));

    const channel = new ProgressChannel();
    const read = await readArchive(archive, KeyStream.derive('secret'), path.join(work, 'out'), {
      reporter: channel,
      settings: { stagingDir: path.join(work, 'staging') }
    });
    assert.equal(read.error?.code, 'ARCHIVE_TRUNCATED');
    assert.equal(
      read.error?.message,
      'Archive ended while reading entry path: 8 of 14 bytes missing; the archive is damaged or the cipher key is wrong'
    );
    assert.equal(channel.progress, 0.375);
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('a cut gzip stream is reported as truncated', async () => {
  const work = await makeTempDir();
  try {
    const archive = await packTree(work);
    const compressed = await readFile(archive);
    await writeFile(archive, compressed.subarray(0, Math.floor(compressed.length / 2)));

    const read = await readArchive(archive, KeyStream.derive('secret'), path.join(work, 'out'), {
      reporter: new ProgressChannel(),
      settings: { stagingDir: path.join(work, 'staging') }
    });
    assert.equal(read.success, false);
    assert.equal(read.error?.code, 'ARCHIVE_TRUNCATED');
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('a file that is not gzip data is reported as corrupt', async () => {
  const work = await makeTempDir();
  try {
    const archive = path.join(work, 'plain.cpk');
    await writeFile(archive, 'this is not an archive');
    const read = await readArchive(archive, KeyStream.derive('secret'), path.join(work, 'out'), {
      reporter: new ProgressChannel(),
      settings: { stagingDir: path.join(work, 'staging') }
    });
    assert.equal(read.success, false);
    assert.equal(read.error?.code, 'ARCHIVE_CORRUPT');
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('an unreadable file rolls back the whole archive', async () => {
  const work = await makeTempDir();
  try {
    await writeTree(work, { 'a.txt': 'hello' });
    const missing = path.join(work, 'gone.txt');
    const fileSet: FileSet = {
      root: work,
      files: [
        { path: path.join(work, 'a.txt'), size: 5, relativePath: 'a.txt' },
        { path: missing, size: 4, relativePath: 'gone.txt' }
      ]
    };
    const archive = path.join(work, 'out.cpk');
    const channel = new ProgressChannel();
    const result = await writeArchive(fileSet, KeyStream.derive('secret'), archive, { reporter: channel });

    assert.equal(result.success, false);
    assert.equal(result.entries, 1);
    assert.equal(result.error?.code, 'ARCHIVE_IO_FAILURE');
    assert.equal(result.error?.entryName, 'gone.txt');
    assert.equal(existsSync(archive), false);
    assert.deepEqual(channel.snapshot(), { progress: 0.5, complete: true, success: false });
    const messages = channel.drain();
    assert.equal(messages.length, 1);
    assert.equal(messages[0]?.level, 'error');
    assert.ok(messages[0]?.text.startsWith(`Failed to pack '${missing}': `));
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('a file shorter than identified fails the archive', async () => {
  const work = await makeTempDir();
  try {
    await writeTree(work, { 'short.txt': 'abc' });
    const file = path.join(work, 'short.txt');
    const archive = path.join(work, 'out.cpk');
    const result = await writeArchive(
      { root: work, files: [{ path: file, size: 10, relativePath: 'short.txt' }] },
      KeyStream.derive('secret'),
      archive,
      { reporter: new ProgressChannel() }
    );
    assert.equal(result.success, false);
    assert.equal(result.error?.message, `'${file}' ended after 3 of 10 bytes`);
    assert.equal(existsSync(archive), false);
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('each packed file advances progress by an equal share', async () => {
  const work = await makeTempDir();
  try {
    await writeTree(work, { 'a.txt': 'hello', 'b.txt': 'world' });
    const fileSet = await resolveFileSet(work);
    assert.ok(fileSet.ok);
    const steps: number[] = [];
    const finished: boolean[] = [];
    const reporter: ProgressReporter = {
      advance: (delta) => steps.push(delta),
      log: () => undefined,
      finish: (success) => finished.push(success)
    };
    const result = await writeArchive(fileSet, KeyStream.derive('test-secret'), path.join(work, 'out.cpk'), { reporter });
    assert.equal(result.success, true);
    assert.deepEqual(steps, [0.5, 0.5]);
    assert.deepEqual(finished, [true]);
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('an empty file set fails without creating an archive', async () => {
  const work = await makeTempDir();
  try {
    const archive = path.join(work, 'out.cpk');
    const channel = new ProgressChannel();
    const result = await writeArchive({ root: work, files: [] }, KeyStream.derive('k'), archive, {
      reporter: channel
    });
    assert.equal(result.error?.code, 'ARCHIVE_NO_FILES');
    assert.equal(existsSync(archive), false);
    assert.equal(channel.complete, true);
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('one failing move does not stop the others', async () => {
  const work = await makeTempDir();
  try {
    const archive = await packTree(work);
    const destination = path.join(work, 'out');
    await writeTree(destination, { b: 'blocker' });

    const channel = new ProgressChannel();
    const read = await readArchive(archive, KeyStream.derive('secret'), destination, {
      reporter: channel,
      settings: { stagingDir: path.join(work, 'staging') }
    });
    assert.equal(read.success, false);
    assert.equal(read.error, undefined);
    assert.deepEqual(read.extracted, ['a.txt']);
    assert.deepEqual(read.failed, ['b/c.txt']);
    assert.deepEqual(await readTree(destination), { 'a.txt': 'hello', b: 'blocker' });
    assert.deepEqual(channel.snapshot(), { progress: 0.875, complete: true, success: false });
    const messages = channel.drain();
    assert.equal(messages.length, 1);
    assert.ok(messages[0]?.text.startsWith(`Failed to move decoded file to '${path.join(destination, 'b', 'c.txt')}': `));
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('a wrong key fails or yields different bytes without throwing', async () => {
  const work = await makeTempDir();
  try {
    const archive = await packTree(work);
    const destination = path.join(work, 'out');
    const read = await readArchive(archive, KeyStream.derive('not-the-secret'), destination, {
      reporter: new ProgressChannel(),
      settings: { stagingDir: path.join(work, 'staging') }
    });
    if (read.success) {
      assert.notDeepEqual(await readTree(destination), { 'a.txt': 'hello', 'b/c.txt': 'world' });
    } else {
      assert.ok(read.error !== undefined || read.failed.length > 0);
    }
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});
