import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { gunzipSync, gzipSync } from 'node:zlib';
import { encodeInt32BE, encodeInt64BE, writeCodeUnitBE } from '../src/binary.js';
import type { ArchiveSettings } from '../src/config.js';
import { KeyStream } from '../src/crypto/keyStream.js';
import { resolveFileSet } from '../src/fileSet.js';
import { decrypt } from '../src/operation/run.js';
import { ProgressChannel } from '../src/progress/ProgressChannel.js';
import { readArchive } from '../src/reader/ArchiveReader.js';
import { writeArchive } from '../src/writer/ArchiveWriter.js';
import { makeTempDir, readTree, writeTree } from './helpers.js';

async function pack(source: string, archive: string, key: string, settings?: ArchiveSettings) {
  const fileSet = await resolveFileSet(source);
  assert.ok(fileSet.ok);
  const channel = new ProgressChannel();
  const result = await writeArchive(fileSet, KeyStream.derive(key), archive, {
    reporter: channel,
    ...(settings ? { settings } : {})
  });
  return { result, channel };
}

/** Plain archive layout, encrypted and gzipped, built without the writer. */
function encodeArchive(key: string, entries: Array<[string, string]>): Uint8Array {
  const parts: Uint8Array[] = [encodeInt32BE(entries.length)];
  for (const [name, content] of entries) {
    parts.push(encodeInt32BE(name.length));
    const units = new Uint8Array(name.length * 2);
    for (let i = 0; i < name.length; i += 1) writeCodeUnitBE(units, i * 2, name.charCodeAt(i));
    parts.push(units);
    const body = new TextEncoder().encode(content);
    parts.push(encodeInt64BE(BigInt(body.length)), body);
  }
  const plain = Buffer.concat(parts);
  KeyStream.derive(key).encrypt(plain);
  return gzipSync(plain);
}

test('a directory tree round-trips through an archive', async () => {
  const work = await makeTempDir();
  try {
    const source = path.join(work, 'src');
    await writeTree(source, { 'a.txt': 'hello', 'b/c.txt': 'world' });
    const archive = path.join(work, 'out.cpk');

    const { result: written, channel: writeChannel } = await pack(source, archive, 'secret');
    assert.equal(written.success, true);
    assert.equal(written.entries, 2);
    // count + (len + 2*5 + size + 5) + (len + 2*7 + size + 5)
    assert.equal(written.bytesWritten, 62n);
    assert.deepEqual(writeChannel.snapshot(), { progress: 1, complete: true, success: true });

    const destination = path.join(work, 'out');
    const staging = path.join(work, 'staging');
    const readChannel = new ProgressChannel();
    const read = await readArchive(archive, KeyStream.derive('secret'), destination, {
      reporter: readChannel,
      settings: { stagingDir: staging }
    });
    assert.equal(read.success, true);
    assert.equal(read.entries, 2);
    assert.deepEqual([...read.extracted].sort(), ['a.txt', 'b/c.txt']);
    assert.deepEqual(read.failed, []);
    assert.deepEqual(await readTree(destination), { 'a.txt': 'hello', 'b/c.txt': 'world' });
    assert.deepEqual(await readdir(staging), []);
    assert.equal(readChannel.success, true);
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('the decompressed stream is the keystream-offset wire layout', async () => {
  const work = await makeTempDir();
  try {
    await writeTree(work, { 'a.txt': 'hello' });
    const archive = path.join(work, 'single.cpk');
    const { result } = await pack(path.join(work, 'a.txt'), archive, 'secret');
    assert.equal(result.success, true);

    const plain = gunzipSync(await readFile(archive));
    KeyStream.derive('secret').decrypt(plain);
    assert.deepEqual(
      [...plain],
      [
        0, 0, 0, 1,
        0, 0, 0, 5,
        0, 0x61, 0, 0x2e, 0, 0x74, 0, 0x78, 0, 0x74,
        0, 0, 0, 0, 0, 0, 0, 5,
        0x68, 0x65, 0x6c, 0x6c, 0x6f
      ]
    );
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('tiny buffers, empty files and an empty passphrase still round-trip', async () => {
  const work = await makeTempDir();
  try {
    const source = path.join(work, 'src');
    await writeTree(source, { 'empty.txt': '', 'long-name-for-chunking.txt': 'chunked content', 'd/e.txt': 'x' });
    const archive = path.join(work, 'out.cpk');
    const { result } = await pack(source, archive, '', { bufferSize: 3 });
    assert.equal(result.success, true);

    const destination = path.join(work, 'out');
    const read = await readArchive(archive, KeyStream.derive(''), destination, {
      reporter: new ProgressChannel(),
      settings: { bufferSize: 3, stagingDir: path.join(work, 'staging') }
    });
    assert.equal(read.success, true);
    assert.deepEqual(await readTree(destination), {
      'empty.txt': '',
      'long-name-for-chunking.txt': 'chunked content',
      'd/e.txt': 'x'
    });
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('decrypt restores every entry whatever the recurse and filter options say', async () => {
  const work = await makeTempDir();
  try {
    const archive = path.join(work, 'mixed.cpk');
    await writeFile(
      archive,
      encodeArchive('test-secret', [
        ['a.txt', 'hello'],
        ['b.md', '# title'],
        ['sub/c.txt', 'world']
      ])
    );
    const destination = path.join(work, 'out');
    const ok = await decrypt({
      key: 'test-secret',
      targetPath: archive,
      destinationPath: destination,
      recurse: false,
      filter: '*.md',
      removeOriginals: true,
      settings: { pollIntervalMs: 1, stagingDir: path.join(work, 'staging') }
    });
    assert.equal(ok, true);
    assert.deepEqual(await readTree(destination), { 'a.txt': 'hello', 'b.md': '# title', 'sub/c.txt': 'world' });
    assert.equal(existsSync(archive), false);
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('backslash-separated entry paths land in subdirectories', async () => {
  const work = await makeTempDir();
  try {
    const archive = path.join(work, 'win.cpk');
    await writeFile(archive, encodeArchive('test-secret', [['dir\\f.txt', 'data']]));
    const destination = path.join(work, 'out');
    const read = await readArchive(archive, KeyStream.derive('test-secret'), destination, {
      reporter: new ProgressChannel(),
      settings: { stagingDir: path.join(work, 'staging') }
    });
    assert.equal(read.success, true);
    assert.deepEqual(await readTree(destination), { 'dir/f.txt': 'data' });
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});

test('entries escaping the destination are rejected before anything is written', async () => {
  const work = await makeTempDir();
  try {
    const archive = path.join(work, 'evil.cpk');
    await writeFile(
      archive,
      encodeArchive('test-secret', [
        ['ok.txt', 'fine'],
        ['../evil.txt', 'gotcha']
      ])
    );
    const destination = path.join(work, 'out');
    await mkdir(destination);
    const channel = new ProgressChannel();
    const read = await readArchive(archive, KeyStream.derive('test-secret'), destination, {
      reporter: channel,
      settings: { stagingDir: path.join(work, 'staging') }
    });
    assert.equal(read.success, false);
    assert.equal(read.error?.code, 'ARCHIVE_PATH_TRAVERSAL');
    assert.deepEqual(await readdir(destination), []);
    assert.deepEqual(channel.drain(), [
      { level: 'error', text: 'Unable to decode the archive: Path traversal detected in entry path' }
    ]);
    assert.equal((await readdir(work)).includes('evil.txt'), false);
  } finally {
    await rm(work, { recursive: true, force: true });
  }
});
