import test from 'node:test';
import assert from 'node:assert/strict';
import { ProgressChannel } from '../src/progress/ProgressChannel.js';

test('progress accumulates and clamps to [0, 1]', () => {
  const channel = new ProgressChannel();
  channel.advance(0.25);
  channel.advance(0.5);
  assert.equal(channel.progress, 0.75);
  channel.advance(2);
  assert.equal(channel.progress, 1);
  channel.advance(Number.NaN);
  assert.equal(channel.progress, 1);
});

test('completion is sticky and success pins progress to 1', () => {
  const channel = new ProgressChannel();
  channel.advance(0.5);
  channel.finish(true);
  assert.deepEqual(channel.snapshot(), { progress: 1, complete: true, success: true });
  channel.finish(false);
  channel.advance(-1);
  assert.deepEqual(channel.snapshot(), { progress: 1, complete: true, success: true });
});

test('failure keeps the progress reached so far', () => {
  const channel = new ProgressChannel();
  channel.advance(0.5);
  channel.finish(false);
  assert.deepEqual(channel.snapshot(), { progress: 0.5, complete: true, success: false });
});

test('messages queue in order and drain once', () => {
  const channel = new ProgressChannel();
  channel.log('first');
  channel.log('second', 'error');
  assert.equal(channel.hasMessages, true);
  assert.deepEqual(channel.nextMessage(), { level: 'info', text: 'first' });
  channel.log('third');
  assert.deepEqual(channel.drain(), [
    { level: 'error', text: 'second' },
    { level: 'info', text: 'third' }
  ]);
  assert.equal(channel.hasMessages, false);
  assert.equal(channel.nextMessage(), undefined);
});

test('whenComplete resolves for waiters and late callers', async () => {
  const channel = new ProgressChannel();
  const waiting = channel.whenComplete();
  channel.finish(false);
  assert.deepEqual(await waiting, { progress: 0, complete: true, success: false });
  assert.deepEqual(await channel.whenComplete(), { progress: 0, complete: true, success: false });
});
