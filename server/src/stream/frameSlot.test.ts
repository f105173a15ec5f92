import test from 'node:test';
import assert from 'node:assert/strict';
import { EMPTY_FRAME, FrameSlot, isEmptyFrame } from './frameSlot.js';

test('read before any publish returns the empty sentinel', () => {
  const slot = new FrameSlot();
  const frame = slot.read();
  assert.equal(frame, EMPTY_FRAME);
  assert.equal(frame.version, 0);
  assert.equal(frame.payload.byteLength, 0);
  assert.equal(isEmptyFrame(frame), true);
  assert.equal(slot.hasFrame, false);
});

test('each publish replaces the frame and bumps the version by one', () => {
  const slot = new FrameSlot();
  const payloads = ['a', 'bb', 'ccc', 'dddd'];

  payloads.forEach((payload, index) => {
    slot.publish(Buffer.from(payload), 1000 + index);
    const frame = slot.read();
    assert.equal(frame.payload.toString(), payload);
    assert.equal(frame.version, index + 1);
    assert.equal(frame.publishedAt, 1000 + index);
  });

  assert.equal(slot.version, 4);
  assert.equal(slot.hasFrame, true);
});

test('publish copies the payload so the producer can reuse its buffer', () => {
  const slot = new FrameSlot();
  const buffer = Buffer.from('first');
  slot.publish(buffer);
  buffer.write('xxxxx');

  assert.equal(slot.read().payload.toString(), 'first');
});

test('a frame held by a reader is unaffected by later publishes', () => {
  const slot = new FrameSlot();
  slot.publish(Buffer.from('one'));
  const held = slot.read();
  slot.publish(Buffer.from('two'));

  assert.equal(held.version, 1);
  assert.equal(held.payload.toString(), 'one');
  assert.equal(Object.isFrozen(held), true);
});

test('subscribers see every publication in order until they unsubscribe', () => {
  const slot = new FrameSlot();
  const seen: number[] = [];
  const unsubscribe = slot.subscribe((frame) => seen.push(frame.version));

  slot.publish(Buffer.from('1'));
  slot.publish(Buffer.from('2'));
  unsubscribe();
  slot.publish(Buffer.from('3'));

  assert.deepEqual(seen, [1, 2]);
});
