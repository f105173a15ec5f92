import test from 'node:test';
import assert from 'node:assert/strict';
import { FakeTransport, makeFrame, settle, silentLogger } from '../testHelpers.js';
import type { SessionCloseReason } from '../types.js';
import { ViewerSession } from './viewerSession.js';

function createSession(transport = new FakeTransport(), capacity = 4) {
  const session = new ViewerSession({ transport, capacity, logger: silentLogger, id: 'viewer-1' });
  return { session, transport };
}

test('offering the same version twice queues it once', () => {
  const { session } = createSession();

  assert.equal(session.offer(makeFrame(1)), true);
  assert.equal(session.offer(makeFrame(1)), false);
  assert.deepEqual(session.queuedVersions(), [1]);
});

test('an older version than one already queued is ignored', () => {
  const { session } = createSession();
  session.offer(makeFrame(5));

  assert.equal(session.offer(makeFrame(3)), false);
  assert.deepEqual(session.queuedVersions(), [5]);
});

test('versions at or below the last sent version never enqueue', async () => {
  const { session, transport } = createSession();
  session.start();
  session.offer(makeFrame(3));
  await settle();

  assert.equal(session.lastSentVersion, 3);
  assert.equal(session.offer(makeFrame(2)), false);
  assert.equal(session.offer(makeFrame(3)), false);
  assert.deepEqual(session.queuedVersions(), []);
  assert.deepEqual(transport.sentText(), ['frame-3']);
});

test('a slow viewer keeps only the newest frames and sends them in order', async () => {
  const { session, transport } = createSession();
  for (let version = 1; version <= 10; version += 1) {
    session.offer(makeFrame(version));
  }

  assert.deepEqual(session.queuedVersions(), [7, 8, 9, 10]);
  assert.equal(session.info().framesDropped, 6);

  session.start();
  await settle();

  assert.deepEqual(transport.sentText(), ['frame-7', 'frame-8', 'frame-9', 'frame-10']);
  assert.equal(session.lastSentVersion, 10);
  assert.equal(session.info().framesSent, 4);
});

test('frames arriving during a blocked send replace each other in the queue', async () => {
  const { session, transport } = createSession();
  transport.hold();
  session.start();

  for (let version = 1; version <= 10; version += 1) {
    session.offer(makeFrame(version));
  }
  await settle();
  assert.deepEqual(session.queuedVersions(), [7, 8, 9, 10]);
  assert.equal(session.lastSentVersion, 0);

  transport.release();
  await settle();

  assert.deepEqual(transport.sentText(), ['frame-1', 'frame-7', 'frame-8', 'frame-9', 'frame-10']);
  assert.equal(session.lastSentVersion, 10);
});

test('a failed send closes the session and later offers are ignored', async () => {
  const { session, transport } = createSession();
  transport.failWhen = (payload) => payload.toString() === 'frame-6';
  const reasons: SessionCloseReason[] = [];
  session.onClose((_session, reason) => reasons.push(reason));
  session.start();

  for (let version = 1; version <= 5; version += 1) {
    session.offer(makeFrame(version));
  }
  await settle();
  session.offer(makeFrame(6));
  await settle();

  assert.deepEqual(reasons, ['send_failed']);
  assert.equal(session.isClosed, true);
  assert.equal(session.lastSentVersion, 5);
  assert.deepEqual(transport.closedWith, { code: 1011, reason: 'Send failed' });
  assert.equal(session.offer(makeFrame(7)), false);
  assert.deepEqual(session.queuedVersions(), []);
  await session.closed();
});

test('close is idempotent and stops the flush routine', async () => {
  const { session, transport } = createSession();
  const reasons: SessionCloseReason[] = [];
  session.onClose((_session, reason) => reasons.push(reason));
  session.start();
  session.offer(makeFrame(1));
  session.offer(makeFrame(2));

  assert.equal(session.close('kicked'), true);
  assert.equal(session.close('shutdown'), false);
  await session.closed();

  assert.deepEqual(reasons, ['kicked']);
  assert.equal(session.closeReason, 'kicked');
  assert.deepEqual(transport.closedWith, { code: 4001, reason: 'Disconnected by operator' });
  assert.equal(session.isFlushing, false);
});

test('closing during a stalled send terminates the transport', async () => {
  const { session, transport } = createSession();
  transport.hold();
  session.start();
  session.offer(makeFrame(1));
  await settle();

  session.close('shutdown');
  await session.closed();

  assert.equal(transport.terminated, true);
  assert.deepEqual(transport.closedWith, { code: 1001, reason: 'Server shutting down' });
  assert.deepEqual(transport.sentText(), []);
  assert.equal(session.lastSentVersion, 0);
});

test('closing an idle session closes the transport gracefully', async () => {
  const { session, transport } = createSession();
  session.start();
  session.offer(makeFrame(1));
  await settle();

  session.close('shutdown');
  await session.closed();

  assert.equal(transport.terminated, false);
  assert.deepEqual(transport.sentText(), ['frame-1']);
});

test('onClose on an already closed session runs the listener immediately', () => {
  const { session } = createSession();
  session.close('disconnected');
  const reasons: SessionCloseReason[] = [];
  session.onClose((_session, reason) => reasons.push(reason));

  assert.deepEqual(reasons, ['disconnected']);
});

test('heartbeats update the session info', () => {
  let now = 1_000;
  const session = new ViewerSession({
    transport: new FakeTransport('10.0.0.7'),
    logger: silentLogger,
    now: () => now,
  });
  now = 4_000;
  session.markHeartbeat({ fps: 24 });
  session.markHeartbeat({ latency: 35 });

  const info = session.info();
  assert.equal(info.connectedAt, 1_000);
  assert.equal(info.lastHeartbeat, 4_000);
  assert.equal(info.viewerFps, 24);
  assert.equal(info.viewerLatency, 35);
  assert.equal(info.remoteAddress, '10.0.0.7');
});
