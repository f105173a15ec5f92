import test from 'node:test';
import assert from 'node:assert/strict';
import { isStreamError } from '../lib/errors.js';
import { FakeTransport, silentLogger } from '../testHelpers.js';
import { SessionRegistry } from './sessionRegistry.js';
import { ViewerSession } from './viewerSession.js';

function viewer(id: string) {
  return new ViewerSession({ id, transport: new FakeTransport(), logger: silentLogger });
}

test('add and remove track the live set', () => {
  const registry = new SessionRegistry();
  const a = viewer('a');
  const b = viewer('b');
  registry.add(a);
  registry.add(b);

  assert.equal(registry.size, 2);
  assert.equal(registry.get('a'), a);
  assert.equal(registry.remove('a'), true);
  assert.equal(registry.has('a'), false);
  assert.deepEqual(
    registry.snapshot().map((session) => session.id),
    ['b'],
  );
});

test('removal is idempotent', () => {
  const registry = new SessionRegistry();
  const a = viewer('a');
  registry.add(a);

  assert.equal(registry.remove(a), true);
  assert.equal(registry.remove(a), false);
  assert.equal(registry.remove('missing'), false);
});

test('a session cannot be registered twice', () => {
  const registry = new SessionRegistry();
  registry.add(viewer('a'));

  assert.throws(
    () => registry.add(viewer('a')),
    (error) => isStreamError(error, 'SESSION_EXISTS'),
  );
  assert.equal(registry.size, 1);
});

test('the session limit is enforced', () => {
  const registry = new SessionRegistry({ maxSessions: 1 });
  registry.add(viewer('a'));

  assert.throws(
    () => registry.add(viewer('b')),
    (error) => isStreamError(error, 'SESSION_FULL'),
  );
});

test('closed sessions are rejected and closing deregisters', () => {
  const registry = new SessionRegistry();
  const closed = viewer('closed');
  closed.close('disconnected');
  assert.throws(
    () => registry.add(closed),
    (error) => isStreamError(error, 'SESSION_CLOSED'),
  );

  const live = viewer('live');
  registry.add(live);
  live.close('send_failed');
  assert.equal(registry.has('live'), false);
  assert.equal(registry.size, 0);
});

test('a snapshot stays valid while sessions are removed during iteration', () => {
  const registry = new SessionRegistry();
  ['a', 'b', 'c'].forEach((id) => registry.add(viewer(id)));

  const visited: string[] = [];
  for (const session of registry.snapshot()) {
    visited.push(session.id);
    registry.remove('b');
    registry.remove('c');
  }

  assert.deepEqual(visited, ['a', 'b', 'c']);
  assert.equal(registry.size, 1);
});

test('removing by a stale object does not drop a newer session with the same id', () => {
  const registry = new SessionRegistry();
  const first = viewer('same');
  registry.add(first);
  registry.remove('same');
  const second = viewer('same');
  registry.add(second);

  assert.equal(registry.remove(first), false);
  assert.equal(registry.get('same'), second);
});

test('closeAll closes every session and empties the registry', () => {
  const registry = new SessionRegistry();
  const sessions = ['a', 'b'].map((id) => viewer(id));
  sessions.forEach((session) => registry.add(session));

  const closed = registry.closeAll('shutdown');

  assert.equal(closed.length, 2);
  assert.equal(registry.size, 0);
  assert.deepEqual(
    sessions.map((session) => session.closeReason),
    ['shutdown', 'shutdown'],
  );
});
