import test from 'node:test';
import assert from 'node:assert/strict';
import { AgentArgsError, parseAgentArgs } from './args.js';

test('defaults target a local relay with the camera', () => {
  const options = parseAgentArgs([]);

  assert.deepEqual(options, {
    uri: 'ws://localhost:8080/ws/stream',
    fps: 30,
    quality: 80,
    width: 640,
    height: 480,
    source: 'camera',
    device: undefined,
    queue: 4,
    maxFailures: 150,
    statusMs: 5000,
  });
});

test('flags override the defaults', () => {
  const options = parseAgentArgs([
    '--uri',
    'ws://relay.internal:9000/ws/stream',
    '--fps',
    '15',
    '--quality',
    '60',
    '--screen',
    '--device',
    ':1.0',
    '--max-failures',
    '0',
    '--status-ms',
    '0',
  ]);

  assert.notEqual(options, 'help');
  if (options === 'help') return;
  assert.equal(options.uri, 'ws://relay.internal:9000/ws/stream');
  assert.equal(options.fps, 15);
  assert.equal(options.quality, 60);
  assert.equal(options.source, 'screen');
  assert.equal(options.device, ':1.0');
  assert.equal(options.maxFailures, 0);
  assert.equal(options.statusMs, 0);
});

test('--help short-circuits validation', () => {
  assert.equal(parseAgentArgs(['--help', '--fps', 'nope']), 'help');
  assert.equal(parseAgentArgs(['-h']), 'help');
});

test('invalid values name the offending flag', () => {
  assert.throws(
    () => parseAgentArgs(['--max-failures=-1']),
    (error) => error instanceof AgentArgsError && error.message.startsWith('--max-failures: '),
  );
  assert.throws(
    () => parseAgentArgs(['--source', 'webcam']),
    (error) => error instanceof AgentArgsError && error.message.startsWith('--source: '),
  );
});

test('unknown flags and positionals are rejected', () => {
  assert.throws(() => parseAgentArgs(['--bogus']), AgentArgsError);
  assert.throws(() => parseAgentArgs(['extra']), AgentArgsError);
});
