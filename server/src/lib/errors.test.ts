import test from 'node:test';
import assert from 'node:assert/strict';
import {
  CaptureOpenError,
  PublisherFailureError,
  StreamError,
  errorMessage,
  isStreamError,
} from './errors.js';

test('stream errors carry their code', () => {
  const error = new StreamError('SESSION_FULL');

  assert.equal(error.message, 'SESSION_FULL');
  assert.equal(error.name, 'StreamError');
  assert.equal(isStreamError(error), true);
  assert.equal(isStreamError(error, 'SESSION_FULL'), true);
  assert.equal(isStreamError(error, 'SESSION_EXISTS'), false);
  assert.equal(isStreamError(new Error('SESSION_FULL')), false);
});

test('publisher failure reports the streak length and cause', () => {
  const cause = new Error('camera read failed');
  const error = new PublisherFailureError(3, { cause });

  assert.equal(error.message, 'Publisher gave up after 3 consecutive failed cycles');
  assert.equal(error.consecutiveFailures, 3);
  assert.equal(error.cause, cause);
});

test('errorMessage handles non-errors', () => {
  assert.equal(errorMessage(new CaptureOpenError('no device')), 'no device');
  assert.equal(errorMessage('plain'), 'plain');
  assert.equal(errorMessage(42), '42');
});
