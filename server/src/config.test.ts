import test from 'node:test';
import assert from 'node:assert/strict';
import { parseConfig } from './config.js';

test('defaults apply when the environment is empty', () => {
  const config = parseConfig({});

  assert.equal(config.port, 8080);
  assert.equal(config.frameSource, 'ingest');
  assert.equal(config.sessionQueueCapacity, 4);
  assert.equal(config.broadcastPollMs, 33);
  assert.equal(config.maxConsecutiveFailures, 150);
  assert.equal(config.maxFrameBytes, 8 * 1024 * 1024);
  assert.deepEqual(config.capture, { device: undefined, fps: 30, width: 640, height: 480 });
  assert.deepEqual(config.corsOrigins, ['http://localhost:5173', 'http://127.0.0.1:5173']);
});

test('numeric settings are coerced from strings', () => {
  const config = parseConfig({
    PORT: '9000',
    FRAME_SOURCE: 'synthetic',
    CAPTURE_FPS: '12.5',
    ENCODER_QUALITY: '55',
    SESSION_QUEUE_CAPACITY: '2',
    CAPTURE_DEVICE: '/dev/video2',
  });

  assert.equal(config.port, 9000);
  assert.equal(config.frameSource, 'synthetic');
  assert.equal(config.capture.fps, 12.5);
  assert.equal(config.capture.device, '/dev/video2');
  assert.equal(config.encoderQuality, 55);
  assert.equal(config.sessionQueueCapacity, 2);
});

test('CORS origins are split and trimmed', () => {
  const config = parseConfig({ CORS_ORIGINS: ' https://a.example , ,https://b.example' });

  assert.deepEqual(config.corsOrigins, ['https://a.example', 'https://b.example']);
});

test('out of range values are rejected', () => {
  assert.throws(() => parseConfig({ SESSION_QUEUE_CAPACITY: '0' }));
  assert.throws(() => parseConfig({ ENCODER_QUALITY: '101' }));
  assert.throws(() => parseConfig({ FRAME_SOURCE: 'webcam' }));
  assert.throws(() => parseConfig({ CAPTURE_FPS: 'fast' }));
});
