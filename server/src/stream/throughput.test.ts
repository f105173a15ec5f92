import test from 'node:test';
import assert from 'node:assert/strict';
import { ThroughputMeter } from './throughput.js';

test('reports zero rates until the first window closes', () => {
  const meter = new ThroughputMeter(0);
  meter.record(100, 100);
  meter.record(100, 200);

  assert.deepEqual(meter.snapshot(500), {
    totalFrames: 2,
    totalBytes: 200,
    framesPerSecond: 0,
    bytesPerSecond: 0,
  });
});

test('computes rates over the elapsed window and holds them until the next one', () => {
  const meter = new ThroughputMeter(0);
  for (let i = 0; i < 5; i += 1) {
    meter.record(1024, i * 100);
  }

  const first = meter.snapshot(1250);
  assert.equal(first.totalFrames, 5);
  assert.equal(first.framesPerSecond, 4);
  assert.equal(first.bytesPerSecond, 4096);

  meter.record(10, 1300);
  assert.equal(meter.snapshot(1400).framesPerSecond, 4);
  assert.equal(meter.snapshot(2250).framesPerSecond, 1);
});
