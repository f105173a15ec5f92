#!/usr/bin/env node
import http from 'node:http';
import { createApp } from './app.js';
import { createCaptureSource } from './capture/factory.js';
import { JpegEncoder } from './capture/jpegEncoder.js';
import { config } from './config.js';
import { logger } from './lib/logger.js';
import { FrameRelay } from './stream/frameRelay.js';
import { Publisher } from './stream/publisher.js';
import { registerWebSocketServer } from './ws/server.js';

const frameSource = config.frameSource;

const relay = new FrameRelay({
  queueCapacity: config.sessionQueueCapacity,
  maxViewers: config.maxViewers,
  pollIntervalMs: config.broadcastPollMs,
  createPublisher:
    frameSource === 'ingest'
      ? undefined
      : (slot) =>
          new Publisher({
            source: createCaptureSource(frameSource, config.capture),
            encoder: new JpegEncoder(),
            slot,
            fps: config.capture.fps,
            quality: config.encoderQuality,
            maxConsecutiveFailures: config.maxConsecutiveFailures,
          }),
});

const app = createApp({ relay, corsOrigins: config.corsOrigins });
const server = http.createServer(app);
const sockets = registerWebSocketServer(server, {
  relay,
  heartbeatMs: config.heartbeatMs,
  maxFrameBytes: config.maxFrameBytes,
  ingestEnabled: frameSource === 'ingest',
});

let stopping: Promise<void> | undefined;

function shutdown(exitCode: number): Promise<void> {
  stopping ??= (async () => {
    logger.info({ exitCode }, 'shutting_down');
    try {
      await relay.shutdown();
      await sockets.close();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    } catch (error) {
      logger.error({ err: error }, 'shutdown_failed');
      exitCode = 1;
    }
    process.exit(exitCode);
  })();
  return stopping;
}

relay.publisher?.onFatal((error) => {
  logger.fatal({ err: error }, 'publisher_fatal');
  void shutdown(1);
});

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

try {
  await relay.start();
} catch (error) {
  logger.fatal({ err: error, source: frameSource }, 'startup_failed');
  await relay.shutdown();
  process.exit(1);
}

server.listen(config.port, () => {
  logger.info({ port: config.port, source: frameSource }, 'server_started');
});
