#!/usr/bin/env node
import WebSocket from 'ws';
import { createCaptureSource } from '../capture/factory.js';
import { JpegEncoder } from '../capture/jpegEncoder.js';
import { logger as rootLogger } from '../lib/logger.js';
import { FrameRelay } from '../stream/frameRelay.js';
import { Publisher } from '../stream/publisher.js';
import { WebSocketTransport } from '../ws/transport.js';
import { AGENT_USAGE, AgentArgsError, parseAgentArgs, type AgentOptions } from './args.js';

const logger = rootLogger.child({ component: 'agent' });

function connect(uri: string): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(uri);
    socket.once('open', () => {
      socket.off('error', reject);
      resolve(socket);
    });
    socket.once('error', reject);
  });
}

/**
 * Captures locally and uploads to a relay. The upload link is an ordinary
 * viewer session, so it gets the same drop-oldest queue and freshness rules.
 */
async function runAgent(options: AgentOptions): Promise<number> {
  const socket = await connect(options.uri);
  logger.info({ uri: options.uri, source: options.source }, 'agent_connected');

  const relay = new FrameRelay({
    queueCapacity: options.queue,
    maxViewers: 1,
    pollIntervalMs: 0,
    createPublisher: (slot) =>
      new Publisher({
        source: createCaptureSource(options.source, options),
        encoder: new JpegEncoder(),
        slot,
        fps: options.fps,
        quality: options.quality,
        maxConsecutiveFailures: options.maxFailures,
      }),
  });

  const uplink = relay.connectViewer(new WebSocketTransport(socket, options.uri));
  socket.on('close', (code, reason) => {
    logger.warn({ code, reason: reason.toString() }, 'agent_uplink_closed');
    uplink.close('disconnected');
  });
  socket.on('error', (err) => {
    logger.error({ err }, 'agent_uplink_error');
  });

  let statusTimer: NodeJS.Timeout | undefined;
  const finished = new Promise<number>((resolve) => {
    uplink.onClose((_session, reason) => resolve(reason === 'shutdown' ? 0 : 1));
    relay.publisher?.onFatal(() => resolve(1));
    const stop = () => resolve(0);
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });

  try {
    await relay.start();
  } catch (error) {
    logger.fatal({ err: error }, 'capture_open_failed');
    await relay.shutdown();
    return 1;
  }

  if (options.statusMs > 0) {
    statusTimer = setInterval(() => {
      const stats = relay.stats();
      const link = uplink.info();
      logger.info(
        {
          producedFps: stats.published.framesPerSecond,
          version: stats.version,
          lastEnqueuedBytes: stats.frameBytes,
          queueDepth: link.queueDepth,
          sent: link.framesSent,
          dropped: link.framesDropped,
        },
        'agent_status',
      );
    }, options.statusMs);
  }

  const exitCode = await finished;
  if (statusTimer) clearInterval(statusTimer);
  await relay.shutdown();
  return exitCode;
}

async function main(): Promise<void> {
  let options: AgentOptions | 'help';
  try {
    options = parseAgentArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof AgentArgsError)) throw error;
    console.error(`${error.message}\n\n${AGENT_USAGE}`);
    process.exit(2);
  }

  if (options === 'help') {
    console.log(AGENT_USAGE);
    return;
  }

  try {
    process.exitCode = await runAgent(options);
  } catch (error) {
    logger.fatal({ err: error, uri: options.uri }, 'agent_failed');
    process.exitCode = 1;
  }
}

await main();
