import type { IncomingMessage, Server } from 'node:http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { z } from 'zod';
import { isStreamError } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { FrameRelay } from '../stream/frameRelay.js';
import type { ViewerSession } from '../stream/viewerSession.js';
import {
  envelopeSchema,
  heartbeatPayloadSchema,
  ingestFrameSchema,
  toBuffer,
} from './schemas.js';
import { WebSocketTransport } from './transport.js';

export const VIEW_PATH = '/ws/view';
export const INGEST_PATH = '/ws/stream';

export const CLOSE_VIEWER_LIMIT = 4003;
export const CLOSE_INGEST_DISABLED = 4004;
export const CLOSE_PRODUCER_BUSY = 4009;

export interface WebSocketServerOptions {
  relay: FrameRelay;
  heartbeatMs: number;
  maxFrameBytes: number;
  ingestEnabled: boolean;
  logger?: Logger;
}

export interface RelaySocketServer {
  readonly wss: WebSocketServer;
  close(): Promise<void>;
}

export function registerWebSocketServer(
  httpServer: Server,
  options: WebSocketServerOptions,
): RelaySocketServer {
  const { relay } = options;
  const logger = options.logger ?? rootLogger;
  const wss = new WebSocketServer({ noServer: true, maxPayload: options.maxFrameBytes });
  const alive = new WeakSet<WebSocket>();
  const sessions = new WeakMap<WebSocket, ViewerSession>();
  const ingestSchema = ingestFrameSchema(options.maxFrameBytes);
  let producer: WebSocket | undefined;

  httpServer.on('upgrade', (request, socket, head) => {
    const path = requestPath(request);
    if (path !== VIEW_PATH && path !== INGEST_PATH) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (client) => {
      wss.emit('connection', client, request);
    });
  });

  wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
    alive.add(socket);
    socket.on('pong', () => alive.add(socket));

    if (requestPath(request) === INGEST_PATH) {
      handleProducer(socket, request);
    } else {
      handleViewer(socket, request);
    }
  });

  function handleViewer(socket: WebSocket, request: IncomingMessage): void {
    const remoteAddress = request.socket.remoteAddress;
    let session: ViewerSession;
    try {
      session = relay.connectViewer(new WebSocketTransport(socket, remoteAddress), {
        remoteAddress,
        userAgent: request.headers['user-agent'],
      });
    } catch (error) {
      logger.warn({ err: error, ip: remoteAddress }, 'viewer_rejected');
      socket.close(
        CLOSE_VIEWER_LIMIT,
        isStreamError(error, 'SESSION_FULL') ? 'Viewer limit reached' : 'Viewer rejected',
      );
      return;
    }
    sessions.set(socket, session);

    socket.on('message', (raw, isBinary) => {
      handleViewerMessage(raw, isBinary, session);
    });

    socket.on('close', () => {
      session.close('disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ err, sessionId: session.id }, 'ws_error');
      session.close('disconnected');
    });
  }

  function handleViewerMessage(raw: RawData, isBinary: boolean, session: ViewerSession): void {
    if (isBinary) {
      logger.debug({ sessionId: session.id }, 'ws_viewer_binary_ignored');
      return;
    }

    let envelope: z.infer<typeof envelopeSchema>;
    try {
      envelope = envelopeSchema.parse(JSON.parse(toBuffer(raw).toString()));
    } catch (error) {
      logger.debug({ err: error, sessionId: session.id }, 'ws_invalid_message');
      return;
    }

    if (envelope.type !== 'heartbeat') {
      logger.debug({ type: envelope.type }, 'ws_unhandled_type');
      return;
    }
    const data = heartbeatPayloadSchema.safeParse(envelope.payload ?? {});
    if (!data.success) return;
    session.markHeartbeat(data.data);
  }

  function handleProducer(socket: WebSocket, request: IncomingMessage): void {
    const ip = request.socket.remoteAddress;
    if (!options.ingestEnabled) {
      socket.close(CLOSE_INGEST_DISABLED, 'Ingest disabled');
      return;
    }
    if (producer) {
      logger.warn({ ip }, 'producer_rejected');
      socket.close(CLOSE_PRODUCER_BUSY, 'Producer already connected');
      return;
    }

    producer = socket;
    logger.info({ ip }, 'producer_connected');

    socket.on('message', (raw, isBinary) => {
      if (!isBinary) {
        logger.debug({ ip }, 'ingest_text_ignored');
        return;
      }
      const frame = ingestSchema.safeParse(toBuffer(raw));
      if (!frame.success) {
        logger.warn({ ip, reason: frame.error.issues[0]?.message }, 'ingest_frame_rejected');
        return;
      }
      relay.publish(frame.data);
    });

    socket.on('close', () => {
      if (producer === socket) producer = undefined;
      logger.info({ ip, version: relay.slot.version }, 'producer_disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ err, ip }, 'ws_error');
      socket.close();
    });
  }

  const heartbeatInterval = setInterval(() => {
    for (const client of wss.clients) {
      if (!alive.has(client)) {
        sessions.get(client)?.close('heartbeat_timeout');
        client.terminate();
        continue;
      }
      alive.delete(client);
      client.ping();
    }
  }, options.heartbeatMs);
  heartbeatInterval.unref();

  wss.on('close', () => clearInterval(heartbeatInterval));

  return {
    wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(heartbeatInterval);
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close((error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
  };
}

function requestPath(request: IncomingMessage): string {
  return new URL(request.url ?? '/', 'http://localhost').pathname;
}
