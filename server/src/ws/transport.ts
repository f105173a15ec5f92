import WebSocket from 'ws';
import { StreamError } from '../lib/errors.js';
import type { FrameTransport } from '../types.js';

/** The slice of a `ws` socket the transport relies on. */
export interface BinarySocket {
  readonly readyState: number;
  send(data: Buffer, options: { binary: boolean }, cb: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

/** Binary-frame transport over a `ws` socket (server side or client side). */
export class WebSocketTransport implements FrameTransport {
  constructor(
    private readonly socket: BinarySocket,
    readonly remoteAddress?: string,
  ) {}

  send(payload: Buffer): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new StreamError('TRANSPORT_CLOSED', 'Socket is not open'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(payload, { binary: true }, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    if (
      this.socket.readyState === WebSocket.CLOSING ||
      this.socket.readyState === WebSocket.CLOSED
    ) {
      return;
    }
    this.socket.close(code, reason);
  }

  terminate(): void {
    if (this.socket.readyState === WebSocket.CLOSED) return;
    this.socket.terminate();
  }
}
