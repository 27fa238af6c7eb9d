import { Logger } from '@nestjs/common';
import { IncomingMessage } from 'http';
import WebSocket from 'ws';
import type { Transport, TransportHandlers } from './connection.types';

/** {@link Transport} over a server-side `ws` socket. */
export class WsTransport implements Transport {
  private readonly logger = new Logger(WsTransport.name);
  readonly request: { path: string; remoteAddress: string };

  constructor(
    private readonly ws: WebSocket,
    req: IncomingMessage,
  ) {
    this.request = {
      path: req.url ?? '/',
      remoteAddress: req.socket.remoteAddress ?? 'unknown',
    };
  }

  /**
   * Forward socket events. Sockets handed over by the server are already
   * open, so `open` is then emitted on the next tick instead of by `ws`.
   */
  bind(handlers: TransportHandlers) {
    this.ws.on('message', (data: WebSocket.RawData) => handlers.message(data.toString()));
    this.ws.on('close', (code: number, reason: Buffer) => handlers.close(code, reason.toString()));
    this.ws.on('error', (err: Error) => handlers.error(err));

    if (this.ws.readyState === WebSocket.OPEN) {
      setImmediate(() => handlers.open());
    } else {
      this.ws.once('open', () => handlers.open());
    }
  }

  send(data: string) {
    try {
      this.ws.send(data);
    } catch (err) {
      this.logger.error(`Failed to send: ${err}`);
    }
  }

  close(code?: number, reason?: string) {
    this.ws.close(code, reason);
  }

  possible(): boolean {
    return this.ws.readyState === WebSocket.CONNECTING || this.ws.readyState === WebSocket.OPEN;
  }

  alive(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }
}
