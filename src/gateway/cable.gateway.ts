import { WebSocketGateway, OnGatewayConnection } from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IncomingMessage } from 'http';
import WebSocket from 'ws';
import { ConnectionFactoryService } from '../connection/connection-factory.service';
import { WsTransport } from '../connection/ws-transport';
import { CLOSE_CODES } from '../protocol/envelope.types';
import { parseList, resolveIdentity } from './identity.util';

/**
 * WebSocket endpoint at `/cable`.
 *
 * Checks the origin, derives the connection identity from the request and
 * hands the socket to a new {@link Connection}, which handles everything from
 * there including its own teardown.
 */
@WebSocketGateway({
  path: '/cable'
})
export class CableGateway implements OnGatewayConnection {
  private readonly logger = new Logger(CableGateway.name);
  private readonly allowedOrigins: string[];
  private readonly identifiedBy: string[];

  constructor(
    private readonly connections: ConnectionFactoryService,
    config: ConfigService,
  ) {
    this.allowedOrigins = parseList(config.get<string>('ALLOWED_ORIGINS', 'http://localhost:3000'))
      .map((o) => o.replace(/\/+$/, ''));
    this.identifiedBy = parseList(config.get<string>('IDENTIFIED_BY', 'user'));
  }

  handleConnection(client: WebSocket, req: IncomingMessage) {
    const origin = req.headers.origin ?? '';
    if (!this.allowedOrigins.includes(origin)) {
      this.logger.warn(`Rejected connection from origin: ${origin}`);
      client.close(CLOSE_CODES.ORIGIN_NOT_ALLOWED, 'Origin not allowed');
      return;
    }

    const identity = resolveIdentity(req.url, this.identifiedBy);
    const connection = this.connections.create(new WsTransport(client, req), identity);
    connection.process();
  }
}
