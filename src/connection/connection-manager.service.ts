import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Identity } from '../channel/channel.types';
import { parseList } from '../gateway/identity.util';
import { PubSubService } from '../pubsub/pubsub.service';
import type { Connection } from './connection';
import { ConnectionStatistics, ConnectionTracker, InternalMessage, internalTopicFor } from './connection.types';

/**
 * Registry of open connections in this process.
 *
 * Connections add themselves once their transport opens and remove
 * themselves on teardown. Lookups by identity back remote disconnects and
 * the health endpoint.
 */
@Injectable()
export class ConnectionManagerService implements ConnectionTracker {
  private readonly logger = new Logger(ConnectionManagerService.name);
  private readonly connections = new Set<Connection>();
  private readonly identifiedBy: string[];

  constructor(
    private readonly pubsub: PubSubService,
    config: ConfigService,
  ) {
    this.identifiedBy = parseList(config.get<string>('IDENTIFIED_BY', 'user'));
  }

  addConnection(connection: Connection) {
    this.connections.add(connection);
    this.logger.debug(`Added connection ${connection.identifier} (${this.connections.size} open)`);
  }

  removeConnection(connection: Connection) {
    if (this.connections.delete(connection)) {
      this.logger.debug(`Removed connection ${connection.identifier} (${this.connections.size} open)`);
    }
  }

  /** Connections whose identity matches every key in `identity`. */
  connectionsFor(identity: Identity): Connection[] {
    const entries = Object.entries(identity);
    return [...this.connections].filter((connection) =>
      entries.every(([key, value]) => connection.identity[key] === value),
    );
  }

  /**
   * Ask every connection matching `identity` to close itself.
   *
   * When `identity` names every `IDENTIFIED_BY` key, the request is published
   * on the internal topic built from those values, so it reaches the
   * connection in whichever process shares the broadcast bus. Local partial
   * matches are addressed by their own identifiers.
   *
   * @returns The number of internal topics the request was published on.
   */
  disconnect(identity: Identity): number {
    const targets = new Set(this.connectionsFor(identity).map((c) => c.identifier));
    const remote = this.identifierFor(identity);
    if (remote !== null) targets.add(remote);

    const message: InternalMessage = { type: 'disconnect' };
    for (const identifier of targets) {
      this.pubsub.broadcast(internalTopicFor(identifier), message);
    }
    this.logger.log(`Requested disconnect for ${JSON.stringify(identity)} (${targets.size} identifiers)`);
    return targets.size;
  }

  statistics(): ConnectionStatistics[] {
    return [...this.connections].map((connection) => connection.statistics());
  }

  get size(): number {
    return this.connections.size;
  }

  /** Connection identifier for a full identity, in `IDENTIFIED_BY` order. */
  private identifierFor(identity: Identity): string | null {
    const values: string[] = [];
    for (const key of this.identifiedBy) {
      const value = identity[key];
      if (!value) return null;
      values.push(value);
    }
    return values.length > 0 ? values.join(':') : null;
  }
}
