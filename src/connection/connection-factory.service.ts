import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Identity } from '../channel/channel.types';
import { ChannelRegistryService } from '../channel/channel-registry.service';
import { PubSubService } from '../pubsub/pubsub.service';
import { WorkerPoolService } from '../worker/worker-pool.service';
import { Connection } from './connection';
import { ConnectionManagerService } from './connection-manager.service';
import type { ConnectionCallbacks, ConnectionContext, Transport } from './connection.types';

export const CONNECTION_CALLBACKS = Symbol('CONNECTION_CALLBACKS');

/** Builds {@link Connection}s wired to the application's shared services. */
@Injectable()
export class ConnectionFactoryService {
  private readonly context: ConnectionContext;

  constructor(
    pubsub: PubSubService,
    workerPool: WorkerPoolService,
    channels: ChannelRegistryService,
    manager: ConnectionManagerService,
    @Inject(CONNECTION_CALLBACKS) callbacks: ConnectionCallbacks,
    config: ConfigService,
  ) {
    this.context = {
      pubsub,
      workerPool,
      channels,
      manager,
      callbacks,
      heartbeatIntervalMs: config.get<number>('HEARTBEAT_INTERVAL_MS', 3000),
    };
  }

  create(transport: Transport, identity: Identity): Connection {
    return new Connection(transport, identity, this.context);
  }
}
