import type { ChannelResolver } from '../channel/channel.types';
import type { PubSubAdapter } from '../pubsub/pubsub.types';
import type { Task } from '../worker/worker-pool.service';
import type { Connection } from './connection';

export type ConnectionState = 'connecting' | 'open' | 'closed';

export interface TransportHandlers {
  open(): void;
  message(data: string): void;
  close(code: number, reason: string): void;
  error(err: Error): void;
}

/** Socket-level handle for one client session. */
export interface Transport {
  /** Request line details, for logging. */
  readonly request: { path: string; remoteAddress: string };
  bind(handlers: TransportHandlers): void;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  /** Whether the session can be (or has been) upgraded. */
  possible(): boolean;
  /** Whether frames can currently be written. */
  alive(): boolean;
}

export type ConnectionCallback = (connection: Connection) => void | Promise<void>;

export interface ConnectionCallbacks {
  /** Run in order on open. An `UnauthorizedError` refuses the connection. */
  afterConnect: ConnectionCallback[];
  /** Run in order after teardown; failures are logged and skipped. */
  afterDisconnect: ConnectionCallback[];
}

export interface ConnectionTracker {
  addConnection(connection: Connection): void;
  removeConnection(connection: Connection): void;
}

export interface TaskExecutor {
  invoke(laneKey: string, task: Task): Promise<void>;
}

/** Shared collaborators every connection is built with. */
export interface ConnectionContext {
  readonly pubsub: PubSubAdapter;
  readonly workerPool: TaskExecutor;
  readonly channels: ChannelResolver;
  readonly manager: ConnectionTracker;
  readonly callbacks: ConnectionCallbacks;
  readonly heartbeatIntervalMs: number;
}

export interface ConnectionStatistics {
  identifier: string;
  startedAt: string;
  subscriptions: string[];
}

/** Control messages published on a connection's internal topic. */
export interface InternalMessage {
  type: 'disconnect';
}

export const internalTopicFor = (connectionIdentifier: string) => `cable_internal/${connectionIdentifier}`;
