import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { UnauthorizedError } from '../auth/unauthorized.error';
import type { ChannelHost, Identity } from '../channel/channel.types';
import type { PubSubAdapter } from '../pubsub/pubsub.types';
import { CLOSE_CODES, PING_IDENTIFIER, encodeEnvelope } from '../protocol/envelope.types';
import { validateEnvelope } from '../protocol/validation.util';
import {
  ConnectionCallback,
  ConnectionContext,
  ConnectionState,
  ConnectionStatistics,
  Transport,
  internalTopicFor,
} from './connection.types';
import { Heartbeat } from './heartbeat';
import { MessageBuffer } from './message-buffer';
import { Subscriptions } from './subscriptions';

/**
 * Server side of one client WebSocket session.
 *
 * Owns the transport, heartbeat, inbound message buffer and the channel
 * subscriptions multiplexed over the socket. Moves through
 * `connecting → open → closed`; every transport event is handled on the
 * connection's worker lane, so at most one of its callbacks runs at a time.
 *
 * The connection deals only with authorization and routing. Application
 * behavior lives in channels.
 */
export class Connection implements ChannelHost {
  readonly id = randomUUID();
  /** Identity values joined with `:`, or the connection id when anonymous. */
  readonly identifier: string;
  readonly startedAt = new Date();

  private readonly logger: Logger;
  private readonly heartbeat: Heartbeat;
  private readonly subscriptions: Subscriptions;
  private readonly messageBuffer: MessageBuffer;
  private status: ConnectionState = 'connecting';

  constructor(
    private readonly transport: Transport,
    readonly identity: Identity,
    private readonly context: ConnectionContext,
  ) {
    const values = Object.values(identity);
    this.identifier = values.length > 0 ? values.join(':') : this.id;

    this.logger = new Logger(`${Connection.name} ${this.identifier}`);
    this.heartbeat = new Heartbeat(() => this.beat(), context.heartbeatIntervalMs);
    this.subscriptions = new Subscriptions(this, context.channels, this.logger);
    this.messageBuffer = new MessageBuffer((message) => this.routeMessage(message));
  }

  get pubsub(): PubSubAdapter {
    return this.context.pubsub;
  }

  get state(): ConnectionState {
    return this.status;
  }

  /**
   * Bind the transport's events, or refuse the request when the transport
   * cannot be upgraded.
   */
  process() {
    this.logger.log(this.startedRequestMessage());

    if (!this.transport.possible()) {
      this.status = 'closed';
      this.respondToInvalidRequest();
      return;
    }

    this.transport.bind({
      open: () => void this.dispatchAsync(this.handleOpen),
      message: (data) => void this.dispatchAsync(this.receive, data),
      close: () => void this.dispatchAsync(this.handleClose),
      error: (err) => {
        this.logger.error(`Transport error: ${err.message}`);
        void this.dispatchAsync(this.handleClose);
      },
    });
  }

  /** Accept one inbound frame. Dropped when the transport is no longer alive. */
  async receive(data: string): Promise<void> {
    if (!this.transport.alive()) {
      this.logger.error(`Received data without a live transport: ${data}`);
      return;
    }
    await this.messageBuffer.append(data);
  }

  /** Write a raw frame. Use a channel's `transmit` to address a subscriber. */
  transmit(data: string) {
    if (!this.transport.alive()) {
      this.logger.debug(`Dropping transmit on closed transport: ${data}`);
      return;
    }
    this.transport.send(data);
  }

  close() {
    this.logger.warn('Closing connection');
    if (this.transport.alive()) {
      this.transport.close();
    }
  }

  /**
   * Run a method of this connection on its worker lane, after the current
   * call stack has returned.
   */
  dispatchAsync<A extends unknown[]>(task: (...args: A) => unknown, ...args: A): Promise<void> {
    return this.context.workerPool.invoke(this.id, () => task.apply(this, args));
  }

  statistics(): ConnectionStatistics {
    return {
      identifier: this.identifier,
      startedAt: this.startedAt.toISOString(),
      subscriptions: this.subscriptions.identifiers(),
    };
  }

  private async handleOpen(): Promise<void> {
    if (this.status !== 'connecting') return;

    this.context.manager.addConnection(this);
    try {
      await this.runCallbacks(this.context.callbacks.afterConnect, true);
    } catch (err) {
      if (!(err instanceof UnauthorizedError)) throw err;
      this.logger.warn(`Unauthorized connection: ${err.message}`);
      this.rejectUnauthorized();
      return;
    }

    this.subscribeToInternalChannel();
    this.heartbeat.start();
    this.status = 'open';

    await this.messageBuffer.processAll();
  }

  private async handleClose(): Promise<void> {
    if (this.status === 'closed') return;
    const opened = this.status === 'open';
    this.status = 'closed';
    this.logger.log(this.finishedRequestMessage());

    this.context.manager.removeConnection(this);

    await this.subscriptions.unsubscribeFromAll();
    this.unsubscribeFromInternalChannel();
    this.heartbeat.stop();

    if (opened) {
      await this.runCallbacks(this.context.callbacks.afterDisconnect, false);
    }
  }

  private async routeMessage(message: string): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(message);
    } catch {
      this.logger.error(`Received invalid JSON: ${message}`);
      return;
    }

    const envelope = validateEnvelope(parsed);
    if (!envelope) {
      this.logger.error(`Received unrecognized command in ${message}`);
      return;
    }
    await this.subscriptions.executeCommand(envelope);
  }

  /**
   * Run lifecycle callbacks in order. With `authorizing`, an
   * `UnauthorizedError` aborts the sequence and propagates; every other
   * failure is logged and the next callback runs.
   */
  private async runCallbacks(callbacks: ConnectionCallback[], authorizing: boolean) {
    for (const callback of callbacks) {
      try {
        await callback(this);
      } catch (err) {
        if (authorizing && err instanceof UnauthorizedError) throw err;
        this.logger.error(`Connection callback failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  private readonly internalChannelListener = (payload: string) => {
    void this.dispatchAsync(this.handleInternalMessage, payload);
  };

  private subscribeToInternalChannel() {
    this.context.pubsub.subscribe(internalTopicFor(this.identifier), this.internalChannelListener);
  }

  private unsubscribeFromInternalChannel() {
    this.context.pubsub.unsubscribe(internalTopicFor(this.identifier), this.internalChannelListener);
  }

  private handleInternalMessage(payload: string) {
    let message: unknown;
    try {
      message = JSON.parse(payload);
    } catch {
      this.logger.error(`Invalid internal message: ${payload}`);
      return;
    }

    if (isDisconnect(message)) {
      this.logger.log('Removing connection (remote disconnect)');
      this.close();
    } else {
      this.logger.warn(`Ignoring internal message: ${payload}`);
    }
  }

  private beat() {
    this.transmit(encodeEnvelope(PING_IDENTIFIER, Math.floor(Date.now() / 1000)));
  }

  private rejectUnauthorized() {
    this.context.manager.removeConnection(this);
    this.messageBuffer.discard();
    this.status = 'closed';
    this.respondToInvalidRequest();
  }

  private respondToInvalidRequest() {
    this.logger.log(this.finishedRequestMessage());
    if (this.transport.possible()) {
      this.transport.close(CLOSE_CODES.UNAUTHORIZED, 'Unauthorized');
    }
  }

  private startedRequestMessage(): string {
    const { path, remoteAddress } = this.transport.request;
    return `Started "${path}"${this.transport.possible() ? ' [WebSocket]' : ''} for ${remoteAddress} at ${new Date().toISOString()}`;
  }

  private finishedRequestMessage(): string {
    const { path, remoteAddress } = this.transport.request;
    return `Finished "${path}"${this.transport.possible() ? ' [WebSocket]' : ''} for ${remoteAddress} at ${new Date().toISOString()}`;
  }
}

function isDisconnect(message: unknown): boolean {
  return (
    message !== null &&
    typeof message === 'object' &&
    'type' in message &&
    message.type === 'disconnect'
  );
}
