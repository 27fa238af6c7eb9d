import { Logger } from '@nestjs/common';
import { UnauthorizedError } from '../auth/unauthorized.error';
import { encodeEnvelope } from '../protocol/envelope.types';
import { actionsOf } from './action.decorator';
import type { ActionPayload, ChannelHost, ChannelParams, Identity } from './channel.types';
import { StreamCallback, StreamRegistry } from './stream-registry';

/** Action invoked when a `message` command carries no action name. */
export const DEFAULT_ACTION = 'receive';

/**
 * Application-defined unit of behavior bound to one subscription.
 *
 * A channel instance lives from the client's `subscribe` until its
 * `unsubscribe` (or the connection closing), so instance fields can hold
 * state across actions. Methods decorated with {@link Action} are callable by
 * the client; everything else is not.
 *
 * ```ts
 * export class ChatChannel extends Channel {
 *   protected subscribed() {
 *     this.streamFrom(`chat_${this.params.room}`);
 *   }
 *
 *   @Action()
 *   speak(data: ActionPayload) {
 *     this.connection.pubsub.publish(`chat_${this.params.room}`, JSON.stringify(data));
 *   }
 * }
 * ```
 */
export abstract class Channel {
  protected readonly logger: Logger;
  private readonly streams: StreamRegistry;
  private rejected = false;

  constructor(
    protected readonly connection: ChannelHost,
    readonly identifier: string,
    readonly params: ChannelParams,
  ) {
    this.logger = new Logger(this.constructor.name);
    this.streams = new StreamRegistry({
      name: this.constructor.name,
      host: connection,
      logger: this.logger,
      transmit: (data, via) => this.transmit(data, via),
    });
  }

  get identity(): Identity {
    return this.connection.identity;
  }

  /** Topics this instance is currently streaming from. */
  get streamingTopics(): string[] {
    return this.streams.topics();
  }

  /**
   * Run the subscribe lifecycle.
   *
   * @returns `false` when the subscription was rejected or `subscribed()`
   *          threw; any streams it opened have been released by then.
   */
  async subscribeToChannel(): Promise<boolean> {
    this.logger.log(`${this.constructor.name} subscribing`);
    try {
      await this.subscribed();
    } catch (err) {
      this.rejected = true;
      if (err instanceof UnauthorizedError) {
        this.logger.warn(`${this.constructor.name} rejected: ${err.message}`);
      } else {
        this.logger.error(`${this.constructor.name} failed to subscribe: ${errorMessage(err)}`);
      }
    }

    if (this.rejected) {
      this.streams.stopAllStreams();
      return false;
    }
    return true;
  }

  /**
   * Dispatch a client `message` to the matching action.
   *
   * The action name comes from `data.action`; the rest of `data` is passed
   * to the handler unless it declares no parameters.
   */
  async performAction(data: ActionPayload): Promise<void> {
    const { action: requested, ...payload } = data;
    const action = typeof requested === 'string' && requested.length > 0 ? requested : DEFAULT_ACTION;

    const definition = actionsOf(Object.getPrototypeOf(this)).get(action);
    const method: unknown = definition && Reflect.get(this, definition.propertyKey);
    if (!definition || typeof method !== 'function') {
      this.actionMissing(action, payload);
      return;
    }

    this.logger.log(this.actionSignature(action, payload));
    const arity = definition.arity ?? method.length;
    const result: unknown = Reflect.apply(method, this, arity === 0 ? [] : [payload]);
    await result;
  }

  /**
   * Run the unsubscribe lifecycle. Streams are released even when
   * `unsubscribed()` throws or `subscribed()` never completed.
   */
  async unsubscribeFromChannel(): Promise<void> {
    try {
      await this.unsubscribed();
    } finally {
      this.streams.stopAllStreams();
      this.logger.log(`${this.constructor.name} unsubscribed`);
    }
  }

  protected actionMissing(action: string, payload: ActionPayload) {
    this.logger.error(`Unable to process ${this.actionSignature(action, payload)}`);
  }

  /** Called once the client has subscribed. Usually sets up streams. */
  protected subscribed(): void | Promise<void> {}

  /** Called when the subscription ends, for releasing external resources. */
  protected unsubscribed(): void | Promise<void> {}

  /** Refuse the subscription. Only meaningful inside `subscribed()`. */
  protected reject() {
    this.rejected = true;
  }

  /** Send `data` to this subscriber, wrapped with the channel identifier. */
  protected transmit(data: unknown, via?: string) {
    const json = JSON.stringify(data);
    this.logger.log(`${this.constructor.name} transmitting ${json}${via ? ` (via ${via})` : ''}`);
    this.connection.transmit(encodeEnvelope(this.identifier, data));
  }

  protected streamFrom(topic: string, callback?: StreamCallback) {
    this.streams.streamFrom(topic, callback);
  }

  protected stopStreamFrom(topic: string) {
    this.streams.stopStreamFrom(topic);
  }

  protected stopAllStreams() {
    this.streams.stopAllStreams();
  }

  private actionSignature(action: string, payload: ActionPayload): string {
    const signature = `${this.constructor.name}#${action}`;
    return Object.keys(payload).length > 0 ? `${signature}(${JSON.stringify(payload)})` : signature;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
