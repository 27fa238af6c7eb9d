import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { BroadcastCallback, PubSubAdapter } from './pubsub.types';

const eventFor = (topic: string) => `broadcast:${topic}`;

/**
 * In-process broadcast bus on top of the application's {@link EventEmitter2}.
 *
 * Server-side producers call {@link broadcast}; channels register stream
 * bindings through {@link subscribe}.
 */
@Injectable()
export class PubSubService implements PubSubAdapter {
  private readonly logger = new Logger(PubSubService.name);

  constructor(private readonly events: EventEmitter2) {}

  /** JSON-encode a message and publish it to every subscriber of `topic`. */
  broadcast(topic: string, message: unknown) {
    this.logger.debug(`Broadcasting to ${topic}: ${JSON.stringify(message)}`);
    this.publish(topic, JSON.stringify(message));
  }

  publish(topic: string, payload: string) {
    this.events.emit(eventFor(topic), payload);
  }

  subscribe(topic: string, callback: BroadcastCallback) {
    this.events.on(eventFor(topic), callback);
  }

  unsubscribe(topic: string, callback: BroadcastCallback) {
    this.events.off(eventFor(topic), callback);
  }

  subscriberCount(topic: string): number {
    return this.events.listenerCount(eventFor(topic));
  }
}
