import { Logger } from '@nestjs/common';
import type { BroadcastCallback } from '../pubsub/pubsub.types';
import type { ChannelHost } from './channel.types';

/** Handles one payload from a streamed topic. */
export type StreamCallback = (payload: string) => unknown;

interface StreamBinding {
  topic: string;
  callback: StreamCallback;
  /** The function registered on the bus. */
  listener: BroadcastCallback;
  active: boolean;
}

export interface StreamOwner {
  readonly name: string;
  readonly host: ChannelHost;
  readonly logger: Logger;
  transmit(data: unknown, via?: string): void;
}

/**
 * Bindings between one channel instance and broadcast topics.
 *
 * Bus deliveries are re-queued on the owning connection's dispatch lane, so a
 * stream callback never runs concurrently with an action on the same channel.
 * A delivery still queued when its binding stops is dropped.
 */
export class StreamRegistry {
  private bindings: StreamBinding[] = [];

  constructor(private readonly owner: StreamOwner) {}

  /**
   * Start relaying `topic` to the subscriber.
   *
   * Without a callback, each payload is JSON-decoded and transmitted as is,
   * tagged with the topic it came from.
   */
  streamFrom(topic: string, callback?: StreamCallback) {
    const binding: StreamBinding = {
      topic,
      callback: callback ?? this.defaultCallback(topic),
      listener: (payload) => {
        void this.owner.host.dispatchAsync(() => {
          if (!binding.active) return;
          return binding.callback(payload);
        });
      },
      active: true,
    };

    this.bindings.push(binding);
    this.owner.host.pubsub.subscribe(topic, binding.listener);
    this.owner.logger.log(`${this.owner.name} is streaming from ${topic}`);
  }

  /** Stop every binding on `topic`, leaving other topics untouched. */
  stopStreamFrom(topic: string) {
    const [stopping, remaining] = partition(this.bindings, (b) => b.topic === topic);
    this.bindings = remaining;
    stopping.forEach((binding) => this.release(binding));
  }

  stopAllStreams() {
    const stopping = this.bindings;
    this.bindings = [];
    stopping.forEach((binding) => this.release(binding));
  }

  topics(): string[] {
    return [...new Set(this.bindings.map((b) => b.topic))];
  }

  get size(): number {
    return this.bindings.length;
  }

  private release(binding: StreamBinding) {
    binding.active = false;
    this.owner.host.pubsub.unsubscribe(binding.topic, binding.listener);
    this.owner.logger.log(`${this.owner.name} stopped streaming from ${binding.topic}`);
  }

  private defaultCallback(topic: string): StreamCallback {
    return (payload) => {
      this.owner.transmit(JSON.parse(payload), `streamed from ${topic}`);
    };
  }
}

function partition<T>(items: T[], predicate: (item: T) => boolean): [T[], T[]] {
  const matched: T[] = [];
  const rest: T[] = [];
  for (const item of items) (predicate(item) ? matched : rest).push(item);
  return [matched, rest];
}
