import type { PubSubAdapter } from '../pubsub/pubsub.types';
import type { Channel } from './channel';

export type Identity = Readonly<Record<string, string>>;

export type ChannelParams = Readonly<Record<string, unknown>>;

export type ActionPayload = Readonly<Record<string, unknown>>;

/** What a channel needs from the connection it is bound to. */
export interface ChannelHost {
  readonly identity: Identity;
  readonly pubsub: PubSubAdapter;
  transmit(data: string): void;
  dispatchAsync<A extends unknown[]>(task: (...args: A) => unknown, ...args: A): Promise<void>;
}

export type ChannelClass = new (host: ChannelHost, identifier: string, params: ChannelParams) => Channel;

export interface ChannelResolver {
  resolve(name: string): ChannelClass | undefined;
}
