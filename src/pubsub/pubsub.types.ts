/** Receives the raw (encoded) payload published to a topic. */
export type BroadcastCallback = (payload: string) => void;

/**
 * Topic bus used for broadcasting. Delivery is best-effort and may happen
 * from the bus's own delivery context; callbacks are matched by reference on
 * unsubscribe.
 */
export interface PubSubAdapter {
  publish(topic: string, payload: string): void;
  subscribe(topic: string, callback: BroadcastCallback): void;
  unsubscribe(topic: string, callback: BroadcastCallback): void;
}
