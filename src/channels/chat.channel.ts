import { Action } from '../channel/action.decorator';
import { Channel } from '../channel/channel';
import type { ActionPayload } from '../channel/channel.types';

/** Chat room. Subscribe with `{ channel: 'ChatChannel', room }`; `room` defaults to `lobby`. */
export class ChatChannel extends Channel {
  get topic(): string {
    const room = this.params.room;
    return `chat_${typeof room === 'string' || typeof room === 'number' ? room : 'lobby'}`;
  }

  protected subscribed() {
    this.streamFrom(this.topic);
  }

  @Action()
  speak(data: ActionPayload) {
    if (typeof data.content !== 'string' || data.content.length === 0) {
      this.logger.warn('Ignoring empty message');
      return;
    }
    this.connection.pubsub.publish(
      this.topic,
      JSON.stringify({ user: this.identity.user ?? null, content: data.content }),
    );
  }
}
