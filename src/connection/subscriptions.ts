import { Logger } from '@nestjs/common';
import type { Channel } from '../channel/channel';
import type { ChannelHost, ChannelResolver } from '../channel/channel.types';
import { InboundEnvelope, REJECTED, SUBSCRIBED, encodeEnvelope } from '../protocol/envelope.types';

/**
 * The channel instances one connection is subscribed to, keyed by the
 * client-chosen identifier, and the command protocol that manages them.
 */
export class Subscriptions {
  private readonly channels = new Map<string, Channel>();

  constructor(
    private readonly host: ChannelHost,
    private readonly resolver: ChannelResolver,
    private readonly logger: Logger,
  ) {}

  /** Route a validated envelope. Failures are logged, never thrown. */
  async executeCommand(envelope: InboundEnvelope): Promise<void> {
    try {
      switch (envelope.command) {
        case 'subscribe':
          await this.add(envelope);
          break;
        case 'unsubscribe':
          await this.remove(envelope);
          break;
        case 'message':
          await this.performAction(envelope);
          break;
      }
    } catch (err) {
      this.logger.error(
        `Could not execute command from ${JSON.stringify(envelope)}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  /**
   * Unsubscribe every channel. Each channel's failure is logged and does not
   * stop the others from being released.
   */
  async unsubscribeFromAll(): Promise<void> {
    const channels = [...this.channels.values()];
    this.channels.clear();
    for (const channel of channels) {
      try {
        await channel.unsubscribeFromChannel();
      } catch (err) {
        this.logger.error(
          `Failed to unsubscribe ${channel.identifier}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }

  identifiers(): string[] {
    return [...this.channels.keys()];
  }

  get(identifier: string): Channel | undefined {
    return this.channels.get(identifier);
  }

  private async add({ identifier, data }: InboundEnvelope) {
    if (this.channels.has(identifier)) {
      this.logger.error(`Subscription already added for identifier: ${identifier}`);
      return;
    }

    const { channel: channelName, ...params } = data;
    const ChannelClass = typeof channelName === 'string' ? this.resolver.resolve(channelName) : undefined;
    if (!ChannelClass) {
      this.logger.error(`Subscription class not found: ${JSON.stringify(channelName ?? null)}`);
      this.rejectSubscription(identifier);
      return;
    }

    const channel = new ChannelClass(this.host, identifier, params);
    if (!(await channel.subscribeToChannel())) {
      this.rejectSubscription(identifier);
      return;
    }

    this.channels.set(identifier, channel);
    this.host.transmit(encodeEnvelope(identifier, SUBSCRIBED));
  }

  private async remove({ identifier }: InboundEnvelope) {
    const channel = this.channels.get(identifier);
    if (!channel) {
      this.logger.debug(`Unsubscribe for unknown identifier: ${identifier}`);
      return;
    }
    this.channels.delete(identifier);
    await channel.unsubscribeFromChannel();
  }

  private async performAction({ identifier, data }: InboundEnvelope) {
    const channel = this.channels.get(identifier);
    if (!channel) {
      this.logger.error(`Unable to find subscription with identifier: ${identifier}`);
      return;
    }
    await channel.performAction(data);
  }

  private rejectSubscription(identifier: string) {
    this.logger.log(`Rejecting subscription ${identifier}`);
    this.host.transmit(encodeEnvelope(identifier, REJECTED));
  }
}
