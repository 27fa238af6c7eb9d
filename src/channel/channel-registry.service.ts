import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ChannelClass, ChannelResolver } from './channel.types';

export const CHANNEL_CLASSES = Symbol('CHANNEL_CLASSES');

/** Resolves the `channel` named in a subscribe command to its class. */
@Injectable()
export class ChannelRegistryService implements ChannelResolver {
  private readonly logger = new Logger(ChannelRegistryService.name);
  private readonly classes = new Map<string, ChannelClass>();

  constructor(@Inject(CHANNEL_CLASSES) channels: ChannelClass[]) {
    for (const channel of channels) {
      if (this.classes.has(channel.name)) {
        throw new Error(`Duplicate channel name: ${channel.name}`);
      }
      this.classes.set(channel.name, channel);
    }
    this.logger.log(`Registered channels: ${[...this.classes.keys()].join(', ') || '(none)'}`);
  }

  resolve(name: string): ChannelClass | undefined {
    return this.classes.get(name);
  }

  get names(): string[] {
    return [...this.classes.keys()];
  }
}
