import { DynamicModule, Module } from '@nestjs/common';
import { CHANNEL_CLASSES, ChannelRegistryService } from './channel-registry.service';
import type { ChannelClass } from './channel.types';

@Module({})
export class ChannelModule {
  /** Make `channels` subscribable by clients, keyed by class name. */
  static register(channels: ChannelClass[]): DynamicModule {
    return {
      module: ChannelModule,
      global: true,
      providers: [{ provide: CHANNEL_CLASSES, useValue: channels }, ChannelRegistryService],
      exports: [ChannelRegistryService],
    };
  }
}
