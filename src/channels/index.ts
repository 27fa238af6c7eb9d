import type { ChannelClass } from '../channel/channel.types';
import { ChatChannel } from './chat.channel';

export const APP_CHANNELS: ChannelClass[] = [ChatChannel];
