import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import envConfig from './config/env.config';
import { requireConfiguredIdentity } from './auth/require-identity';
import { ChannelModule } from './channel/channel.module';
import { APP_CHANNELS } from './channels';
import { ConnectionModule } from './connection/connection.module';
import { GatewayModule } from './gateway/gateway.module';
import { HealthController } from './health/health.controller';
import { PubSubModule } from './pubsub/pubsub.module';
import { WorkerModule } from './worker/worker.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [envConfig] }),
    // Every stream binding is one listener; many clients share hot topics.
    EventEmitterModule.forRoot({ maxListeners: 0 }),
    PubSubModule,
    WorkerModule,
    ChannelModule.register(APP_CHANNELS),
    ConnectionModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({ afterConnect: [requireConfiguredIdentity(config)] }),
    }),
    GatewayModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
