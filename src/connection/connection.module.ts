import { DynamicModule, FactoryProvider, Module, Provider } from '@nestjs/common';
import { PubSubModule } from '../pubsub/pubsub.module';
import { WorkerModule } from '../worker/worker.module';
import { CONNECTION_CALLBACKS, ConnectionFactoryService } from './connection-factory.service';
import { ConnectionManagerService } from './connection-manager.service';
import type { ConnectionCallbacks } from './connection.types';

type CallbacksFactory = FactoryProvider<Partial<ConnectionCallbacks>>;

export interface ConnectionModuleAsyncOptions {
  inject?: CallbacksFactory['inject'];
  useFactory: CallbacksFactory['useFactory'];
}

const withDefaults = (callbacks: Partial<ConnectionCallbacks>): ConnectionCallbacks => ({
  afterConnect: callbacks.afterConnect ?? [],
  afterDisconnect: callbacks.afterDisconnect ?? [],
});

@Module({})
export class ConnectionModule {
  static register(callbacks: Partial<ConnectionCallbacks> = {}): DynamicModule {
    return ConnectionModule.build({ provide: CONNECTION_CALLBACKS, useValue: withDefaults(callbacks) });
  }

  /** Like {@link register}, with callbacks built from injected providers such as `ConfigService`. */
  static registerAsync(options: ConnectionModuleAsyncOptions): DynamicModule {
    return ConnectionModule.build({
      provide: CONNECTION_CALLBACKS,
      inject: options.inject,
      useFactory: async (...deps: unknown[]) => withDefaults(await options.useFactory(...deps)),
    });
  }

  private static build(callbacks: Provider): DynamicModule {
    return {
      module: ConnectionModule,
      global: true,
      imports: [PubSubModule, WorkerModule],
      providers: [callbacks, ConnectionManagerService, ConnectionFactoryService],
      exports: [ConnectionManagerService, ConnectionFactoryService],
    };
  }
}
