import { DynamicModule, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { requireConfiguredIdentity } from '../auth/require-identity';
import { ChannelModule } from '../channel/channel.module';
import { FakeTransport } from '../testing/fake-transport';
import { WorkerPoolService } from '../worker/worker-pool.service';
import { ConnectionFactoryService } from './connection-factory.service';
import { ConnectionManagerService } from './connection-manager.service';
import { ConnectionModule } from './connection.module';

describe('ConnectionModule', () => {
  const compile = (connectionModule: DynamicModule) =>
    Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => ({ IDENTIFIED_BY: 'account' })] }),
        EventEmitterModule.forRoot(),
        ChannelModule.register([]),
        connectionModule,
      ],
    }).compile();

  const open = async (moduleRef: TestingModule, identity: Record<string, string>) => {
    const transport = new FakeTransport();
    const connection = moduleRef.get(ConnectionFactoryService).create(transport, identity);
    connection.process();
    transport.emitOpen();
    await moduleRef.get(WorkerPoolService).onIdle();
    return { connection, transport };
  };

  const close = async (moduleRef: TestingModule, transport: FakeTransport) => {
    transport.emitClose();
    await moduleRef.get(WorkerPoolService).onIdle();
  };

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('builds after-connect callbacks from configuration', async () => {
    const moduleRef = await compile(
      ConnectionModule.registerAsync({
        inject: [ConfigService],
        useFactory: (config: ConfigService) => ({ afterConnect: [requireConfiguredIdentity(config)] }),
      }),
    );

    const accepted = await open(moduleRef, { account: 'acme' });
    const refused = await open(moduleRef, { user: 'alice' });

    expect(accepted.connection.state).toBe('open');
    expect(accepted.transport.closedWith).toBeNull();
    expect(refused.connection.state).toBe('closed');
    expect(refused.transport.closedWith).toEqual({ code: 4004, reason: 'Unauthorized' });
    expect(moduleRef.get(ConnectionManagerService).size).toBe(1);

    await close(moduleRef, accepted.transport);
  });

  it('registers static callbacks', async () => {
    const afterDisconnect = jest.fn();
    const moduleRef = await compile(ConnectionModule.register({ afterDisconnect: [afterDisconnect] }));

    const { connection, transport } = await open(moduleRef, { account: 'acme' });
    await close(moduleRef, transport);

    expect(afterDisconnect).toHaveBeenCalledWith(connection);
  });
});
