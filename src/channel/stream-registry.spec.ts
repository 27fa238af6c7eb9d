import { Logger } from '@nestjs/common';
import { TestHost } from '../testing/test-host';
import { StreamRegistry } from './stream-registry';

describe('StreamRegistry', () => {
  let host: TestHost;
  let transmit: jest.Mock;
  let streams: StreamRegistry;

  beforeEach(() => {
    host = new TestHost();
    transmit = jest.fn();
    streams = new StreamRegistry({
      name: 'TestChannel',
      host,
      logger: new Logger('TestChannel'),
      transmit,
    });
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('decodes and transmits payloads by default, tagged with the topic', async () => {
    streams.streamFrom('room_5');

    host.pubsub.publish('room_5', '{"text":"hi"}');
    await host.idle();

    expect(transmit).toHaveBeenCalledTimes(1);
    expect(transmit).toHaveBeenCalledWith({ text: 'hi' }, 'streamed from room_5');
  });

  it('hands the raw payload to a custom callback', async () => {
    const callback = jest.fn();
    streams.streamFrom('room_5', callback);

    host.pubsub.publish('room_5', 'raw');
    await host.idle();

    expect(callback).toHaveBeenCalledWith('raw');
    expect(transmit).not.toHaveBeenCalled();
  });

  it('does not run callbacks inside the publisher call', async () => {
    const callback = jest.fn();
    streams.streamFrom('room_5', callback);

    host.pubsub.publish('room_5', 'raw');
    expect(callback).not.toHaveBeenCalled();

    await host.idle();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('unsubscribes each binding exactly once and stops delivery', async () => {
    const unsubscribe = jest.spyOn(host.pubsub, 'unsubscribe');
    const first = jest.fn();
    const second = jest.fn();
    streams.streamFrom('room_5', first);
    streams.streamFrom('room_5', second);
    streams.streamFrom('room_6');

    streams.stopAllStreams();
    streams.stopAllStreams();

    expect(unsubscribe).toHaveBeenCalledTimes(3);
    host.pubsub.publish('room_5', 'raw');
    host.pubsub.publish('room_6', '{}');
    await host.idle();
    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();
    expect(transmit).not.toHaveBeenCalled();
    expect(streams.size).toBe(0);
  });

  it('drops deliveries that were still queued when the stream stopped', async () => {
    const callback = jest.fn();
    streams.streamFrom('room_5', callback);

    host.pubsub.publish('room_5', 'raw');
    streams.stopAllStreams();
    await host.idle();

    expect(callback).not.toHaveBeenCalled();
  });

  it('stops one topic and leaves the others intact', async () => {
    streams.streamFrom('room_5');
    streams.streamFrom('room_6');

    streams.stopStreamFrom('room_5');
    host.pubsub.publish('room_5', '{"n":5}');
    host.pubsub.publish('room_6', '{"n":6}');
    await host.idle();

    expect(streams.topics()).toEqual(['room_6']);
    expect(transmit).toHaveBeenCalledTimes(1);
    expect(transmit).toHaveBeenCalledWith({ n: 6 }, 'streamed from room_6');
  });

  it('is a no-op without bindings', () => {
    const unsubscribe = jest.spyOn(host.pubsub, 'unsubscribe');
    streams.stopAllStreams();
    expect(unsubscribe).not.toHaveBeenCalled();
  });
});
