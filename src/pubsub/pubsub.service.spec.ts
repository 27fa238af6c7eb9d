import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test } from '@nestjs/testing';
import { PubSubService } from './pubsub.service';

describe('PubSubService', () => {
  let pubsub: PubSubService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [EventEmitterModule.forRoot()],
      providers: [PubSubService],
    }).compile();
    pubsub = moduleRef.get(PubSubService);
  });

  it('delivers a published payload to every subscriber of that topic only', () => {
    const first = jest.fn();
    const second = jest.fn();
    const other = jest.fn();
    pubsub.subscribe('room_5', first);
    pubsub.subscribe('room_5', second);
    pubsub.subscribe('room_6', other);

    pubsub.publish('room_5', '{"n":1}');

    expect(first).toHaveBeenCalledWith('{"n":1}');
    expect(second).toHaveBeenCalledWith('{"n":1}');
    expect(other).not.toHaveBeenCalled();
  });

  it('unsubscribes exactly the given callback', () => {
    const kept = jest.fn();
    const dropped = jest.fn();
    pubsub.subscribe('room_5', kept);
    pubsub.subscribe('room_5', dropped);

    pubsub.unsubscribe('room_5', dropped);
    pubsub.publish('room_5', 'x');

    expect(kept).toHaveBeenCalledTimes(1);
    expect(dropped).not.toHaveBeenCalled();
    expect(pubsub.subscriberCount('room_5')).toBe(1);
  });

  it('JSON-encodes broadcast messages', () => {
    const callback = jest.fn();
    pubsub.subscribe('news', callback);

    pubsub.broadcast('news', { headline: 'hello' });

    expect(callback).toHaveBeenCalledWith('{"headline":"hello"}');
  });
});
