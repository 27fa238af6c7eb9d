import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { WorkerPoolService } from './worker-pool.service';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('WorkerPoolService', () => {
  let pool: WorkerPoolService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        WorkerPoolService,
        { provide: ConfigService, useValue: new ConfigService({ WORKER_POOL_SIZE: 2 }) },
      ],
    }).compile();
    pool = moduleRef.get(WorkerPoolService);
  });

  afterEach(() => jest.restoreAllMocks());

  it('never runs a task inside invoke', async () => {
    const run = jest.fn();
    const done = pool.invoke('a', run);
    expect(run).not.toHaveBeenCalled();
    await done;
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('runs the tasks of one lane one at a time, in order', async () => {
    const order: string[] = [];
    const gate = deferred();
    void pool.invoke('a', async () => {
      order.push('a1:start');
      await gate.promise;
      order.push('a1:end');
    });
    void pool.invoke('a', () => {
      order.push('a2');
    });

    await flush();
    expect(order).toEqual(['a1:start']);

    gate.resolve();
    await pool.onIdle();
    expect(order).toEqual(['a1:start', 'a1:end', 'a2']);
  });

  it('bounds the number of concurrently running lanes', async () => {
    const started: string[] = [];
    const gate = deferred();
    for (const lane of ['a', 'b', 'c']) {
      void pool.invoke(lane, async () => {
        started.push(lane);
        await gate.promise;
      });
    }

    expect(pool.stats).toEqual({ size: 2, active: 2, queued: 1, lanes: 3 });
    await flush();
    expect(started).toEqual(['a', 'b']);

    gate.resolve();
    await pool.onIdle();
    expect(started).toEqual(['a', 'b', 'c']);
    expect(pool.stats).toEqual({ size: 2, active: 0, queued: 0, lanes: 0 });
  });

  it('logs a failing task and keeps serving its lane', async () => {
    const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const after = jest.fn();

    await expect(
      pool.invoke('a', () => {
        throw new Error('boom');
      }),
    ).resolves.toBeUndefined();
    await pool.invoke('a', after);

    expect(after).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain('Task on lane a failed');
  });

  it('resolves onIdle immediately when nothing is queued', async () => {
    await expect(pool.onIdle()).resolves.toBeUndefined();
  });
});
