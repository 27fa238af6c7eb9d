import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type Task = () => unknown;

interface QueuedTask {
  run: Task;
  done: () => void;
}

interface Lane {
  key: string;
  tasks: QueuedTask[];
  /** True while the lane is waiting for a worker or has a task running. */
  scheduled: boolean;
}

/**
 * Bounded executor for connection callbacks.
 *
 * Tasks are grouped into lanes (one per connection). A lane is a
 * single-consumer FIFO: its tasks run one at a time, in submission order,
 * while up to `WORKER_POOL_SIZE` lanes make progress concurrently. Lanes
 * waiting for a worker are served round-robin.
 *
 * A task never starts inside {@link invoke}; it runs on a later microtask so
 * the caller's event delivery (e.g. a socket `message` handler) returns first.
 */
@Injectable()
export class WorkerPoolService {
  private readonly logger = new Logger(WorkerPoolService.name);
  private readonly size: number;
  private readonly lanes = new Map<string, Lane>();
  private readonly ready: Lane[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(config: ConfigService) {
    this.size = Math.max(1, config.get<number>('WORKER_POOL_SIZE', 4));
  }

  /**
   * Queue a task on the given lane.
   *
   * @returns A promise that settles once the task has run. It never rejects:
   *          task failures are logged here.
   */
  invoke(laneKey: string, run: Task): Promise<void> {
    return new Promise<void>((done) => {
      let lane = this.lanes.get(laneKey);
      if (!lane) {
        lane = { key: laneKey, tasks: [], scheduled: false };
        this.lanes.set(laneKey, lane);
      }
      lane.tasks.push({ run, done });

      if (!lane.scheduled) {
        lane.scheduled = true;
        this.ready.push(lane);
      }
      this.pump();
    });
  }

  /** Resolve once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  get stats() {
    let queued = 0;
    for (const lane of this.lanes.values()) queued += lane.tasks.length;
    return {
      size: this.size,
      active: this.active,
      queued,
      lanes: this.lanes.size,
    };
  }

  private get isIdle(): boolean {
    return this.active === 0 && this.ready.length === 0;
  }

  private pump() {
    while (this.active < this.size) {
      const lane = this.ready.shift();
      if (!lane) break;
      const task = lane.tasks.shift();
      if (!task) {
        lane.scheduled = false;
        this.lanes.delete(lane.key);
        continue;
      }
      this.active++;
      void Promise.resolve()
        .then(task.run)
        .catch((err: unknown) => {
          this.logger.error(
            `Task on lane ${lane.key} failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`,
          );
        })
        .finally(() => {
          this.active--;
          task.done();
          this.release(lane);
        });
    }
  }

  private release(lane: Lane) {
    if (lane.tasks.length > 0) {
      this.ready.push(lane);
    } else {
      lane.scheduled = false;
      this.lanes.delete(lane.key);
    }
    this.pump();

    if (this.isIdle && this.idleWaiters.length > 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
