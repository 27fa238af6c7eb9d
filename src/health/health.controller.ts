import { Controller, Get } from '@nestjs/common';
import { ConnectionManagerService } from '../connection/connection-manager.service';
import { WorkerPoolService } from '../worker/worker-pool.service';

/** Simple health-check endpoint at `GET /health`. */
@Controller('health')
export class HealthController {
  constructor(
    private readonly connections: ConnectionManagerService,
    private readonly workerPool: WorkerPoolService,
  ) {}

  /** Return open connection count, worker pool load, and per-connection statistics. */
  @Get()
  check() {
    return {
      status: 'ok',
      connections: this.connections.size,
      workerPool: this.workerPool.stats,
      statistics: this.connections.statistics(),
    };
  }
}
