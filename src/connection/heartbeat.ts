/**
 * Periodic liveness pulse for one connection. Starting twice or stopping
 * twice is a no-op; once {@link stop} returns the beat never fires again.
 */
export class Heartbeat {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly beat: () => void,
    private readonly intervalMs: number,
  ) {}

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.beat(), this.intervalMs);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
