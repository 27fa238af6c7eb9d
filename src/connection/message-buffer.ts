export type MessageRouter = (message: string) => Promise<void>;

/**
 * Holds inbound messages until the connection has finished opening.
 *
 * Before {@link processAll} runs, {@link append} only queues. `processAll`
 * routes the queue in arrival order (including anything appended while it
 * drains) and then switches to direct delivery.
 */
export class MessageBuffer {
  private buffered: string[] = [];
  private processing = false;
  private draining = false;

  constructor(private readonly route: MessageRouter) {}

  async append(message: string): Promise<void> {
    if (this.processing) {
      await this.route(message);
    } else {
      this.buffered.push(message);
    }
  }

  async processAll(): Promise<void> {
    if (this.processing || this.draining) return;
    this.draining = true;
    try {
      for (let message = this.buffered.shift(); message !== undefined; message = this.buffered.shift()) {
        await this.route(message);
      }
      this.processing = true;
    } finally {
      this.draining = false;
    }
  }

  /** Drop anything still queued. */
  discard() {
    this.buffered = [];
  }

  get size(): number {
    return this.buffered.length;
  }

  get isProcessing(): boolean {
    return this.processing;
  }
}
