import type { Transport, TransportHandlers } from '../connection/connection.types';

/** In-memory transport recording every frame written to it. */
export class FakeTransport implements Transport {
  readonly request = { path: '/cable', remoteAddress: '127.0.0.1' };
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;
  private handlers: TransportHandlers | null = null;
  private isAlive = true;

  constructor(private readonly upgradable = true) {}

  bind(handlers: TransportHandlers) {
    this.handlers = handlers;
  }

  send(data: string) {
    this.sent.push(data);
  }

  close(code?: number, reason?: string) {
    this.closedWith = { code, reason };
    this.isAlive = false;
  }

  possible(): boolean {
    return this.upgradable;
  }

  alive(): boolean {
    return this.upgradable && this.isAlive;
  }

  get bound(): boolean {
    return this.handlers !== null;
  }

  /** Decoded frames, in send order. */
  get frames(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }

  emitOpen() {
    this.requireHandlers().open();
  }

  emitMessage(message: unknown) {
    this.requireHandlers().message(typeof message === 'string' ? message : JSON.stringify(message));
  }

  emitClose(code = 1000, reason = '') {
    this.isAlive = false;
    this.requireHandlers().close(code, reason);
  }

  emitError(err: Error) {
    this.requireHandlers().error(err);
  }

  private requireHandlers(): TransportHandlers {
    if (!this.handlers) throw new Error('transport not bound');
    return this.handlers;
  }
}
