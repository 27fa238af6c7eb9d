/**
 * Raised by an after-connect callback to refuse the connection, or by a
 * channel's `subscribed()` hook to refuse the subscription.
 */
export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}
