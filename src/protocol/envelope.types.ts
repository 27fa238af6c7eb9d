export const COMMANDS = ['subscribe', 'unsubscribe', 'message'] as const;

export type Command = (typeof COMMANDS)[number];

export interface InboundEnvelope {
  command: Command;
  /** Client-chosen key naming one subscription on the connection. */
  identifier: string;
  data: Record<string, unknown>;
}

export interface OutboundEnvelope {
  identifier: string;
  message: unknown;
}

/** Message body confirming a subscribe. */
export const SUBSCRIBED = 'subscribed';
/** Message body telling the client a subscribe failed or was refused. */
export const REJECTED = 'rejected';
/** Identifier used for heartbeat pings. */
export const PING_IDENTIFIER = '_ping';

export const CLOSE_CODES = {
  ORIGIN_NOT_ALLOWED: 4003,
  UNAUTHORIZED: 4004,
} as const;

export function encodeEnvelope(identifier: string, message: unknown): string {
  const envelope: OutboundEnvelope = { identifier, message };
  return JSON.stringify(envelope);
}
