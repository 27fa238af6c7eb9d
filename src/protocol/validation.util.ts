import { COMMANDS, Command, InboundEnvelope } from './envelope.types';

function isCommand(value: unknown): value is Command {
  return typeof value === 'string' && COMMANDS.some((command) => command === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validate a decoded inbound frame. `data` may be an object, a JSON-encoded
 * object, or absent (treated as `{}`).
 */
export function validateEnvelope(raw: unknown): InboundEnvelope | null {
  if (!isRecord(raw)) return null;

  if (!isCommand(raw.command)) return null;
  if (typeof raw.identifier !== 'string' || raw.identifier.length === 0) return null;

  let data: unknown = raw.data ?? {};
  if (typeof data === 'string') {
    try {
      data = JSON.parse(data);
    } catch {
      return null;
    }
  }
  if (!isRecord(data)) return null;

  return { command: raw.command, identifier: raw.identifier, data };
}
