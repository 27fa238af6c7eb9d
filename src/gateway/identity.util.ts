import type { Identity } from '../channel/channel.types';

/**
 * Build a connection identity from the query string of the upgrade request,
 * keeping only the non-empty parameters listed in `identifiedBy`.
 */
export function resolveIdentity(url: string | undefined, identifiedBy: string[]): Identity {
  const params = new URL(url ?? '/', 'http://localhost').searchParams;
  const identity: Record<string, string> = {};
  for (const key of identifiedBy) {
    const value = params.get(key);
    if (value) identity[key] = value;
  }
  return identity;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
