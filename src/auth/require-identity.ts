import { ConfigService } from '@nestjs/config';
import type { ConnectionCallback } from '../connection/connection.types';
import { parseList } from '../gateway/identity.util';
import { UnauthorizedError } from './unauthorized.error';

/** After-connect callback refusing connections whose identity lacks any of `keys`. */
export function requireIdentity(...keys: string[]): ConnectionCallback {
  return (connection) => {
    const missing = keys.filter((key) => !connection.identity[key]);
    if (missing.length > 0) {
      throw new UnauthorizedError(`Missing identity: ${missing.join(', ')}`);
    }
  };
}

/** {@link requireIdentity} over the keys the gateway identifies connections by. */
export function requireConfiguredIdentity(config: ConfigService): ConnectionCallback {
  return requireIdentity(...parseList(config.get<string>('IDENTIFIED_BY', 'user')));
}
