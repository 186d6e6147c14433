import { IncomingHttpHeaders } from 'http';
import { ConfigStore } from '../config';

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Token presented by a caller, from `Authorization: Bearer <token>` or, failing that,
 * a `token` query parameter.
 */
export function extractToken(headers: IncomingHttpHeaders, url: string | undefined): string | null {
  const header = headers.authorization;
  if (header && BEARER_PREFIX.test(header)) {
    const token = header.replace(BEARER_PREFIX, '').trim();
    if (token) {
      return token;
    }
  }

  const query = new URL(url ?? '/', 'http://localhost').searchParams.get('token');
  return query ? query : null;
}

export function isAuthorized(
  config: ConfigStore,
  headers: IncomingHttpHeaders,
  url: string | undefined
): boolean {
  if (!config.get('authEnabled')) {
    return true;
  }
  const token = extractToken(headers, url);
  return token !== null && token === config.get('authToken');
}
