import { isIP } from 'net';
import { InvalidTargetError } from '@muxpool/errors';
import { Authority } from './types';

const DEFAULT_PORTS: Record<string, number> = {
  'https:': 443,
  'http:': 80
};

/**
 * `host:port` as it appears in URLs, request lines and cache keys.
 * IPv6 literals are bracketed.
 */
export function authorityKey(authority: Authority): string {
  const host = isIP(authority.host) === 6 ? `[${authority.host}]` : authority.host;
  return `${host}:${authority.port}`;
}

export function toUrl(uri: string | URL): URL {
  if (uri instanceof URL) {
    return uri;
  }
  try {
    return new URL(uri);
  } catch (error) {
    throw new InvalidTargetError(uri, error instanceof Error ? error : undefined);
  }
}

export function authorityFromUri(uri: string | URL): Authority {
  const url = toUrl(uri);
  // IPv6 literals come back bracketed from URL.hostname
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  if (!host) {
    throw new InvalidTargetError(url.toString());
  }

  const port = url.port ? Number(url.port) : DEFAULT_PORTS[url.protocol];
  if (port === undefined) {
    throw new InvalidTargetError(url.toString());
  }

  return { host, port };
}
