// src/core/http/HostResolver.ts

import type { HostClass } from './types';

export const MAX_ATTEMPTS = 4;

export const DEFAULT_PROVIDER = 'algolia';

/**
 * Resolve the host for an attempt. The first attempt goes to the DSN read
 * replica or the write master; failover attempts 1-3 target the generic
 * cluster members regardless of host class.
 */
export function resolveHost(
  applicationId: string,
  hostClass: HostClass,
  attempt: number,
  provider: string = DEFAULT_PROVIDER
): string {
  if (!Number.isInteger(attempt) || attempt < 0 || attempt >= MAX_ATTEMPTS) {
    throw new RangeError(`No host for attempt ${attempt}`);
  }

  if (attempt === 0) {
    return hostClass === 'read'
      ? `${applicationId}-dsn.${provider}.net`
      : `${applicationId}.${provider}.net`;
  }

  return `${applicationId}-${attempt}.${provider}net.com`;
}

export function buildUrl(host: string, path: string): string {
  const trimmed = path.replace(/^\/+/, '');
  return trimmed ? `https://${host}/1/indexes/${trimmed}` : `https://${host}/1/indexes`;
}
