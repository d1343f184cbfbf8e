/**
 * Expiry rules - a record is expired once its age exceeds the TTL
 */

import { ResourceRecord } from '../models.js';

export const MS_PER_HOUR = 60 * 60 * 1000;

export function ttlHoursToMs(ttlHours: number): number {
  return ttlHours * MS_PER_HOUR;
}

/**
 * Compute `expires_at` for a creation time
 */
export function computeExpiresAt(createdAt: Date, ttlMs: number): string {
  return new Date(createdAt.getTime() + ttlMs).toISOString();
}

/**
 * Strictly older than the TTL. Unparseable timestamps count as the epoch.
 */
export function isExpired(record: Pick<ResourceRecord, 'created_at'>, now: Date, ttlMs: number): boolean {
  const created = Date.parse(record.created_at);
  const createdMs = Number.isNaN(created) ? 0 : created;
  return now.getTime() - createdMs > ttlMs;
}

/**
 * URIs of every expired record
 */
export function findExpired(records: Iterable<ResourceRecord>, now: Date, ttlMs: number): string[] {
  const expired: string[] = [];
  for (const record of records) {
    if (isExpired(record, now, ttlMs)) {
      expired.push(record.uri);
    }
  }
  return expired;
}
