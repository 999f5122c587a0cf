/**
 * SQLite Review Store
 *
 * Owns the `reviews` table. Delete credentials are compared in constant time;
 * the identity cookie is the fallback owner check.
 */

import { createHash, randomBytes, timingSafeEqual } from 'crypto';
import { Review, ReviewStore, ListLimits } from './types';
import { NotFoundError, UnauthorizedError } from './errors';
import { ReviewsDatabase, withStorage } from '../storage/database';
import { Clock, systemClock } from '../storage/clock';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'review-store' });

export const DEFAULT_LIST_LIMITS: ListLimits = { defaultLimit: 200, maxLimit: 500 };

interface ReviewRow {
  id: number;
  name: string;
  text: string;
  ts: number;
  client_id: string | null;
  delete_token: string;
}

function toReview(row: ReviewRow): Review {
  return {
    id: row.id,
    name: row.name,
    text: row.text,
    createdAt: row.ts,
    clientId: row.client_id ?? '',
    deleteToken: row.delete_token,
  };
}

/** URL-safe, 192 bits */
export function generateDeleteToken(): string {
  return randomBytes(24).toString('base64url');
}

/** Digests first so differing lengths don't short-circuit the comparison */
export function tokensMatch(supplied: string, stored: string): boolean {
  const a = createHash('sha256').update(supplied).digest();
  const b = createHash('sha256').update(stored).digest();
  return timingSafeEqual(a, b);
}

/**
 * Sanitize a raw `limit` query value. Only the first 4 characters are read;
 * anything that isn't an integer falls back to the default, and the result is
 * clamped to [1, maxLimit].
 */
export function clampLimit(raw: unknown, limits: ListLimits = DEFAULT_LIST_LIMITS): number {
  let value = limits.defaultLimit;
  if (typeof raw === 'number' && Number.isInteger(raw)) {
    value = raw;
  } else if (typeof raw === 'string' && raw.length > 0) {
    const head = raw.slice(0, 4).trim();
    if (/^[+-]?\d+$/.test(head)) value = parseInt(head, 10);
  }
  return Math.min(Math.max(value, 1), limits.maxLimit);
}

export class SqliteReviewStore implements ReviewStore {
  private readonly clock: Clock;

  constructor(
    private readonly db: ReviewsDatabase,
    clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  list(limit: number): Review[] {
    return withStorage('reviews.list', () =>
      this.db
        .prepare<[number], ReviewRow>(
          'SELECT id, name, text, ts, client_id, delete_token FROM reviews ORDER BY ts DESC, id DESC LIMIT ?',
        )
        .all(limit)
        .map(toReview),
    );
  }

  insert(name: string, text: string, clientId: string): Review {
    const deleteToken = generateDeleteToken();
    const ts = this.clock();

    const result = withStorage('reviews.insert', () =>
      this.db
        .prepare<[string, string, number, string, string]>(
          'INSERT INTO reviews(name, text, ts, client_id, delete_token) VALUES (?, ?, ?, ?, ?)',
        )
        .run(name, text, ts, clientId, deleteToken),
    );

    return {
      id: Number(result.lastInsertRowid),
      name,
      text,
      createdAt: ts,
      clientId,
      deleteToken,
    };
  }

  deleteById(
    id: number,
    suppliedToken: string | null | undefined,
    requesterClientId: string | null | undefined,
  ): void {
    withStorage('reviews.delete', () => {
      const row = this.db
        .prepare<[number], Pick<ReviewRow, 'delete_token' | 'client_id'>>(
          'SELECT delete_token, client_id FROM reviews WHERE id = ?',
        )
        .get(id);
      if (!row) throw new NotFoundError('not found');

      const byToken = !!suppliedToken && tokensMatch(suppliedToken, row.delete_token);
      const byCookie = !byToken && !!requesterClientId && requesterClientId === row.client_id;

      if (!byToken && !byCookie) {
        throw new UnauthorizedError('unauthorized');
      }

      this.db.prepare<[number]>('DELETE FROM reviews WHERE id = ?').run(id);
      log.info({ reviewId: id, via: byToken ? 'token' : 'cookie' }, 'Review deleted');
    });
  }

  findLatestNameFor(clientId: string): string | null {
    return withStorage('reviews.latestName', () => {
      const row = this.db
        .prepare<[string], Pick<ReviewRow, 'name'>>(
          'SELECT name FROM reviews WHERE client_id = ? ORDER BY ts DESC, id DESC LIMIT 1',
        )
        .get(clientId);
      return row?.name ?? null;
    });
  }

  ping(): boolean {
    return withStorage('reviews.ping', () => {
      const row = this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
      return row?.ok === 1;
    });
  }
}
