import { openDatabase, ReviewsDatabase } from '../../src/storage/database';
import { SqliteReviewStore, clampLimit, tokensMatch } from '../../src/reviews/review-store';
import { NotFoundError, ServiceUnavailableError, UnauthorizedError } from '../../src/reviews/errors';

describe('SqliteReviewStore', () => {
  let db: ReviewsDatabase;
  let now: number;
  let store: SqliteReviewStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    now = 1_700_000_000;
    store = new SqliteReviewStore(db, () => now);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  describe('insert', () => {
    it('should assign increasing ids, the current time and a url-safe delete token', () => {
      const first = store.insert('Alice', 'Nice site', 'client-a');
      now += 5;
      const second = store.insert('Bob', 'Thanks', 'client-b');

      expect(second.id).toBeGreaterThan(first.id);
      expect(first.createdAt).toBe(1_700_000_000);
      expect(second.createdAt).toBe(1_700_000_005);
      expect(first.deleteToken).toMatch(/^[A-Za-z0-9_-]{32}$/);
      expect(first.deleteToken).not.toBe(second.deleteToken);
      expect(first.clientId).toBe('client-a');
    });
  });

  describe('list', () => {
    it('should return the most recent reviews first, up to the limit', () => {
      for (let i = 1; i <= 5; i++) {
        now = 1_000 + i;
        store.insert('Alice', `review ${i}`, 'client-a');
      }

      const reviews = store.list(2);
      expect(reviews.map((r) => r.text)).toEqual(['review 5', 'review 4']);
    });

    it('should break timestamp ties by insertion order, newest first', () => {
      store.insert('Alice', 'first', 'client-a');
      store.insert('Bob', 'second', 'client-b');
      store.insert('Cara', 'third', 'client-c');

      expect(store.list(10).map((r) => r.text)).toEqual(['third', 'second', 'first']);
    });

    it('should return an empty list for an empty store', () => {
      expect(store.list(10)).toEqual([]);
    });
  });

  describe('findLatestNameFor', () => {
    it('should return the name of the newest review by that client', () => {
      now = 100;
      store.insert('Alice', 'one', 'client-a');
      now = 200;
      store.insert('Alicia', 'two', 'client-a');
      store.insert('Bob', 'three', 'client-b');

      expect(store.findLatestNameFor('client-a')).toBe('Alicia');
      expect(store.findLatestNameFor('client-b')).toBe('Bob');
      expect(store.findLatestNameFor('client-z')).toBeNull();
    });
  });

  describe('deleteById', () => {
    it('should delete with the correct token exactly once', () => {
      const review = store.insert('Alice', 'bye', 'client-a');

      store.deleteById(review.id, review.deleteToken, null);
      expect(store.list(10)).toEqual([]);
      expect(() => store.deleteById(review.id, review.deleteToken, null)).toThrow(NotFoundError);
    });

    it('should reject a wrong token from a different client', () => {
      const review = store.insert('Alice', 'keep', 'client-a');

      expect(() => store.deleteById(review.id, 'not-the-token', 'client-b')).toThrow(UnauthorizedError);
      expect(() => store.deleteById(review.id, undefined, undefined)).toThrow(UnauthorizedError);
      expect(store.list(10)).toHaveLength(1);
    });

    it('should fall back to the client id when no token is supplied', () => {
      const review = store.insert('Alice', 'mine', 'client-a');

      store.deleteById(review.id, undefined, 'client-a');
      expect(store.list(10)).toEqual([]);
    });

    it('should fall back to the client id when the token does not match', () => {
      const review = store.insert('Alice', 'mine', 'client-a');

      store.deleteById(review.id, 'stale-token', 'client-a');
      expect(store.list(10)).toEqual([]);
    });

    it('should report unknown ids as not found', () => {
      expect(() => store.deleteById(999, 'anything', 'client-a')).toThrow(NotFoundError);
    });
  });

  describe('storage failures', () => {
    it('should surface a closed database as service unavailable', () => {
      db.close();
      expect(() => store.list(5)).toThrow(ServiceUnavailableError);
      expect(() => store.insert('Alice', 'x', 'client-a')).toThrow(ServiceUnavailableError);
    });

    it('should report liveness through ping', () => {
      expect(store.ping()).toBe(true);
    });
  });
});

describe('clampLimit', () => {
  const limits = { defaultLimit: 200, maxLimit: 500 };

  it('should use the default for missing or non-numeric input', () => {
    expect(clampLimit(undefined, limits)).toBe(200);
    expect(clampLimit('', limits)).toBe(200);
    expect(clampLimit('abc', limits)).toBe(200);
    expect(clampLimit('12abc', limits)).toBe(200);
  });

  it('should parse small integers', () => {
    expect(clampLimit('2', limits)).toBe(2);
    expect(clampLimit(' 7', limits)).toBe(7);
    expect(clampLimit(7, limits)).toBe(7);
  });

  it('should only read the first four characters', () => {
    expect(clampLimit('300000', limits)).toBe(500);
    expect(clampLimit('0042', limits)).toBe(42);
  });

  it('should clamp to at least one', () => {
    expect(clampLimit('0', limits)).toBe(1);
    expect(clampLimit('-5', limits)).toBe(1);
  });
});

describe('tokensMatch', () => {
  it('should compare tokens of any length', () => {
    expect(tokensMatch('abc', 'abc')).toBe(true);
    expect(tokensMatch('abc', 'abd')).toBe(false);
    expect(tokensMatch('abc', 'abcdef')).toBe(false);
    expect(tokensMatch('', 'abc')).toBe(false);
  });
});
