/**
 * Local-storage reviews backend, used when the server can't be reached.
 *
 * This is a single-device convenience, not a security boundary: the captcha
 * is computed in the page, the name lock lives in storage the user controls,
 * and anyone can fabricate ownership. Nothing posted here is shared.
 */

import {
  CaptchaPrompt,
  ClientReview,
  KeyValueStorage,
  PostedReview,
  ReviewSubmission,
  ReviewsApiError,
  ReviewsBackend,
  STORAGE_KEYS,
  parseClientReview,
  readJson,
} from './types';

export const LOCAL_REVIEW_CAP = 500;

export interface LocalBackendOptions {
  /** Uniform in [0, 1) */
  random?: () => number;
  /** Milliseconds */
  now?: () => number;
}

export class LocalReviewsBackend implements ReviewsBackend {
  readonly mode = 'local';
  private readonly answers = new Map<string, string>();
  private readonly random: () => number;
  private readonly now: () => number;
  private issued = 0;

  constructor(
    private readonly storage: KeyValueStorage,
    options: LocalBackendOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async fetchCaptcha(): Promise<CaptchaPrompt> {
    const a = Math.floor(this.random() * 8) + 2;
    const b = Math.floor(this.random() * 8) + 1;
    const cid = `local-${++this.issued}`;
    this.answers.set(cid, String(a + b));
    return { cid, question: `${a} + ${b} = ?` };
  }

  async listReviews(limit: number): Promise<ClientReview[]> {
    return this.load().slice(0, limit);
  }

  async postReview(submission: ReviewSubmission): Promise<PostedReview> {
    const locked = this.storage.getItem(STORAGE_KEYS.name);
    if (locked && locked !== submission.name) {
      throw new ReviewsApiError('name already set for this device', 403);
    }
    if (!locked) {
      const expected = submission.captchaId ? this.answers.get(submission.captchaId) : undefined;
      if (expected === undefined || (submission.captchaAnswer ?? '').trim() !== expected) {
        throw new ReviewsApiError('captcha failed', 400);
      }
      this.answers.delete(submission.captchaId ?? '');
    }

    const reviews = this.load();
    const nowMs = this.now();
    const review: ClientReview = {
      id: Math.max(nowMs, (reviews[0]?.id ?? 0) + 1),
      name: submission.name,
      text: submission.text,
      ts: Math.floor(nowMs / 1000),
    };
    this.save([review, ...reviews].slice(0, LOCAL_REVIEW_CAP));
    return { ...review, deleteToken: null };
  }

  /** Allowed when no name is set on this device or the names match */
  async deleteReview(id: number): Promise<void> {
    const reviews = this.load();
    const index = reviews.findIndex((r) => r.id === id);
    if (index === -1) throw new ReviewsApiError('not found', 404);

    const name = this.storage.getItem(STORAGE_KEYS.name);
    if (name && reviews[index].name !== name) {
      throw new ReviewsApiError('unauthorized', 403);
    }
    reviews.splice(index, 1);
    this.save(reviews);
  }

  private load(): ClientReview[] {
    const data = readJson(this.storage, STORAGE_KEYS.localReviews);
    if (!Array.isArray(data)) return [];
    const reviews: ClientReview[] = [];
    for (const item of data) {
      const review = parseClientReview(item);
      if (review) reviews.push(review);
    }
    return reviews;
  }

  private save(reviews: ClientReview[]): void {
    this.storage.setItem(STORAGE_KEYS.localReviews, JSON.stringify(reviews));
  }
}
