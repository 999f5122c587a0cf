import {
  CaptchaPrompt,
  ClientReview,
  PostedReview,
  ReviewSubmission,
  ReviewsApiError,
  ReviewsBackend,
  isRecord,
  parseClientReview,
} from './types';

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export interface HttpRequestInit {
  method: 'GET' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  body?: string;
  cache: 'no-store';
  credentials: 'same-origin';
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export interface RemoteBackendOptions {
  /** Prefix for every path, e.g. '' for same-origin */
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

/** Talks to the reviews HTTP surface; the identity cookie rides along same-origin */
export class RemoteReviewsBackend implements ReviewsBackend {
  readonly mode = 'remote';
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: RemoteBackendOptions = {}) {
    this.baseUrl = (options.baseUrl ?? '').replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /** Health first, then a one-item listing */
  async isAvailable(): Promise<boolean> {
    for (const path of ['/health', '/reviews?limit=1']) {
      try {
        await this.request('GET', path);
        return true;
      } catch {
        continue;
      }
    }
    return false;
  }

  async fetchCaptcha(): Promise<CaptchaPrompt> {
    const data = await this.request('GET', '/captcha');
    if (typeof data.cid !== 'string' || typeof data.question !== 'string') {
      throw new ReviewsApiError('malformed captcha response', 502);
    }
    return { cid: data.cid, question: data.question };
  }

  async listReviews(limit: number): Promise<ClientReview[]> {
    const data = await this.request('GET', `/reviews?limit=${encodeURIComponent(String(limit))}`);
    const raw = Array.isArray(data.reviews) ? data.reviews : [];
    const reviews: ClientReview[] = [];
    for (const item of raw) {
      const review = parseClientReview(item);
      if (review) reviews.push(review);
    }
    return reviews;
  }

  async postReview(submission: ReviewSubmission): Promise<PostedReview> {
    const data = await this.request('POST', '/reviews', {
      name: submission.name,
      text: submission.text,
      captcha_id: submission.captchaId,
      captcha_answer: submission.captchaAnswer,
    });
    const review = parseClientReview(data);
    if (!review) throw new ReviewsApiError('malformed review response', 502);
    return {
      ...review,
      deleteToken: typeof data.delete_token === 'string' ? data.delete_token : null,
    };
  }

  async deleteReview(id: number, deleteToken?: string): Promise<void> {
    await this.request('DELETE', `/reviews/${encodeURIComponent(String(id))}`, {
      delete_token: deleteToken,
    });
  }

  private async request(
    method: HttpRequestInit['method'],
    path: string,
    body?: Record<string, unknown>,
  ): Promise<Record<string, unknown>> {
    const init: HttpRequestInit = { method, cache: 'no-store', credentials: 'same-origin' };
    if (body !== undefined) {
      init.headers = { 'Content-Type': 'application/json' };
      init.body = JSON.stringify(body);
    }

    let res: HttpResponseLike;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    } catch (err) {
      throw new ReviewsApiError(err instanceof Error ? err.message : 'network error', null);
    }

    let data: unknown = null;
    try {
      data = await res.json();
    } catch {
      data = null;
    }
    const payload = isRecord(data) ? data : {};

    if (!res.ok) {
      const message = typeof payload.error === 'string' ? payload.error : `HTTP ${res.status}`;
      throw new ReviewsApiError(message, res.status);
    }
    return payload;
  }
}
