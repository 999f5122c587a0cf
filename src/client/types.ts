/**
 * Browser-side reviews client types. Nothing here depends on the DOM, so the
 * library runs against `window.localStorage`/`fetch` in the page and against
 * fakes in tests.
 */

export interface ClientReview {
  id: number;
  name: string;
  text: string;
  /** Unix seconds */
  ts: number;
}

export interface PostedReview extends ClientReview {
  /** Null in local mode, where no credential exists */
  deleteToken: string | null;
}

export interface CaptchaPrompt {
  cid: string;
  question: string;
}

export interface ReviewSubmission {
  name: string;
  text: string;
  captchaId?: string;
  captchaAnswer?: string;
}

export type BackendMode = 'remote' | 'local';

export interface ReviewsBackend {
  readonly mode: BackendMode;
  isAvailable(): Promise<boolean>;
  fetchCaptcha(): Promise<CaptchaPrompt>;
  listReviews(limit: number): Promise<ClientReview[]>;
  postReview(submission: ReviewSubmission): Promise<PostedReview>;
  deleteReview(id: number, deleteToken?: string): Promise<void>;
}

/** The subset of the Web Storage API the client uses */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export const STORAGE_KEYS = {
  name: 'reviews.name',
  deleteTokens: 'reviews.deleteTokens',
  localReviews: 'reviews.localReviews',
} as const;

export class ReviewsApiError extends Error {
  constructor(
    message: string,
    /** HTTP status, or null when the request never got a response */
    readonly status: number | null,
  ) {
    super(message);
    this.name = 'ReviewsApiError';
  }

  /** Network failure or server-side outage */
  get isUnavailable(): boolean {
    return this.status === null || this.status >= 500;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseClientReview(value: unknown): ClientReview | null {
  if (!isRecord(value)) return null;
  const { id, name, text, ts } = value;
  if (typeof id !== 'number' || typeof name !== 'string' || typeof text !== 'string' || typeof ts !== 'number') {
    return null;
  }
  return { id, name, text, ts };
}

export function readJson(storage: KeyValueStorage, key: string): unknown {
  const raw = storage.getItem(key);
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
