/**
 * Reviews Session
 *
 * Page-side state for the reviews widget: the cached display name, the map of
 * delete tokens for reviews posted from this device, and the current captcha.
 * One backend is picked by a connectivity probe at start; a remote outage
 * switches the session to the local backend for the rest of its life.
 */

import {
  BackendMode,
  CaptchaPrompt,
  ClientReview,
  KeyValueStorage,
  PostedReview,
  ReviewsApiError,
  ReviewsBackend,
  STORAGE_KEYS,
  isRecord,
  readJson,
} from './types';

export interface ReviewsSessionOptions {
  remote: ReviewsBackend;
  local: ReviewsBackend;
  storage: KeyValueStorage;
  listLimit?: number;
}

export interface SubmitInput {
  /** Ignored once a name is cached for this device */
  name?: string;
  text: string;
  captchaAnswer?: string;
}

export async function detectBackend(remote: ReviewsBackend, local: ReviewsBackend): Promise<ReviewsBackend> {
  return (await remote.isAvailable()) ? remote : local;
}

export class ReviewsSession {
  private captcha: CaptchaPrompt | null = null;
  private readonly listLimit: number;

  private constructor(
    private backend: ReviewsBackend,
    private readonly options: ReviewsSessionOptions,
  ) {
    this.listLimit = options.listLimit ?? 200;
  }

  static async start(options: ReviewsSessionOptions): Promise<ReviewsSession> {
    const backend = await detectBackend(options.remote, options.local);
    const session = new ReviewsSession(backend, options);
    try {
      await session.refreshCaptcha();
    } catch (err) {
      // An outage here has already moved the session to local mode
      if (!(err instanceof ReviewsApiError && err.isUnavailable)) throw err;
    }
    return session;
  }

  get mode(): BackendMode {
    return this.backend.mode;
  }

  get displayName(): string | null {
    return this.options.storage.getItem(STORAGE_KEYS.name);
  }

  get currentCaptcha(): CaptchaPrompt | null {
    return this.captcha;
  }

  async refreshCaptcha(): Promise<CaptchaPrompt> {
    const captcha = await this.run((backend) => backend.fetchCaptcha());
    this.captcha = captcha;
    return captcha;
  }

  async loadReviews(): Promise<ClientReview[]> {
    return this.run((backend) => backend.listReviews(this.listLimit));
  }

  async submit(input: SubmitInput): Promise<PostedReview> {
    const cached = this.displayName;
    const name = cached ?? (input.name ?? '').trim();
    if (!name) throw new ReviewsApiError('name required', 400);
    if (!cached && !(input.captchaAnswer ?? '').trim()) {
      throw new ReviewsApiError('captcha answer required', 400);
    }
    const text = input.text.trim();
    if (!text) throw new ReviewsApiError('text required', 400);

    const posted = await this.run((backend) =>
      backend.postReview({
        name,
        text,
        captchaId: this.captcha?.cid,
        captchaAnswer: input.captchaAnswer?.trim(),
      }),
    );

    this.options.storage.setItem(STORAGE_KEYS.name, name);
    if (posted.deleteToken) {
      this.saveTokens({ ...this.loadTokens(), [String(posted.id)]: posted.deleteToken });
    }
    await this.refreshCaptcha();
    return posted;
  }

  /** Whether the widget should offer a delete button for this review */
  canDelete(review: ClientReview): boolean {
    if (this.loadTokens()[String(review.id)]) return true;
    return this.mode === 'local' && this.displayName === review.name;
  }

  async remove(id: number): Promise<void> {
    const tokens = this.loadTokens();
    await this.run((backend) => backend.deleteReview(id, tokens[String(id)]));
    delete tokens[String(id)];
    this.saveTokens(tokens);
  }

  /** Forget the cached name locally; the server-side lock stays with the cookie */
  resetName(): void {
    this.options.storage.removeItem(STORAGE_KEYS.name);
  }

  private async run<T>(op: (backend: ReviewsBackend) => Promise<T>): Promise<T> {
    try {
      return await op(this.backend);
    } catch (err) {
      if (this.backend.mode === 'remote' && err instanceof ReviewsApiError && err.isUnavailable) {
        this.backend = this.options.local;
        this.captcha = await this.options.local.fetchCaptcha();
      }
      throw err;
    }
  }

  private loadTokens(): Record<string, string> {
    const data = readJson(this.options.storage, STORAGE_KEYS.deleteTokens);
    const tokens: Record<string, string> = {};
    if (!isRecord(data)) return tokens;
    for (const [id, token] of Object.entries(data)) {
      if (typeof token === 'string') tokens[id] = token;
    }
    return tokens;
  }

  private saveTokens(tokens: Record<string, string>): void {
    this.options.storage.setItem(STORAGE_KEYS.deleteTokens, JSON.stringify(tokens));
  }
}
