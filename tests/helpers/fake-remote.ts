import {
  CaptchaPrompt,
  ClientReview,
  PostedReview,
  ReviewSubmission,
  ReviewsApiError,
  ReviewsBackend,
} from '../../src/client/types';

/** In-process stand-in for the reviews HTTP surface; set `failure` to make every call throw it */
export class FakeRemote implements ReviewsBackend {
  readonly mode = 'remote';
  available = true;
  failure: ReviewsApiError | null = null;
  probes = 0;
  reviews: ClientReview[] = [];
  readonly posted: ReviewSubmission[] = [];
  readonly deleted: Array<{ id: number; token?: string }> = [];
  private captchas = 0;
  private nextId = 1;

  async isAvailable(): Promise<boolean> {
    this.probes++;
    return this.available;
  }

  async fetchCaptcha(): Promise<CaptchaPrompt> {
    this.check();
    this.captchas++;
    return { cid: `remote-${this.captchas}`, question: '2 + 3 = ?' };
  }

  async listReviews(limit: number): Promise<ClientReview[]> {
    this.check();
    return this.reviews.slice(0, limit);
  }

  async postReview(submission: ReviewSubmission): Promise<PostedReview> {
    this.check();
    this.posted.push(submission);
    const review = { id: this.nextId++, name: submission.name, text: submission.text, ts: 100 };
    this.reviews.unshift(review);
    return { ...review, deleteToken: `tok-${review.id}` };
  }

  async deleteReview(id: number, deleteToken?: string): Promise<void> {
    this.check();
    this.deleted.push({ id, token: deleteToken });
    this.reviews = this.reviews.filter((r) => r.id !== id);
  }

  private check(): void {
    if (this.failure) throw this.failure;
  }
}
