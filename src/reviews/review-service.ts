/**
 * Reviews Service
 *
 * Orchestrates captcha verification, the per-device name lock and CRUD over
 * the review store. The store and captcha store are injected at startup.
 */

import { CaptchaStore, IssuedCaptcha } from '../captcha/types';
import { resolveClientId } from '../identity/client-identity';
import { CreateReviewInput, CreatedReview, ListLimits, PublicReview, Review, ReviewStore } from './types';
import { ForbiddenError, ValidationError } from './errors';
import { DEFAULT_LIST_LIMITS, clampLimit } from './review-store';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'review-service' });

export interface ReviewServiceOptions {
  limits?: ListLimits;
  nameMaxLength?: number;
  textMaxLength?: number;
}

export function toPublicReview(review: Review): PublicReview {
  return { id: review.id, name: review.name, text: review.text, ts: review.createdAt };
}

export class ReviewService {
  private readonly limits: ListLimits;
  private readonly nameMaxLength: number;
  private readonly textMaxLength: number;

  constructor(
    private readonly store: ReviewStore,
    private readonly captcha: CaptchaStore,
    options: ReviewServiceOptions = {},
  ) {
    this.limits = options.limits ?? DEFAULT_LIST_LIMITS;
    this.nameMaxLength = options.nameMaxLength ?? 80;
    this.textMaxLength = options.textMaxLength ?? 2000;
  }

  issueCaptcha(): IssuedCaptcha {
    return this.captcha.issue();
  }

  /** Newest first, only public fields */
  listReviews(rawLimit?: unknown): PublicReview[] {
    return this.store.list(clampLimit(rawLimit, this.limits)).map(toPublicReview);
  }

  /**
   * Create a review for the device identified by `identityCookie`.
   * The first post from a device must pass the captcha and fixes its name;
   * later posts must reuse that name and skip the captcha.
   */
  createReview(input: CreateReviewInput, identityCookie?: string | null): CreatedReview {
    const name = (input.name ?? '').trim();
    if (!name) throw new ValidationError('name required');
    if (input.text === undefined || input.text === null) {
      throw new ValidationError('text required');
    }
    const text = input.text.trim();

    if (name.length > this.nameMaxLength) throw new ValidationError('name too long');
    if (text.length > this.textMaxLength) throw new ValidationError('text too long');

    const { clientId, issued } = resolveClientId(identityCookie);
    const lockedName = issued ? null : this.store.findLatestNameFor(clientId);

    if (lockedName !== null && lockedName !== name) {
      log.info({ issued }, 'Name change rejected for device');
      throw new ForbiddenError('name already set for this device');
    }

    if (lockedName === null && !this.captcha.verify(input.captchaId, input.captchaAnswer)) {
      throw new ValidationError('captcha failed');
    }

    const review = this.store.insert(name, text, clientId);
    log.info({ reviewId: review.id, firstPost: lockedName === null }, 'Review created');

    return { review, clientId };
  }

  deleteReview(id: number, deleteToken: string | null | undefined, identityCookie?: string | null): void {
    this.store.deleteById(id, deleteToken, identityCookie);
  }

  isHealthy(): boolean {
    return this.store.ping();
  }
}
