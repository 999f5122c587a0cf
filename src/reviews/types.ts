/**
 * Review Types
 */

export interface Review {
  id: number;
  name: string;
  text: string;
  /** Unix seconds */
  createdAt: number;
  clientId: string;
  deleteToken: string;
}

/** The only review fields that ever leave the server in list responses */
export interface PublicReview {
  id: number;
  name: string;
  text: string;
  ts: number;
}

export interface ReviewStore {
  /** Newest first; `limit` must already be clamped */
  list(limit: number): Review[];
  insert(name: string, text: string, clientId: string): Review;
  /** Throws NotFoundError or UnauthorizedError */
  deleteById(id: number, suppliedToken: string | null | undefined, requesterClientId: string | null | undefined): void;
  findLatestNameFor(clientId: string): string | null;
  ping(): boolean;
}

export interface CreateReviewInput {
  name?: string | null;
  text?: string | null;
  captchaId?: string | null;
  captchaAnswer?: string | number | null;
}

export interface CreatedReview {
  review: Review;
  /** Client id to (re-)set in the identity cookie */
  clientId: string;
}

export interface ListLimits {
  defaultLimit: number;
  maxLimit: number;
}
