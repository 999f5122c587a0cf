/**
 * Reviews error taxonomy. Every error carries the HTTP status it maps to and a
 * short machine-readable code; the message is what the client sees.
 */

export type ReviewsErrorCode =
  | 'validation_error'
  | 'forbidden'
  | 'not_found'
  | 'unauthorized'
  | 'service_unavailable';

export abstract class ReviewsError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: ReviewsErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or invalid input, including a failed captcha */
export class ValidationError extends ReviewsError {
  readonly statusCode = 400;
  readonly code = 'validation_error';
}

/** The device already posted under a different name */
export class ForbiddenError extends ReviewsError {
  readonly statusCode = 403;
  readonly code = 'forbidden';
}

export class NotFoundError extends ReviewsError {
  readonly statusCode = 404;
  readonly code = 'not_found';
}

/** Neither the delete token nor the identity cookie owns the review */
export class UnauthorizedError extends ReviewsError {
  readonly statusCode = 403;
  readonly code = 'unauthorized';
}

export class ServiceUnavailableError extends ReviewsError {
  readonly statusCode = 503;
  readonly code = 'service_unavailable';
}
