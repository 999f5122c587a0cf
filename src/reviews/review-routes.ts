import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ReviewService, toPublicReview } from './review-service';
import { NotFoundError, ValidationError } from './errors';
import { validateCreateReviewBody, validateDeleteReviewBody } from './schemas';
import { IdentityCookieConfig, identityCookieOptions } from '../identity/client-identity';
import { childLogger } from '../observability/logger';

interface ListQuery {
  limit?: string;
}

interface ReviewParams {
  id: string;
}

/**
 * Register the reviews HTTP surface:
 *   GET /captcha, GET /reviews, POST /reviews, DELETE /reviews/:id
 * Errors are thrown as ReviewsError subclasses and mapped by the app error handler.
 */
export function registerReviewRoutes(
  app: FastifyInstance,
  service: ReviewService,
  cookie: IdentityCookieConfig,
): void {
  const cookieOptions = identityCookieOptions(cookie);

  app.get('/captcha', async (_req, reply) => {
    const { challengeId, question } = service.issueCaptcha();
    return reply.send({ cid: challengeId, question });
  });

  app.get<{ Querystring: ListQuery }>('/reviews', async (req, reply) => {
    const reviews = service.listReviews(req.query.limit);
    return reply.send({ reviews });
  });

  app.post('/reviews', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = req.body ?? {};
    if (!validateCreateReviewBody(body)) {
      throw new ValidationError('invalid request body');
    }

    const { review, clientId } = service.createReview(
      {
        name: body.name,
        text: body.text,
        captchaId: body.captcha_id,
        captchaAnswer: body.captcha_answer,
      },
      req.cookies[cookie.name],
    );

    childLogger(req.id, { component: 'review-routes' }).info({ reviewId: review.id }, 'Review posted');

    const { id, name, text, ts } = toPublicReview(review);
    return reply
      .setCookie(cookie.name, clientId, cookieOptions)
      .status(201)
      .send({ id, delete_token: review.deleteToken, name, text, ts });
  });

  app.delete<{ Params: ReviewParams }>('/reviews/:id', async (req, reply) => {
    if (!/^\d+$/.test(req.params.id)) {
      throw new NotFoundError('not found');
    }

    const body = req.body ?? {};
    if (!validateDeleteReviewBody(body)) {
      throw new ValidationError('invalid request body');
    }

    service.deleteReview(Number(req.params.id), body.delete_token, req.cookies[cookie.name]);
    return reply.send({ ok: true });
  });
}
