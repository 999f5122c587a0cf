import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import { v4 as uuidv4 } from 'uuid';
import { env } from './config/env';
import { logger } from './observability/logger';
import { ReviewsDatabase, openDatabase } from './storage/database';
import { Clock, systemClock } from './storage/clock';
import { SqliteCaptchaStore } from './captcha/captcha-store';
import { SqliteReviewStore } from './reviews/review-store';
import { ReviewService } from './reviews/review-service';
import { ReviewsError, ValidationError } from './reviews/errors';
import { ListLimits } from './reviews/types';
import { IdentityCookieConfig } from './identity/client-identity';
import { registerReviewRoutes } from './reviews/review-routes';
import { registerHealthRoutes } from './health/health-routes';
import { loadClientBundle, registerSiteRoutes } from './site/site-routes';
import { loadSiteConfig } from './site/site-config';

export interface AppOptions {
  dbPath: string;
  captchaTtlSeconds: number;
  limits: ListLimits;
  nameMaxLength: number;
  textMaxLength: number;
  identityCookie: IdentityCookieConfig;
  corsOrigins: string[];
  siteConfigPath: string;
  /** Browser bundle of src/client, written by the build */
  clientBundlePath: string;
  clock: Clock;
}

export interface AppContext {
  app: FastifyInstance;
  db: ReviewsDatabase;
  service: ReviewService;
}

export function appOptionsFromEnv(): AppOptions {
  return {
    dbPath: env.storage.dbPath,
    captchaTtlSeconds: env.captcha.ttlSeconds,
    limits: { defaultLimit: env.reviews.defaultLimit, maxLimit: env.reviews.maxLimit },
    nameMaxLength: env.reviews.nameMaxLength,
    textMaxLength: env.reviews.textMaxLength,
    identityCookie: {
      name: env.identity.cookieName,
      maxAgeDays: env.identity.maxAgeDays,
      secure: env.identity.secure,
    },
    corsOrigins: [...env.cors.origins],
    siteConfigPath: env.site.configPath,
    clientBundlePath: env.site.clientBundlePath,
    clock: systemClock,
  };
}

export async function buildApp(overrides: Partial<AppOptions> = {}): Promise<AppContext> {
  const options: AppOptions = { ...appOptionsFromEnv(), ...overrides };

  // Initialize Fastify
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 65_536,
    genReqId: () => uuidv4(),
  });

  if (options.corsOrigins.length > 0) {
    await app.register(cors, {
      origin: options.corsOrigins,
      credentials: true,
      methods: ['GET', 'POST', 'DELETE'],
    });
  }

  await app.register(cookie);

  // DELETE requests may carry an empty JSON body
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, raw, done) => {
    const body = raw.toString();
    if (body.trim() === '') {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(body));
    } catch {
      done(new ValidationError('invalid JSON body'), undefined);
    }
  });

  app.setErrorHandler((err: FastifyError | ReviewsError, req, reply) => {
    if (err instanceof ReviewsError) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    logger.error({ err, requestId: req.id, url: req.url }, 'Unhandled request error');
    return reply.status(500).send({ error: 'internal error' });
  });

  app.setNotFoundHandler((_req, reply) => {
    return reply.status(404).send({ error: 'not found' });
  });

  // ───── Storage & Services ─────
  const db = openDatabase(options.dbPath);
  const captchaStore = new SqliteCaptchaStore(db, {
    ttlSeconds: options.captchaTtlSeconds,
    clock: options.clock,
  });
  const reviewStore = new SqliteReviewStore(db, options.clock);
  const service = new ReviewService(reviewStore, captchaStore, {
    limits: options.limits,
    nameMaxLength: options.nameMaxLength,
    textMaxLength: options.textMaxLength,
  });

  app.addHook('onClose', async () => {
    db.close();
    logger.info('Reviews database closed');
  });

  // ───── Register Routes ─────
  registerHealthRoutes(app, service);
  registerReviewRoutes(app, service, options.identityCookie);
  registerSiteRoutes(app, loadSiteConfig(options.siteConfigPath), loadClientBundle(options.clientBundlePath));

  logger.info({ dbPath: options.dbPath, cors: options.corsOrigins.length > 0 }, 'App built');
  return { app, db, service };
}
