import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string): string[] {
  const val = process.env[key];
  if (!val) return [];
  return val
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Relative paths are taken from the project root, not the working directory */
function fromRoot(p: string): string {
  if (p === ':memory:' || path.isAbsolute(p)) return p;
  return path.join(projectRoot, p);
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8080),
  host: optional('HOST', '127.0.0.1'),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Storage ─────
  storage: {
    dbPath: fromRoot(optional('REVIEWS_DB_PATH', 'data/reviews.db')),
  },

  // ───── Reviews ─────
  captcha: {
    ttlSeconds: optionalInt('CAPTCHA_TTL_SECONDS', 300),
  },

  reviews: {
    defaultLimit: optionalInt('REVIEWS_DEFAULT_LIMIT', 200),
    maxLimit: optionalInt('REVIEWS_MAX_LIMIT', 500),
    nameMaxLength: optionalInt('REVIEW_NAME_MAX_LENGTH', 80),
    textMaxLength: optionalInt('REVIEW_TEXT_MAX_LENGTH', 2000),
  },

  identity: {
    cookieName: optional('IDENTITY_COOKIE_NAME', 'rv_client_id'),
    maxAgeDays: optionalInt('IDENTITY_COOKIE_MAX_AGE_DAYS', 365),
    secure: optionalBool('IDENTITY_COOKIE_SECURE', false),
  },

  // ───── HTTP / Site ─────
  cors: {
    origins: optionalList('CORS_ORIGINS'),
  },

  site: {
    configPath: fromRoot(optional('SITE_CONFIG_PATH', 'config/site.yaml')),
    clientBundlePath: fromRoot(optional('CLIENT_BUNDLE_PATH', 'dist/public/reviews-client.js')),
  },
} as const;
