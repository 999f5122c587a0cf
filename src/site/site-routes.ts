import fs from 'fs';
import { FastifyInstance } from 'fastify';
import { SiteConfig } from './site-config';
import { renderPage } from './layout';
import { CLIENT_BUNDLE_URL } from './reviews-widget';
import { logger } from '../observability/logger';

/** Paths owned by the reviews API, health probes and the client bundle */
const RESERVED_PATHS = new Set(['/health', '/ready', '/captcha', '/reviews', CLIENT_BUNDLE_URL]);

/** Null when the bundle hasn't been built; pages then render without a working widget */
export function loadClientBundle(filepath: string): string | null {
  if (!fs.existsSync(filepath)) {
    logger.warn({ filepath }, 'Reviews client bundle not found; run the build to enable the widget');
    return null;
  }
  return fs.readFileSync(filepath, 'utf-8');
}

/** One GET route per configured page; markup is rendered once at startup */
export function registerSiteRoutes(app: FastifyInstance, site: SiteConfig, clientBundle: string | null): void {
  for (const page of site.pages) {
    if (RESERVED_PATHS.has(page.path)) {
      logger.warn({ path: page.path }, 'Site page collides with an API route; skipped');
      continue;
    }
    const html = renderPage(site, page);
    app.get(page.path, async (_req, reply) => {
      reply.header('Content-Type', 'text/html; charset=utf-8');
      return reply.send(html);
    });
  }

  if (clientBundle !== null) {
    app.get(CLIENT_BUNDLE_URL, async (_req, reply) => {
      reply.header('Content-Type', 'application/javascript; charset=utf-8');
      return reply.send(clientBundle);
    });
  }
}
