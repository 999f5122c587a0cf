import * as fs from 'fs';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { logger } from '../observability/logger';

export interface PageSection {
  heading: string;
  body: string;
}

export interface SitePage {
  path: string;
  /** Label in the navigation bar */
  navLabel: string;
  title: string;
  heading: string;
  intro?: string;
  sections: PageSection[];
  /** Embed the reviews widget */
  reviews?: boolean;
}

export interface SiteConfig {
  siteName: string;
  tagline: string;
  footer: string;
  pages: SitePage[];
}

const ajv = new Ajv({ allErrors: true });

const validateSiteConfig = ajv.compile<SiteConfig>({
  type: 'object',
  required: ['siteName', 'tagline', 'footer', 'pages'],
  properties: {
    siteName: { type: 'string' },
    tagline: { type: 'string' },
    footer: { type: 'string' },
    pages: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['path', 'navLabel', 'title', 'heading', 'sections'],
        properties: {
          path: { type: 'string', pattern: '^/' },
          navLabel: { type: 'string' },
          title: { type: 'string' },
          heading: { type: 'string' },
          intro: { type: 'string' },
          reviews: { type: 'boolean' },
          sections: {
            type: 'array',
            items: {
              type: 'object',
              required: ['heading', 'body'],
              properties: {
                heading: { type: 'string' },
                body: { type: 'string' },
              },
            },
          },
        },
      },
    },
  },
});

/** Used when the YAML file is missing or malformed */
export function builtInSiteConfig(): SiteConfig {
  return {
    siteName: 'Portfolio',
    tagline: 'Notes and experiments',
    footer: 'Built with Fastify',
    pages: [
      {
        path: '/',
        navLabel: 'Home',
        title: 'Portfolio',
        heading: 'Welcome',
        sections: [],
        reviews: true,
      },
    ],
  };
}

export function parseSiteConfig(content: string): SiteConfig {
  const data: unknown = yaml.load(content);
  if (!validateSiteConfig(data)) {
    throw new Error(`Invalid site config: ${ajv.errorsText(validateSiteConfig.errors)}`);
  }
  return data;
}

export function loadSiteConfig(filepath: string): SiteConfig {
  if (!fs.existsSync(filepath)) {
    logger.warn({ filepath }, 'Site config not found; using built-in default');
    return builtInSiteConfig();
  }
  try {
    const config = parseSiteConfig(fs.readFileSync(filepath, 'utf-8'));
    logger.info({ filepath, pageCount: config.pages.length }, 'Site config loaded');
    return config;
  } catch (err) {
    logger.error({ err, filepath }, 'Failed to load site config; using built-in default');
    return builtInSiteConfig();
  }
}
