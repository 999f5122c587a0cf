import { SiteConfig, SitePage } from './site-config';
import { REVIEWS_WIDGET_HTML } from './reviews-widget';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Blank lines separate paragraphs */
function renderParagraphs(body: string): string {
  return body
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((p) => `<p>${escapeHtml(p)}</p>`)
    .join('\n');
}

function renderNav(site: SiteConfig, current: SitePage): string {
  return site.pages
    .map((page) => {
      const active = page.path === current.path ? ' class="active" aria-current="page"' : '';
      return `<a href="${escapeHtml(page.path)}"${active}>${escapeHtml(page.navLabel)}</a>`;
    })
    .join('\n        ');
}

export function renderPage(site: SiteConfig, page: SitePage): string {
  const sections = page.sections
    .map((s) => `<section class="card">\n<h2>${escapeHtml(s.heading)}</h2>\n${renderParagraphs(s.body)}\n</section>`)
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(page.title)}</title>
  <style>
    :root {
      --bg: #0b1020; --surface: #121a33; --border: rgba(255,255,255,0.08);
      --text: #e8ecf8; --muted: #9aa4c4; --accent: #6a5cff; --accent-2: #2ad1ff;
    }
    * { box-sizing: border-box; }
    body { margin: 0; font-family: system-ui, sans-serif; background: var(--bg); color: var(--text); }
    header { padding: 20px 24px; border-bottom: 1px solid var(--border); }
    header .brand { font-weight: 700; font-size: 18px; }
    header .tagline { color: var(--muted); font-size: 13px; }
    nav { display: flex; flex-wrap: wrap; gap: 14px; margin-top: 12px; }
    nav a { color: var(--muted); text-decoration: none; }
    nav a.active { color: var(--accent-2); }
    main { max-width: 880px; margin: 0 auto; padding: 24px; }
    .intro { color: var(--muted); }
    .card { background: var(--surface); border: 1px solid var(--border); border-radius: 12px; padding: 16px 20px; margin: 16px 0; }
    footer { text-align: center; color: var(--muted); font-size: 12px; padding: 24px; }
  </style>
</head>
<body>
  <header>
    <div class="brand">${escapeHtml(site.siteName)}</div>
    <div class="tagline">${escapeHtml(site.tagline)}</div>
    <nav>
        ${renderNav(site, page)}
    </nav>
  </header>
  <main>
    <h1>${escapeHtml(page.heading)}</h1>
    ${page.intro ? `<p class="intro">${escapeHtml(page.intro)}</p>` : ''}
    ${sections}
    ${page.reviews ? REVIEWS_WIDGET_HTML : ''}
  </main>
  <footer>${escapeHtml(site.footer)}</footer>
</body>
</html>`;
}
