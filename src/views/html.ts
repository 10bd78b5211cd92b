// ─── HTML helpers ───────────────────────────────────────────────
//
// Pages are plain template strings. Everything interpolated from a
// record or a request goes through esc().

import { SITE_NAME } from '../models/video-record.js';

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function esc(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

export function absoluteUrl(baseUrl: string, pathname: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`;
}

/** Banners are stored relative to the project root */
export function bannerUrl(bannerPath: string): string {
  return `/${bannerPath.replace(/^\/+/, '')}`;
}

export function hashtagBadges(tags: readonly string[]): string {
  if (tags.length === 0) {
    return '';
  }
  return `<div class="tags">${tags.map((tag) => `<span class="tag">${esc(tag)}</span>`).join('')}</div>`;
}

const STYLES = `
  * { box-sizing: border-box; }
  body { margin: 0; font-family: system-ui, -apple-system, "Segoe UI", sans-serif; background: #0f0f17; color: #e6e6ef; }
  a { color: #7cc4ff; }
  header.site { display: flex; justify-content: space-between; align-items: center; padding: 1rem 2rem; background: #171726; border-bottom: 1px solid #2a2a40; }
  header.site .brand { font-size: 1.3rem; font-weight: 700; color: #fff; text-decoration: none; }
  header.site .brand span { color: #ff5a5f; }
  header.site nav a { margin-left: 1rem; text-decoration: none; }
  main { max-width: 1100px; margin: 0 auto; padding: 2rem; }
  footer.site { text-align: center; color: #777; padding: 2rem; font-size: 0.85rem; }
  .grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(240px, 1fr)); gap: 1.25rem; }
  .card { background: #1b1b2b; border-radius: 10px; overflow: hidden; text-decoration: none; color: inherit; display: block; }
  .card img { width: 100%; aspect-ratio: 16 / 9; object-fit: cover; display: block; }
  .card .body { padding: 0.75rem 1rem; }
  .card h3 { margin: 0 0 0.4rem; font-size: 1rem; }
  .player { position: relative; width: 100%; aspect-ratio: 16 / 9; background: #000; border-radius: 10px; overflow: hidden; }
  .player iframe { position: absolute; inset: 0; width: 100%; height: 100%; border: 0; }
  .actions { display: flex; gap: 0.5rem; margin: 1rem 0; }
  .btn { display: inline-block; padding: 0.5rem 1rem; border-radius: 6px; border: 0; background: #2d2d48; color: #fff; cursor: pointer; text-decoration: none; font-size: 0.95rem; }
  .btn-primary { background: #ff5a5f; }
  .btn-danger { background: #b3261e; }
  .meta { color: #9a9ab0; font-size: 0.9rem; }
  .tags { display: flex; flex-wrap: wrap; gap: 0.4rem; margin: 0.75rem 0; }
  .tag { background: #26264a; color: #b9b9ff; border-radius: 999px; padding: 0.2rem 0.7rem; font-size: 0.8rem; }
  .details { display: grid; grid-template-columns: max-content 1fr; gap: 0.35rem 1rem; margin: 1.5rem 0; }
  .details dt { color: #9a9ab0; }
  .details dd { margin: 0; }
  form.video-form label { display: block; margin: 1rem 0 0.35rem; font-weight: 600; }
  form.video-form input[type=text], form.video-form input[type=url], form.video-form textarea { width: 100%; padding: 0.6rem 0.75rem; background: #11111b; border: 1px solid #33334d; border-radius: 6px; color: #e6e6ef; font-size: 0.95rem; }
  form.video-form textarea { min-height: 7rem; }
  .hint { color: #8080a0; font-size: 0.8rem; }
  .errors { background: #3a1518; border: 1px solid #b3261e; border-radius: 6px; padding: 0.75rem 1rem; margin-bottom: 1rem; }
  .errors li { margin: 0.2rem 0; }
  .split { display: grid; grid-template-columns: 1fr 1fr; gap: 2rem; }
  @media (max-width: 800px) { .split { grid-template-columns: 1fr; } }
  .banner-preview { max-width: 320px; border-radius: 8px; display: block; margin: 0.5rem 0; }
  table.videos { width: 100%; border-collapse: collapse; }
  table.videos td, table.videos th { padding: 0.6rem; border-bottom: 1px solid #2a2a40; text-align: left; vertical-align: middle; }
  table.videos img { width: 120px; border-radius: 6px; }
  .inline-form { display: inline; }
`;

export interface LayoutOptions {
  title: string;
  /** Extra tags for <head>: SEO metadata, structured data */
  head?: string;
  body: string;
  /** Markup placed at the end of <body>, e.g. script tags */
  foot?: string;
}

export function layout({ title, head = '', body, foot }: LayoutOptions): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${esc(title)}</title>
  ${head}
  <style>${STYLES}</style>
</head>
<body>
  <header class="site">
    <a class="brand" href="/">Stream<span>Hub</span></a>
    <nav><a href="/">Videos</a><a href="/admin">Admin</a></nav>
  </header>
  <main>
${body}
  </main>
  <footer class="site">&copy; ${SITE_NAME}</footer>
${foot ? `  ${foot}\n` : ''}</body>
</html>`;
}
