import { SITE_NAME, resolveDescription, type VideoView } from '../models/index.js';
import { absoluteUrl, bannerUrl, esc } from './html.js';

export interface SeoMetadata {
  title: string;
  description: string;
  /** Hashtags joined with ", ", null when the video has none */
  keywords: string | null;
  imageUrl: string;
  pageUrl: string;
}

export interface VideoObjectJsonLd {
  '@context': 'https://schema.org';
  '@type': 'VideoObject';
  name: string;
  description: string;
  thumbnailUrl: string;
  uploadDate: string;
  embedUrl: string;
  keywords?: string;
}

export function watchPath(videoId: string): string {
  return `/watch/${encodeURIComponent(videoId)}`;
}

export function buildSeoMetadata(video: VideoView, baseUrl: string): SeoMetadata {
  return {
    title: video.title,
    description: resolveDescription(video),
    keywords: video.hashtagList.length > 0 ? video.hashtagList.join(', ') : null,
    imageUrl: absoluteUrl(baseUrl, bannerUrl(video.bannerPath)),
    pageUrl: absoluteUrl(baseUrl, watchPath(video.id)),
  };
}

export function buildStructuredData(video: VideoView, baseUrl: string): VideoObjectJsonLd {
  const seo = buildSeoMetadata(video, baseUrl);

  return {
    '@context': 'https://schema.org',
    '@type': 'VideoObject',
    name: seo.title,
    description: seo.description,
    thumbnailUrl: seo.imageUrl,
    uploadDate: video.createdAt.toISOString(),
    embedUrl: video.playerUrl,
    ...(seo.keywords ? { keywords: seo.keywords } : {}),
  };
}

// JSON is safe inside <script> once "<" cannot start a closing tag
export function serializeJsonLd(data: VideoObjectJsonLd): string {
  return JSON.stringify(data).replace(/</g, '\\u003c');
}

export function renderSeoTags(video: VideoView, baseUrl: string): string {
  const seo = buildSeoMetadata(video, baseUrl);
  const structuredData = buildStructuredData(video, baseUrl);

  return [
    `<meta name="description" content="${esc(seo.description)}">`,
    seo.keywords ? `<meta name="keywords" content="${esc(seo.keywords)}">` : '',
    `<link rel="canonical" href="${esc(seo.pageUrl)}">`,
    `<meta property="og:type" content="video.other">`,
    `<meta property="og:site_name" content="${SITE_NAME}">`,
    `<meta property="og:title" content="${esc(seo.title)}">`,
    `<meta property="og:description" content="${esc(seo.description)}">`,
    `<meta property="og:image" content="${esc(seo.imageUrl)}">`,
    `<meta property="og:url" content="${esc(seo.pageUrl)}">`,
    `<meta name="twitter:card" content="summary_large_image">`,
    `<meta name="twitter:title" content="${esc(seo.title)}">`,
    `<meta name="twitter:description" content="${esc(seo.description)}">`,
    `<meta name="twitter:image" content="${esc(seo.imageUrl)}">`,
    `<script type="application/ld+json">${serializeJsonLd(structuredData)}</script>`,
  ]
    .filter(Boolean)
    .join('\n  ');
}
