export const SITE_NAME = 'StreamHub';

export interface VideoRecord {
  id: string;
  title: string;
  /** null renders as the derived default, see resolveDescription */
  description: string | null;
  /** Raw comma-separated tags as entered in the admin form */
  hashtags: string | null;
  embedUrl: string;
  /** Relative to the project root, e.g. static/banners/banner-123.png */
  bannerPath: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewVideoRecord = Omit<VideoRecord, 'id'>;

export type VideoChanges = Partial<Omit<VideoRecord, 'id' | 'createdAt'>>;

/**
 * Read-only view handed to renderers and the API. The derived fields are
 * computed from the record on access and never stored.
 */
export interface VideoView extends Readonly<VideoRecord> {
  readonly hashtagList: readonly string[];
  readonly playerUrl: string;
}

export function parseHashtags(hashtags: string | null | undefined): string[] {
  if (!hashtags) {
    return [];
  }

  return hashtags
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function defaultDescription(title: string): string {
  return `${title} - Watch this amazing video on ${SITE_NAME}`;
}

export function resolveDescription(video: Pick<VideoRecord, 'title' | 'description'>): string {
  const description = video.description?.trim();
  return description ? description : defaultDescription(video.title);
}

const STREAMTAPE_PATH = /^\/(?:v|e)\/([^/]+)/;

/**
 * Streamtape share links (/v/<id>/<file>) are not embeddable, the
 * player lives under /e/<id>/. Other providers are used as entered.
 */
export function resolvePlayerUrl(embedUrl: string): string {
  if (!URL.canParse(embedUrl)) {
    return embedUrl;
  }

  const url = new URL(embedUrl);
  const host = url.hostname.toLowerCase();
  if (host !== 'streamtape.com' && !host.endsWith('.streamtape.com')) {
    return embedUrl;
  }

  const match = STREAMTAPE_PATH.exec(url.pathname);
  return match ? `https://streamtape.com/e/${match[1]}/` : embedUrl;
}

export function toVideoView(record: VideoRecord): VideoView {
  const snapshot: VideoRecord = { ...record };

  return Object.freeze({
    ...snapshot,
    get hashtagList(): readonly string[] {
      return Object.freeze(parseHashtags(snapshot.hashtags));
    },
    get playerUrl(): string {
      return resolvePlayerUrl(snapshot.embedUrl);
    },
  });
}
