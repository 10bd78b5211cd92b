import { SITE_NAME, resolveDescription, type VideoView } from '../models/index.js';
import { formatDisplayDate, formatDisplayDateTime } from '../utils/date-format.js';
import { renderWatchActions } from './client/watch-actions.js';
import { esc, hashtagBadges, layout } from './html.js';
import { buildSeoMetadata, renderSeoTags } from './seo.js';

export interface WatchPageOptions {
  /** Scheme and host of the public site, e.g. https://streamhub.example.com */
  baseUrl: string;
}

export const PLAYER_ELEMENT_ID = 'video-player';

export function renderPlayer(video: VideoView): string {
  return `<div class="player">
      <iframe id="${PLAYER_ELEMENT_ID}" src="${esc(video.playerUrl)}" title="${esc(video.title)}"
        allow="autoplay; fullscreen; picture-in-picture" allowfullscreen scrolling="no"></iframe>
    </div>`;
}

export function renderWatchPage(video: VideoView, { baseUrl }: WatchPageOptions): string {
  const description = resolveDescription(video);
  const seo = buildSeoMetadata(video, baseUrl);

  const body = `
    <article class="watch">
      ${renderPlayer(video)}

      <div class="actions">
        <button type="button" class="btn btn-primary" id="share-button">Share</button>
        <button type="button" class="btn" id="fullscreen-button">Fullscreen</button>
      </div>

      <h1>${esc(video.title)}</h1>
      <p class="meta">${formatDisplayDate(video.createdAt)}</p>
      ${hashtagBadges(video.hashtagList)}

      <section class="description">
        <p>${esc(description)}</p>
      </section>

      <dl class="details">
        <dt>Published</dt>
        <dd>${formatDisplayDateTime(video.createdAt)}</dd>
        <dt>Last Updated</dt>
        <dd>${formatDisplayDateTime(video.updatedAt)}</dd>
      </dl>

      <p><a href="/">&larr; Back to all videos</a></p>
    </article>`;

  return layout({
    title: `${video.title} - ${SITE_NAME}`,
    head: renderSeoTags(video, baseUrl),
    body,
    foot: renderWatchActions({
      shareButtonId: 'share-button',
      fullscreenButtonId: 'fullscreen-button',
      playerId: PLAYER_ELEMENT_ID,
      payload: {
        title: video.title,
        text: description,
        url: seo.pageUrl,
      },
    }),
  });
}
