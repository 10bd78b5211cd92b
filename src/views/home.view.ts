import type { VideoView } from '../models/index.js';
import { formatDisplayDate } from '../utils/date-format.js';
import { bannerUrl, esc, hashtagBadges, layout } from './html.js';
import { watchPath } from './seo.js';

function videoCard(video: VideoView): string {
  return `<a class="card" href="${esc(watchPath(video.id))}">
        <img src="${esc(bannerUrl(video.bannerPath))}" alt="${esc(video.title)}" loading="lazy">
        <div class="body">
          <h3>${esc(video.title)}</h3>
          <p class="meta">${formatDisplayDate(video.createdAt)}</p>
          ${hashtagBadges(video.hashtagList)}
        </div>
      </a>`;
}

export function renderHomePage(videos: readonly VideoView[]): string {
  const body =
    videos.length === 0
      ? `<div class="empty">
      <h1>No videos yet</h1>
      <p class="meta">Videos added from the <a href="/admin">admin panel</a> show up here.</p>
    </div>`
      : `<h1>Latest Videos</h1>
    <div class="grid">
      ${videos.map(videoCard).join('\n      ')}
    </div>`;

  return layout({
    title: 'StreamHub - Watch Videos Online',
    head: '<meta name="description" content="Browse and watch the latest videos on StreamHub.">',
    body,
  });
}
