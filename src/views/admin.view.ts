import type { VideoView } from '../models/index.js';
import type { FieldIssue } from '../utils/error.js';
import { formatDisplayDate } from '../utils/date-format.js';
import { renderIssues, renderVideoFields, type VideoFormState } from './edit.view.js';
import { bannerUrl, esc, layout } from './html.js';
import { watchPath } from './seo.js';

export interface AdminPageOptions {
  /** Values from a rejected upload */
  values?: Partial<VideoFormState>;
  issues?: FieldIssue[];
}

function videoRow(video: VideoView): string {
  const id = encodeURIComponent(video.id);
  return `<tr>
          <td><img src="${esc(bannerUrl(video.bannerPath))}" alt=""></td>
          <td><a href="${esc(watchPath(video.id))}">${esc(video.title)}</a></td>
          <td>${formatDisplayDate(video.createdAt)}</td>
          <td>
            <a class="btn" href="/admin/edit/${id}">Edit</a>
            <form class="inline-form" method="post" action="/admin/delete/${id}" enctype="multipart/form-data"
              onsubmit="return confirm('Delete this video?');">
              <button type="submit" class="btn btn-danger">Delete</button>
            </form>
          </td>
        </tr>`;
}

export function renderAdminPage(videos: readonly VideoView[], options: AdminPageOptions = {}): string {
  const values = options.values ?? {};
  const state: VideoFormState = {
    title: values.title ?? '',
    streamtape_url: values.streamtape_url ?? '',
    description: values.description ?? '',
    hashtags: values.hashtags ?? '',
  };

  const list =
    videos.length === 0
      ? '<p class="meta">No videos uploaded yet.</p>'
      : `<table class="videos">
        <thead><tr><th>Banner</th><th>Title</th><th>Created</th><th>Actions</th></tr></thead>
        <tbody>
        ${videos.map(videoRow).join('\n        ')}
        </tbody>
      </table>`;

  const body = `
    <h1>Admin Panel</h1>
    <p class="meta">${videos.length} video${videos.length === 1 ? '' : 's'}</p>
    <div class="split">
      <section>
        <h2>Upload Video</h2>
        ${renderIssues(options.issues)}
        <form class="video-form" method="post" action="/admin/upload" enctype="multipart/form-data">
          ${renderVideoFields({ state, bannerRequired: true })}
          <div class="actions">
            <button type="submit" class="btn btn-primary">Upload Video</button>
          </div>
        </form>
      </section>
      <section>
        <h2>All Videos</h2>
        ${list}
      </section>
    </div>`;

  return layout({ title: 'Admin Panel - StreamHub', body });
}
