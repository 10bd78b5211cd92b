import { MAX_TITLE_LENGTH, resolveDescription, type VideoView } from '../models/index.js';
import type { FieldIssue } from '../utils/error.js';
import { formatDisplayDate, formatDisplayDateTime } from '../utils/date-format.js';
import { bannerUrl, esc, hashtagBadges, layout } from './html.js';
import { watchPath } from './seo.js';
import { renderPlayer } from './watch.view.js';

/** Raw form values, keyed by input name */
export interface VideoFormState {
  title: string;
  streamtape_url: string;
  description: string;
  hashtags: string;
}

export interface EditPageOptions {
  /** Submitted values to show instead of the stored ones */
  values?: Partial<VideoFormState>;
  issues?: FieldIssue[];
}

export function formStateFromVideo(video: VideoView): VideoFormState {
  return {
    title: video.title,
    streamtape_url: video.embedUrl,
    description: video.description ?? '',
    hashtags: video.hashtags ?? '',
  };
}

export function renderIssues(issues: FieldIssue[] | undefined): string {
  if (!issues || issues.length === 0) {
    return '';
  }
  return `<div class="errors" role="alert"><ul>${issues
    .map((issue) => `<li data-field="${esc(issue.field)}">${esc(issue.message)}</li>`)
    .join('')}</ul></div>`;
}

export interface VideoFieldsOptions {
  state: VideoFormState;
  bannerRequired: boolean;
}

/** Inputs shared by the upload form on the dashboard and the edit form */
export function renderVideoFields({ state, bannerRequired }: VideoFieldsOptions): string {
  return `
        <label for="title">Title *</label>
        <input type="text" id="title" name="title" value="${esc(state.title)}" maxlength="${MAX_TITLE_LENGTH}" required>

        <label for="streamtape_url">Video URL *</label>
        <input type="url" id="streamtape_url" name="streamtape_url" value="${esc(state.streamtape_url)}" placeholder="https://streamtape.com/e/..." required>
        <p class="hint">Streamtape share links are converted to their embed player automatically.</p>

        <label for="description">Description</label>
        <textarea id="description" name="description">${esc(state.description)}</textarea>

        <label for="hashtags">Hashtags</label>
        <input type="text" id="hashtags" name="hashtags" value="${esc(state.hashtags)}" placeholder="#music, #live, #concert">
        <p class="hint">Separate tags with commas.</p>

        <label for="banner">${bannerRequired ? 'Banner Image *' : 'Replace Banner Image'}</label>
        <input type="file" id="banner" name="banner" accept="image/*"${bannerRequired ? ' required' : ''}>`;
}

/**
 * Edit form next to a preview of the stored record. The preview shows
 * server state as of this render and does not follow the form inputs.
 */
export function renderEditPage(video: VideoView, options: EditPageOptions = {}): string {
  const stored = formStateFromVideo(video);
  const submitted = options.values ?? {};
  const state: VideoFormState = {
    title: submitted.title ?? stored.title,
    streamtape_url: submitted.streamtape_url ?? stored.streamtape_url,
    description: submitted.description ?? stored.description,
    hashtags: submitted.hashtags ?? stored.hashtags,
  };

  const body = `
    <p class="meta"><a href="/admin">&larr; Back to admin</a></p>
    <h1>Edit Video</h1>
    <div class="split">
      <section>
        ${renderIssues(options.issues)}
        <form class="video-form" method="post" action="/admin/edit/${encodeURIComponent(video.id)}" enctype="multipart/form-data">
          ${renderVideoFields({ state, bannerRequired: false })}

          <p class="hint">Current banner (kept unless a new image is chosen):</p>
          <img class="banner-preview" src="${esc(bannerUrl(video.bannerPath))}" alt="Current banner for ${esc(video.title)}">

          <div class="actions">
            <button type="submit" class="btn btn-primary">Save Changes</button>
            <a class="btn" href="/admin">Cancel</a>
          </div>
        </form>
      </section>

      <section class="preview" aria-label="Current video">
        <h2>Preview</h2>
        ${renderPlayer(video)}
        <h3>${esc(video.title)}</h3>
        <p>${esc(resolveDescription(video))}</p>
        ${hashtagBadges(video.hashtagList)}
        <dl class="details">
          <dt>Created</dt>
          <dd>${formatDisplayDate(video.createdAt)}</dd>
          <dt>Last Updated</dt>
          <dd>${formatDisplayDateTime(video.updatedAt)}</dd>
          <dt>Video URL</dt>
          <dd>${esc(video.embedUrl)}</dd>
        </dl>
        <a class="btn" href="${esc(watchPath(video.id))}" target="_blank" rel="noopener">View public page</a>
      </section>
    </div>`;

  return layout({ title: `Edit: ${video.title} - Admin`, body });
}
