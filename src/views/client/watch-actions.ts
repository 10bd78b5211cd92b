// ─── Watch page actions ─────────────────────────────────────────
//
// The browser code is a static asset (public/js/watch-actions.js). The
// page only carries its options as a JSON block the script reads.

export const WATCH_ACTIONS_CONFIG_ID = 'watch-actions-config';
export const WATCH_ACTIONS_SCRIPT_URL = '/assets/js/watch-actions.js';

export interface SharePayload {
  title: string;
  text: string;
  url: string;
}

export interface WatchActionsOptions {
  shareButtonId: string;
  fullscreenButtonId: string;
  playerId: string;
  payload: SharePayload;
}

// JSON is safe inside <script> once "<" cannot start a closing tag
export function renderWatchActions(options: WatchActionsOptions): string {
  const config = JSON.stringify(options).replace(/</g, '\\u003c');

  return [
    `<script type="application/json" id="${WATCH_ACTIONS_CONFIG_ID}">${config}</script>`,
    `<script src="${WATCH_ACTIONS_SCRIPT_URL}" defer></script>`,
  ].join('\n  ');
}
