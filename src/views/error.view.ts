import { esc, layout } from './html.js';

const TITLES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  413: 'Upload Too Large',
  500: 'Internal Server Error',
};

export function renderErrorPage(statusCode: number, message: string): string {
  const title = TITLES[statusCode] ?? (statusCode >= 500 ? TITLES[500] : TITLES[400]);

  return layout({
    title: `${statusCode} - ${title}`,
    body: `
    <div class="empty">
      <h1>${statusCode} - ${esc(title)}</h1>
      <p>${esc(message)}</p>
      <p><a class="btn" href="/">Go Home</a></p>
    </div>`,
  });
}
