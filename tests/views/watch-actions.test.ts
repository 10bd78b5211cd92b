import fs from 'fs';
import vm from 'vm';
import { describe, expect, it, vi } from 'vitest';
import { ASSETS_DIR } from '../helpers/app.js';
import {
  WATCH_ACTIONS_CONFIG_ID,
  renderWatchActions,
  type SharePayload,
  type WatchActionsOptions,
} from '../../src/views/client/watch-actions.js';

const scriptSource = fs.readFileSync(`${ASSETS_DIR}/js/watch-actions.js`, 'utf8');

const payload: SharePayload = {
  title: 'Sunset Session',
  text: 'Live set recorded at the pier',
  url: 'https://streamhub.test/watch/7',
};

const options: WatchActionsOptions = {
  shareButtonId: 'share-button',
  fullscreenButtonId: 'fullscreen-button',
  playerId: 'video-player',
  payload,
};

interface FakeElement {
  textContent: string;
  listeners: Array<() => void>;
  addEventListener(type: string, listener: () => void): void;
  requestFullscreen?: () => Promise<void>;
  webkitRequestFullscreen?: () => void;
  msRequestFullscreen?: () => void;
}

function fakeElement(textContent = ''): FakeElement {
  const listeners: Array<() => void> = [];
  return {
    textContent,
    listeners,
    addEventListener: (_type, listener) => {
      listeners.push(listener);
    },
  };
}

/** The JSON block exactly as the watch page renders it */
function renderedConfig(): string {
  const match = /<script type="application\/json" id="watch-actions-config">(.*?)<\/script>/.exec(
    renderWatchActions(options)
  );
  if (!match?.[1]) {
    throw new Error('config block missing');
  }
  return match[1];
}

interface PageSetup {
  navigator?: Record<string, unknown>;
  player?: Partial<Pick<FakeElement, 'requestFullscreen' | 'webkitRequestFullscreen' | 'msRequestFullscreen'>>;
  withConfig?: boolean;
}

function loadPage({ navigator = {}, player = {}, withConfig = true }: PageSetup = {}) {
  const elements = new Map<string, FakeElement>([
    ['share-button', fakeElement()],
    ['fullscreen-button', fakeElement()],
    ['video-player', Object.assign(fakeElement(), player)],
  ]);
  if (withConfig) {
    elements.set(WATCH_ACTIONS_CONFIG_ID, fakeElement(renderedConfig()));
  }

  const window = {
    navigator,
    document: { getElementById: (id: string) => elements.get(id) ?? null },
    prompt: vi.fn(),
    alert: vi.fn(),
  };
  vm.runInNewContext(scriptSource, { window });

  const click = async (id: string) => {
    elements.get(id)?.listeners.forEach((listener) => listener());
    await new Promise<void>((resolve) => setTimeout(resolve, 0));
  };

  return { window, elements, click };
}

function abortError(): Error {
  const error = new Error('Share canceled');
  error.name = 'AbortError';
  return error;
}

describe('watch page script: share', () => {
  it('uses the native share sheet when available', async () => {
    const share = vi.fn().mockResolvedValue(undefined);
    const writeText = vi.fn().mockResolvedValue(undefined);
    const page = loadPage({ navigator: { share, clipboard: { writeText } } });

    await page.click('share-button');

    expect(share).toHaveBeenCalledWith(payload);
    expect(writeText).not.toHaveBeenCalled();
    expect(page.window.alert).not.toHaveBeenCalled();
  });

  it('stops when the share sheet is dismissed', async () => {
    const share = vi.fn().mockRejectedValue(abortError());
    const writeText = vi.fn().mockResolvedValue(undefined);
    const page = loadPage({ navigator: { share, clipboard: { writeText } } });

    await page.click('share-button');

    expect(writeText).not.toHaveBeenCalled();
    expect(page.window.prompt).not.toHaveBeenCalled();
  });

  it('copies the link when native sharing fails', async () => {
    const share = vi.fn().mockRejectedValue(new Error('NotAllowedError'));
    const writeText = vi.fn().mockResolvedValue(undefined);
    const page = loadPage({ navigator: { share, clipboard: { writeText } } });

    await page.click('share-button');

    expect(writeText).toHaveBeenCalledWith('https://streamhub.test/watch/7');
    expect(page.window.alert).toHaveBeenCalledWith('Link copied to clipboard!');
  });

  it('prompts with the link when the clipboard is denied', async () => {
    const writeText = vi.fn().mockRejectedValue(new Error('denied'));
    const page = loadPage({ navigator: { clipboard: { writeText } } });

    await page.click('share-button');

    expect(page.window.prompt).toHaveBeenCalledWith(
      'Copy this link to share the video:',
      'https://streamhub.test/watch/7'
    );
    expect(page.window.alert).not.toHaveBeenCalled();
  });

  it('prompts with the link without share or clipboard support', async () => {
    const page = loadPage();

    await page.click('share-button');

    expect(page.window.prompt).toHaveBeenCalledWith(
      'Copy this link to share the video:',
      'https://streamhub.test/watch/7'
    );
  });
});

describe('watch page script: fullscreen', () => {
  it('prefers the standard API', async () => {
    const requestFullscreen = vi.fn().mockResolvedValue(undefined);
    const webkitRequestFullscreen = vi.fn();
    const page = loadPage({ player: { requestFullscreen, webkitRequestFullscreen } });

    await page.click('fullscreen-button');

    expect(requestFullscreen).toHaveBeenCalledTimes(1);
    expect(webkitRequestFullscreen).not.toHaveBeenCalled();
    expect(page.window.alert).not.toHaveBeenCalled();
  });

  it('falls back to the webkit prefix', async () => {
    const webkitRequestFullscreen = vi.fn();
    const page = loadPage({ player: { webkitRequestFullscreen } });

    await page.click('fullscreen-button');

    expect(webkitRequestFullscreen).toHaveBeenCalledTimes(1);
  });

  it('falls back to the ms prefix', async () => {
    const msRequestFullscreen = vi.fn();
    const page = loadPage({ player: { msRequestFullscreen } });

    await page.click('fullscreen-button');

    expect(msRequestFullscreen).toHaveBeenCalledTimes(1);
  });

  it('tells the user when fullscreen is unsupported', async () => {
    const page = loadPage();

    await page.click('fullscreen-button');

    expect(page.window.alert).toHaveBeenCalledWith('Fullscreen is not supported in this browser.');
  });

  it('reports a rejected fullscreen request', async () => {
    const page = loadPage({ player: { requestFullscreen: vi.fn().mockRejectedValue(new Error('denied')) } });

    await page.click('fullscreen-button');

    expect(page.window.alert).toHaveBeenCalledWith('Could not enter fullscreen.');
  });
});

describe('watch page script: setup', () => {
  it('does nothing without its config block', () => {
    const page = loadPage({ withConfig: false });

    expect(page.elements.get('share-button')?.listeners).toEqual([]);
    expect(page.elements.get('fullscreen-button')?.listeners).toEqual([]);
  });
});

describe('renderWatchActions', () => {
  it('renders the options block and the script tag', () => {
    expect(renderWatchActions(options).split('\n  ')).toEqual([
      `<script type="application/json" id="watch-actions-config">${JSON.stringify(options)}</script>`,
      '<script src="/assets/js/watch-actions.js" defer></script>',
    ]);
  });

  it('escapes "<" in the options', () => {
    expect(renderWatchActions({ ...options, payload: { ...payload, title: '</script>' } })).toContain(
      '"title":"\\u003c/script>"'
    );
  });
});
