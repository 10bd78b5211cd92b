import { toVideoView, type VideoRecord, type VideoView } from '../../src/models/index.js';

export function videoRecord(overrides: Partial<VideoRecord> = {}): VideoRecord {
  return {
    id: '7',
    title: 'Sunset Session',
    description: 'Live set recorded at the pier',
    hashtags: '#music, #live',
    embedUrl: 'https://streamtape.com/v/abc123/sunset.mp4',
    bannerPath: 'static/banners/sunset.png',
    createdAt: new Date('2024-01-05T15:07:00.000Z'),
    updatedAt: new Date('2024-02-01T09:30:00.000Z'),
    ...overrides,
  };
}

export function videoView(overrides: Partial<VideoRecord> = {}): VideoView {
  return toVideoView(videoRecord(overrides));
}
