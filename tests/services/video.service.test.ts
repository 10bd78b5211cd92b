import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { VideoService } from '../../src/services/video.service.js';
import { LocalBannerStorage } from '../../src/services/banner-storage.service.js';
import type { UploadedBanner } from '../../src/services/banner-image.service.js';
import { NotFoundError, StorageError, ValidationError } from '../../src/utils/error.js';
import { enhancedLogger } from '../../src/utils/enhanced-logger.js';
import { MemoryVideoRepository } from '../helpers/memory-video.repository.js';
import { pngBanner } from '../helpers/images.js';

const NOW = new Date('2024-03-10T09:30:00.000Z');

const validForm = {
  title: 'Updated Title',
  streamtape_url: 'https://streamtape.com/e/new456/',
  description: 'Fresh description',
  hashtags: '#x, #y',
};

describe('VideoService', () => {
  let staticDir: string;
  let repository: MemoryVideoRepository;
  let storage: LocalBannerStorage;
  let service: VideoService;
  let banner: UploadedBanner;

  beforeEach(async () => {
    staticDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'streamhub-service-'));
    repository = new MemoryVideoRepository();
    storage = new LocalBannerStorage(staticDir);
    await storage.ensureDirectory();
    service = new VideoService({ repository, storage, clock: () => NOW });
    banner = { filename: 'cover.png', mimetype: 'image/png', buffer: await pngBanner() };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(staticDir, { recursive: true, force: true });
  });

  async function storedBanner(): Promise<string> {
    const bannerPath = await storage.save(await pngBanner(), 'png');
    return bannerPath;
  }

  async function bannerFiles(): Promise<string[]> {
    return fs.promises.readdir(path.join(staticDir, 'banners'));
  }

  describe('getVideo', () => {
    it('returns a view of the stored record', async () => {
      repository.seed({ title: 'Demo', hashtags: '#a, #b' });

      const video = await service.getVideo('1');

      expect(video.title).toBe('Demo');
      expect(video.hashtagList).toEqual(['#a', '#b']);
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(service.getVideo('999')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('listVideos', () => {
    it('lists newest first and honours the limit', async () => {
      repository.seed({ title: 'Old', createdAt: new Date('2024-01-01T00:00:00.000Z') });
      repository.seed({ title: 'New', createdAt: new Date('2024-02-01T00:00:00.000Z') });
      repository.seed({ title: 'Middle', createdAt: new Date('2024-01-15T00:00:00.000Z') });

      expect((await service.listVideos()).map((video) => video.title)).toEqual(['New', 'Middle', 'Old']);
      expect((await service.listVideos(1)).map((video) => video.title)).toEqual(['New']);
    });
  });

  describe('updateVideo', () => {
    it('replaces the fields and keeps the banner when none is uploaded', async () => {
      const bannerPath = await storedBanner();
      const created = repository.seed({ title: 'Demo', bannerPath });

      const updated = await service.updateVideo(created.id, validForm, null);

      expect(updated.title).toBe('Updated Title');
      expect(updated.embedUrl).toBe('https://streamtape.com/e/new456/');
      expect(updated.description).toBe('Fresh description');
      expect(updated.hashtags).toBe('#x, #y');
      expect(updated.bannerPath).toBe(bannerPath);
      expect(await bannerFiles()).toEqual([path.basename(bannerPath)]);
    });

    it('stores a new banner and removes the old file', async () => {
      const oldPath = await storedBanner();
      const created = repository.seed({ title: 'Demo', bannerPath: oldPath });

      const updated = await service.updateVideo(created.id, validForm, banner);

      expect(updated.bannerPath).not.toBe(oldPath);
      expect(updated.bannerPath).toMatch(/^static\/banners\/banner-\d+-[0-9a-f]{16}\.png$/);
      expect(await bannerFiles()).toEqual([path.basename(updated.bannerPath)]);
    });

    it('logs the size of a replacement banner', async () => {
      const created = repository.seed({ title: 'Demo' });
      const adminAction = vi.spyOn(enhancedLogger, 'adminAction');

      await service.updateVideo(created.id, validForm, banner);

      expect(adminAction).toHaveBeenCalledWith(
        'UPDATE_VIDEO',
        { videoId: '1', banner: { width: 32, height: 18 } },
        'Video updated'
      );
    });

    it('logs no banner size when the banner is kept', async () => {
      const created = repository.seed({ title: 'Demo' });
      const adminAction = vi.spyOn(enhancedLogger, 'adminAction');

      await service.updateVideo(created.id, validForm, null);

      expect(adminAction).toHaveBeenCalledWith('UPDATE_VIDEO', { videoId: '1', banner: null }, 'Video updated');
    });

    it('treats an empty file part as no upload', async () => {
      const bannerPath = await storedBanner();
      const created = repository.seed({ title: 'Demo', bannerPath });

      const updated = await service.updateVideo(created.id, validForm, {
        filename: '',
        mimetype: 'application/octet-stream',
        buffer: Buffer.alloc(0),
      });

      expect(updated.bannerPath).toBe(bannerPath);
    });

    it('clears blank optional fields', async () => {
      const created = repository.seed({ title: 'Demo', description: 'Old', hashtags: '#old' });

      const updated = await service.updateVideo(
        created.id,
        { ...validForm, description: '  ', hashtags: '' },
        null
      );

      expect(updated.description).toBeNull();
      expect(updated.hashtags).toBeNull();
    });

    it('sets updatedAt to now and leaves createdAt alone', async () => {
      const createdAt = new Date('2024-01-05T15:07:00.000Z');
      const created = repository.seed({ title: 'Demo', createdAt, updatedAt: createdAt });

      const updated = await service.updateVideo(created.id, validForm, null);

      expect(updated.createdAt).toEqual(createdAt);
      expect(updated.updatedAt).toEqual(NOW);
    });

    it('never moves updatedAt backwards', async () => {
      const future = new Date('2025-01-01T00:00:00.000Z');
      const created = repository.seed({ title: 'Demo', updatedAt: future });

      const updated = await service.updateVideo(created.id, validForm, null);

      expect(updated.updatedAt).toEqual(future);
    });

    it('leaves the record unmodified when the title is empty', async () => {
      const created = repository.seed({ title: 'Demo' });

      await expect(service.updateVideo(created.id, { ...validForm, title: '' }, banner)).rejects.toBeInstanceOf(
        ValidationError
      );

      expect(repository.snapshot(created.id)).toEqual(created);
      expect(await bannerFiles()).toEqual([]);
    });

    it('rejects a non-image upload without writing anything', async () => {
      const created = repository.seed({ title: 'Demo' });

      await expect(
        service.updateVideo(
          created.id,
          validForm,
          { filename: 'notes.txt', mimetype: 'text/plain', buffer: Buffer.from('hello') }
        )
      ).rejects.toThrow('Only image files are allowed');

      expect(repository.snapshot(created.id)).toEqual(created);
    });

    it('rejects bytes that are not an image', async () => {
      const created = repository.seed({ title: 'Demo' });

      await expect(
        service.updateVideo(
          created.id,
          validForm,
          { filename: 'fake.png', mimetype: 'image/png', buffer: Buffer.from('not really a png') }
        )
      ).rejects.toThrow('Banner is not a readable image');
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(service.updateVideo('999', validForm, null)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('removes the new banner when the record vanished before the write', async () => {
      const created = repository.seed({ title: 'Demo' });
      vi.spyOn(repository, 'update').mockResolvedValueOnce(null);

      await expect(service.updateVideo(created.id, validForm, banner)).rejects.toBeInstanceOf(NotFoundError);
      expect(await bannerFiles()).toEqual([]);
    });

    it('wraps repository failures in a StorageError and removes the new banner', async () => {
      const created = repository.seed({ title: 'Demo' });
      vi.spyOn(repository, 'update').mockRejectedValueOnce(new Error('connection reset'));

      await expect(service.updateVideo(created.id, validForm, banner)).rejects.toThrow(
        new StorageError('Failed to update video')
      );
      expect(await bannerFiles()).toEqual([]);
    });
  });

  describe('createVideo', () => {
    it('stores the banner and the record', async () => {
      const video = await service.createVideo(validForm, banner);

      expect(video.id).toBe('1');
      expect(video.title).toBe('Updated Title');
      expect(video.createdAt).toEqual(NOW);
      expect(video.updatedAt).toEqual(NOW);
      expect(await bannerFiles()).toEqual([path.basename(video.bannerPath)]);
    });

    it('logs the new video with its banner size', async () => {
      const adminAction = vi.spyOn(enhancedLogger, 'adminAction');

      await service.createVideo(validForm, banner);

      expect(adminAction).toHaveBeenCalledWith(
        'CREATE_VIDEO',
        { videoId: '1', title: 'Updated Title', banner: { width: 32, height: 18 } },
        'Video created'
      );
    });

    it('requires a banner', async () => {
      await expect(service.createVideo(validForm, null)).rejects.toThrow('Banner image is required');
      expect(await repository.count()).toBe(0);
    });

    it('validates the fields before looking at the banner', async () => {
      await expect(service.createVideo({ ...validForm, streamtape_url: 'nope' }, banner)).rejects.toThrow(
        'Video URL must be a well-formed http(s) URL'
      );
      expect(await bannerFiles()).toEqual([]);
    });
  });

  describe('deleteVideo', () => {
    it('removes the record and its banner', async () => {
      const bannerPath = await storedBanner();
      const created = repository.seed({ title: 'Demo', bannerPath });

      await service.deleteVideo(created.id);

      expect(repository.snapshot(created.id)).toBeUndefined();
      expect(await bannerFiles()).toEqual([]);
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(service.deleteVideo('999')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getStats', () => {
    it('counts videos and distinct hashtags', async () => {
      repository.seed({ title: 'A', hashtags: '#a, #b', createdAt: new Date('2024-01-01T00:00:00.000Z') });
      repository.seed({ title: 'B', hashtags: '#b,#c', createdAt: new Date('2024-01-02T00:00:00.000Z') });
      repository.seed({ title: 'C', hashtags: null, createdAt: new Date('2024-01-03T00:00:00.000Z') });

      const stats = await service.getStats();

      expect(stats.totalVideos).toBe(3);
      expect(stats.uniqueHashtags).toBe(3);
      expect(stats.recentVideos.map((video) => video.title)).toEqual(['C', 'B', 'A']);
    });
  });
});
