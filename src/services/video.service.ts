import {
  parseHashtags,
  parseVideoForm,
  toVideoView,
  type VideoChanges,
  type VideoRecord,
  type VideoView,
} from '../models/index.js';
import { AppError, NotFoundError, StorageError, ValidationError } from '../utils/error.js';
import { enhancedLogger } from '../utils/enhanced-logger.js';
import type { BannerStorage } from './banner-storage.service.js';
import {
  inspectBannerImage,
  isBannerPresent,
  type BannerImageInfo,
  type UploadedBanner,
} from './banner-image.service.js';
import type { VideoRepository } from './video.repository.js';

export type VideoFormValues = Record<string, string | undefined>;

export interface VideoStats {
  totalVideos: number;
  uniqueHashtags: number;
  recentVideos: VideoView[];
}

export interface VideoServiceDependencies {
  repository: VideoRepository;
  storage: BannerStorage;
  clock?: () => Date;
}

const RECENT_VIDEOS_LIMIT = 5;

export class VideoService {
  private readonly repository: VideoRepository;
  private readonly storage: BannerStorage;
  private readonly clock: () => Date;

  constructor({ repository, storage, clock = () => new Date() }: VideoServiceDependencies) {
    this.repository = repository;
    this.storage = storage;
    this.clock = clock;
  }

  async getVideo(id: string): Promise<VideoView> {
    const record = await this.repository.findById(id);
    if (!record) {
      throw new NotFoundError(id);
    }
    return toVideoView(record);
  }

  async listVideos(limit?: number): Promise<VideoView[]> {
    const records = await this.repository.list(limit === undefined ? {} : { limit });
    return records.map(toVideoView);
  }

  async createVideo(form: VideoFormValues, banner: UploadedBanner | null): Promise<VideoView> {
    const fields = parseVideoForm(form);

    if (!isBannerPresent(banner)) {
      throw new ValidationError([{ field: 'banner', message: 'Banner image is required' }]);
    }

    const image = await inspectBannerImage(banner);
    const bannerPath = await this.storage.save(banner.buffer, image.extension);
    const now = this.clock();

    let record: VideoRecord;
    try {
      record = await this.repository.create({
        title: fields.title,
        description: fields.description,
        hashtags: fields.hashtags,
        embedUrl: fields.streamtape_url,
        bannerPath,
        createdAt: now,
        updatedAt: now,
      });
    } catch (error) {
      await this.discardBanner(bannerPath);
      throw toStorageError(error, 'Failed to save video');
    }

    enhancedLogger.adminAction(
      'CREATE_VIDEO',
      { videoId: record.id, title: record.title, banner: { width: image.width, height: image.height } },
      'Video created'
    );
    return toVideoView(record);
  }

  /**
   * Applies an admin edit. Fields are validated before anything is
   * written; a replacement banner is only stored once the fields pass.
   */
  async updateVideo(id: string, form: VideoFormValues, banner: UploadedBanner | null): Promise<VideoView> {
    const existing = await this.repository.findById(id);
    if (!existing) {
      throw new NotFoundError(id);
    }

    const fields = parseVideoForm(form);

    let newBannerPath: string | null = null;
    let image: BannerImageInfo | null = null;
    if (isBannerPresent(banner)) {
      image = await inspectBannerImage(banner);
      newBannerPath = await this.storage.save(banner.buffer, image.extension);
    }

    const now = this.clock();
    const changes: VideoChanges = {
      title: fields.title,
      description: fields.description,
      hashtags: fields.hashtags,
      embedUrl: fields.streamtape_url,
      // updatedAt never moves backwards, even if the clock does
      updatedAt: now < existing.updatedAt ? existing.updatedAt : now,
    };
    if (newBannerPath) {
      changes.bannerPath = newBannerPath;
    }

    let updated: VideoRecord | null;
    try {
      updated = await this.repository.update(id, changes);
    } catch (error) {
      if (newBannerPath) {
        await this.discardBanner(newBannerPath);
      }
      throw toStorageError(error, 'Failed to update video');
    }

    // Deleted between the lookup and the write
    if (!updated) {
      if (newBannerPath) {
        await this.discardBanner(newBannerPath);
      }
      throw new NotFoundError(id);
    }

    if (newBannerPath && existing.bannerPath !== newBannerPath) {
      await this.discardBanner(existing.bannerPath);
    }

    enhancedLogger.adminAction(
      'UPDATE_VIDEO',
      { videoId: id, banner: image ? { width: image.width, height: image.height } : null },
      'Video updated'
    );
    return toVideoView(updated);
  }

  async deleteVideo(id: string): Promise<void> {
    let deleted: VideoRecord | null;
    try {
      deleted = await this.repository.delete(id);
    } catch (error) {
      throw toStorageError(error, 'Failed to delete video');
    }

    if (!deleted) {
      throw new NotFoundError(id);
    }

    await this.discardBanner(deleted.bannerPath);
    enhancedLogger.adminAction('DELETE_VIDEO', { videoId: id }, 'Video deleted');
  }

  async getStats(): Promise<VideoStats> {
    const [totalVideos, recent, all] = await Promise.all([
      this.repository.count(),
      this.repository.list({ limit: RECENT_VIDEOS_LIMIT }),
      this.repository.list(),
    ]);

    const hashtags = new Set(all.flatMap((record) => parseHashtags(record.hashtags)));

    return {
      totalVideos,
      uniqueHashtags: hashtags.size,
      recentVideos: recent.map(toVideoView),
    };
  }

  // Orphaned files are only logged, the record is what matters
  private async discardBanner(bannerPath: string): Promise<void> {
    try {
      await this.storage.remove(bannerPath);
    } catch (error) {
      enhancedLogger.error('video-service.discardBanner', error, { bannerPath });
    }
  }
}

function toStorageError(error: unknown, message: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  enhancedLogger.error('video-service', error);
  return new StorageError(message);
}
