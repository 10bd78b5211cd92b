import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { StorageError } from '../utils/error.js';
import { enhancedLogger } from '../utils/enhanced-logger.js';

// Banner paths are stored relative to the project root and served at /<bannerPath>
const BANNER_PREFIX = 'static/banners';

/**
 * Where banner images live. Paths handed out are relative, e.g.
 * static/banners/banner-1700000000000-ab12cd34ef56ab78.png
 */
export interface BannerStorage {
  save(fileBuffer: Buffer, extension: string): Promise<string>;
  remove(bannerPath: string): Promise<void>;
}

export class LocalBannerStorage implements BannerStorage {
  private readonly bannersDir: string;

  constructor(staticDir: string) {
    this.bannersDir = path.join(staticDir, 'banners');
  }

  async ensureDirectory(): Promise<void> {
    await fs.promises.mkdir(this.bannersDir, { recursive: true });
  }

  /**
   * Upload file to local storage
   */
  async save(fileBuffer: Buffer, extension: string): Promise<string> {
    // Generate unique filename
    const timestamp = Date.now();
    const randomString = crypto.randomBytes(8).toString('hex');
    const uniqueFileName = `banner-${timestamp}-${randomString}.${extension}`;

    try {
      await this.ensureDirectory();
      await fs.promises.writeFile(path.join(this.bannersDir, uniqueFileName), fileBuffer);
    } catch (error) {
      enhancedLogger.error('banner-storage.save', error, { fileName: uniqueFileName });
      throw new StorageError('Failed to save banner image');
    }

    const bannerPath = `${BANNER_PREFIX}/${uniqueFileName}`;
    enhancedLogger.storage('WRITE', { bannerPath, bytes: fileBuffer.length }, 'Banner stored');
    return bannerPath;
  }

  /**
   * Delete file from local storage. Missing files are not an error.
   */
  async remove(bannerPath: string): Promise<void> {
    // Only the file name is trusted, the record could point anywhere
    const fileName = path.basename(bannerPath);
    const filePath = path.join(this.bannersDir, fileName);

    try {
      await fs.promises.unlink(filePath);
      enhancedLogger.storage('DELETE', { bannerPath }, 'Banner deleted');
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new StorageError('Failed to delete banner image');
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
