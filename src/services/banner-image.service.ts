import sharp from 'sharp';
import { ValidationError } from '../utils/error.js';

export interface UploadedBanner {
  filename: string;
  mimetype: string;
  buffer: Buffer;
}

export interface BannerImageInfo {
  extension: string;
  width: number;
  height: number;
}

const EXTENSIONS: Record<string, string> = {
  jpeg: 'jpg',
  png: 'png',
  webp: 'webp',
  gif: 'gif',
  avif: 'avif',
};

/**
 * Browsers submit an empty, nameless part when the file input is left blank
 */
export function isBannerPresent(banner: UploadedBanner | null | undefined): banner is UploadedBanner {
  return Boolean(banner && banner.filename && banner.buffer.length > 0);
}

export async function inspectBannerImage(banner: UploadedBanner): Promise<BannerImageInfo> {
  if (!banner.mimetype.startsWith('image/')) {
    throw new ValidationError([{ field: 'banner', message: 'Only image files are allowed' }]);
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(banner.buffer).metadata();
  } catch (error) {
    throw new ValidationError([{ field: 'banner', message: 'Banner is not a readable image' }]);
  }

  const { format, width, height } = metadata;
  const extension = format ? EXTENSIONS[format] : undefined;

  if (!extension) {
    throw new ValidationError([
      { field: 'banner', message: 'Banner must be a JPEG, PNG, WebP, GIF or AVIF image' },
    ]);
  }

  if (!width || !height) {
    throw new ValidationError([{ field: 'banner', message: 'Could not determine image dimensions' }]);
  }

  return { extension, width, height };
}
