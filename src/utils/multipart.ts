import type { FastifyRequest } from 'fastify';
import type { UploadedBanner } from '../services/banner-image.service.js';
import { ValidationError } from './error.js';

export interface VideoFormSubmission {
  fields: Record<string, string>;
  banner: UploadedBanner | null;
}

const BANNER_FIELD = 'banner';

/**
 * Reads a multipart video form. Every file stream is drained, otherwise
 * the request never completes; only the banner field is kept.
 */
export async function readVideoForm(request: FastifyRequest): Promise<VideoFormSubmission> {
  if (!request.isMultipart()) {
    throw new ValidationError([{ field: 'form', message: 'Form must be submitted as multipart/form-data' }]);
  }

  const fields: Record<string, string> = {};
  let banner: UploadedBanner | null = null;

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const buffer = await part.toBuffer();
      if (part.fieldname === BANNER_FIELD) {
        banner = { filename: part.filename, mimetype: part.mimetype, buffer };
      }
    } else if (typeof part.value === 'string') {
      fields[part.fieldname] = part.value;
    }
  }

  return { fields, banner };
}
