import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError, ValidationError, isClientError } from '../../utils/error.js';
import { readVideoForm, type VideoFormSubmission } from '../../utils/multipart.js';
import { renderAdminPage } from '../../views/admin.view.js';
import { renderEditPage, type VideoFormState } from '../../views/edit.view.js';

export interface VideoParams {
  id: string;
}

const HTML = 'text/html; charset=utf-8';

function submittedValues(fields: Record<string, string>): Partial<VideoFormState> {
  return {
    title: fields.title,
    streamtape_url: fields.streamtape_url,
    description: fields.description,
    hashtags: fields.hashtags,
  };
}

function rethrowOr(error: unknown, code: string, message: string): never {
  if (error instanceof AppError || isClientError(error)) {
    throw error;
  }

  throw new AppError(code, message, 500);
}

export async function dashboard(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  try {
    const videos = await request.server.videos.listVideos();
    await reply.type(HTML).send(renderAdminPage(videos));
  } catch (error) {
    rethrowOr(error, 'LIST_VIDEOS_FAILED', 'Failed to load videos');
  }
}

export async function uploadVideo(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  let submission: VideoFormSubmission = { fields: {}, banner: null };

  try {
    submission = await readVideoForm(request);
    await request.server.videos.createVideo(submission.fields, submission.banner);
    await reply.redirect('/admin', 303);
  } catch (error) {
    // Re-render the dashboard with the rejected values
    if (error instanceof ValidationError) {
      const videos = await request.server.videos.listVideos();
      await reply.status(400).type(HTML).send(
        renderAdminPage(videos, { values: submittedValues(submission.fields), issues: error.issues })
      );
      return;
    }

    rethrowOr(error, 'UPLOAD_FAILED', 'Failed to upload video');
  }
}

export async function editForm(
  request: FastifyRequest<{ Params: VideoParams }>,
  reply: FastifyReply
): Promise<void> {
  try {
    const video = await request.server.videos.getVideo(request.params.id);
    await reply.type(HTML).send(renderEditPage(video));
  } catch (error) {
    rethrowOr(error, 'GET_VIDEO_FAILED', 'Failed to load video');
  }
}

export async function updateVideo(
  request: FastifyRequest<{ Params: VideoParams }>,
  reply: FastifyReply
): Promise<void> {
  const { id } = request.params;
  let submission: VideoFormSubmission = { fields: {}, banner: null };

  try {
    submission = await readVideoForm(request);
    await request.server.videos.updateVideo(id, submission.fields, submission.banner);
    await reply.redirect('/admin', 303);
  } catch (error) {
    if (error instanceof ValidationError) {
      const video = await request.server.videos.getVideo(id);
      await reply.status(400).type(HTML).send(
        renderEditPage(video, { values: submittedValues(submission.fields), issues: error.issues })
      );
      return;
    }

    rethrowOr(error, 'UPDATE_VIDEO_FAILED', 'Failed to update video');
  }
}

export async function deleteVideo(
  request: FastifyRequest<{ Params: VideoParams }>,
  reply: FastifyReply
): Promise<void> {
  try {
    await request.server.videos.deleteVideo(request.params.id);
    await reply.redirect('/admin', 303);
  } catch (error) {
    rethrowOr(error, 'DELETE_VIDEO_FAILED', 'Failed to delete video');
  }
}
