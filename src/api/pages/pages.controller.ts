import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../utils/error.js';
import { enhancedLogger } from '../../utils/enhanced-logger.js';
import { resolveBaseUrl } from '../../utils/request-url.js';
import { renderHomePage } from '../../views/home.view.js';
import { renderWatchPage } from '../../views/watch.view.js';

export interface VideoParams {
  id: string;
}

export async function homePage(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  try {
    const videos = await request.server.videos.listVideos();

    enhancedLogger.pageView('home', { count: videos.length });
    await reply.type('text/html; charset=utf-8').send(renderHomePage(videos));
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }

    throw new AppError('LIST_VIDEOS_FAILED', 'Failed to load videos', 500);
  }
}

export async function watchPage(
  request: FastifyRequest<{ Params: VideoParams }>,
  reply: FastifyReply
): Promise<void> {
  try {
    const video = await request.server.videos.getVideo(request.params.id);

    enhancedLogger.pageView('watch', { videoId: video.id });
    await reply
      .type('text/html; charset=utf-8')
      .send(renderWatchPage(video, { baseUrl: resolveBaseUrl(request) }));
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }

    throw new AppError('GET_VIDEO_FAILED', 'Failed to load video', 500);
  }
}
