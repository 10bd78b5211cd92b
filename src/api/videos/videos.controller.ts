import type { FastifyReply, FastifyRequest } from 'fastify';
import type { VideoView } from '../../models/index.js';
import { AppError } from '../../utils/error.js';
import { bannerUrl } from '../../views/html.js';
import { watchPath } from '../../views/seo.js';

export interface VideoParams {
  id: string;
}

function toVideoSummary(video: VideoView) {
  return {
    id: video.id,
    title: video.title,
    description: video.description,
    hashtags: video.hashtagList,
    banner_url: bannerUrl(video.bannerPath),
    watch_url: watchPath(video.id),
    created_at: video.createdAt.toISOString(),
    updated_at: video.updatedAt.toISOString(),
  };
}

export async function listVideos(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  try {
    const videos = await request.server.videos.listVideos();

    await reply.send({
      status: 'success',
      count: videos.length,
      videos: videos.map(toVideoSummary),
    });
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }

    throw new AppError('LIST_VIDEOS_FAILED', 'Failed to list videos', 500);
  }
}

export async function getVideo(
  request: FastifyRequest<{ Params: VideoParams }>,
  reply: FastifyReply
): Promise<void> {
  try {
    const video = await request.server.videos.getVideo(request.params.id);

    await reply.send({
      status: 'success',
      video: {
        ...toVideoSummary(video),
        streamtape_url: video.embedUrl,
        embed_url: video.playerUrl,
      },
    });
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }

    throw new AppError('GET_VIDEO_FAILED', 'Failed to get video', 500);
  }
}

export async function getStats(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  try {
    const stats = await request.server.videos.getStats();

    await reply.send({
      status: 'success',
      stats: {
        total_videos: stats.totalVideos,
        unique_hashtags: stats.uniqueHashtags,
        recent_videos: stats.recentVideos.map((video) => ({
          id: video.id,
          title: video.title,
          created_at: video.createdAt.toISOString(),
        })),
      },
    });
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }

    throw new AppError('GET_STATS_FAILED', 'Failed to get platform statistics', 500);
  }
}
