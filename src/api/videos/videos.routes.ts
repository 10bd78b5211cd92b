import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import * as controller from './videos.controller.js';

export async function videosApiRoutes(fastify: FastifyInstance): Promise<void> {
  // Read-only JSON API for external integrations
  await fastify.register(cors, {
    origin: fastify.appConfig.corsOrigins,
    methods: ['GET', 'OPTIONS'],
  });

  fastify.get('/videos', controller.listVideos);
  fastify.get<{ Params: controller.VideoParams }>('/video/:id', controller.getVideo);
  fastify.get('/stats', controller.getStats);
}
