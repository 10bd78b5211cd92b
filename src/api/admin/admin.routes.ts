import type { FastifyInstance } from 'fastify';
import * as controller from './admin.controller.js';

type VideoRoute = { Params: controller.VideoParams };

export async function adminRoutes(fastify: FastifyInstance): Promise<void> {
  // Access control sits in front of the app (reverse proxy / basic auth)
  fastify.get('/', controller.dashboard);
  fastify.post('/upload', controller.uploadVideo);

  fastify.get<VideoRoute>('/edit/:id', controller.editForm);
  fastify.post<VideoRoute>('/edit/:id', controller.updateVideo);
  fastify.post<VideoRoute>('/delete/:id', controller.deleteVideo);
}
