import type { FastifyInstance } from 'fastify';
import * as controller from './pages.controller.js';

export async function pageRoutes(fastify: FastifyInstance): Promise<void> {
  // Public pages
  fastify.get('/', controller.homePage);
  fastify.get<{ Params: controller.VideoParams }>('/watch/:id', controller.watchPage);
}
