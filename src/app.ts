import Fastify, { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import type { AppConfig } from './config/env.js';
import { errorHandler, notFoundHandler } from './utils/error.js';
import type { BannerStorage } from './services/banner-storage.service.js';
import type { VideoRepository } from './services/video.repository.js';
import { VideoService } from './services/video.service.js';
import { pageRoutes } from './api/pages/pages.routes.js';
import { adminRoutes } from './api/admin/admin.routes.js';
import { videosApiRoutes } from './api/videos/videos.routes.js';

declare module 'fastify' {
  interface FastifyInstance {
    videos: VideoService;
    appConfig: AppConfig;
  }
}

export const SERVICE_NAME = 'StreamHub Video Platform';
export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
  config: AppConfig;
  repository: VideoRepository;
  storage: BannerStorage;
  clock?: () => Date;
}

export async function buildApp({ config, repository, storage, clock }: AppDependencies): Promise<FastifyInstance> {
  // Create Fastify instance
  const fastify = Fastify({
    logger: false, // Using custom Pino logger
    trustProxy: true,
  });

  fastify.decorate('appConfig', config);
  fastify.decorate('videos', new VideoService({ repository, storage, clock }));

  // Register multipart for the admin forms
  await fastify.register(multipart, {
    limits: {
      fileSize: config.maxBannerSize,
      files: 1, // Only the banner
    },
  });

  // Banner images and other static assets
  await fastify.register(fastifyStatic, {
    root: config.staticDir,
    prefix: '/static/',
  });

  // Client scripts shipped with the app
  await fastify.register(fastifyStatic, {
    root: config.assetsDir,
    prefix: '/assets/',
    decorateReply: false,
  });

  // Set global error handler
  fastify.setErrorHandler(errorHandler);
  fastify.setNotFoundHandler(notFoundHandler);

  // Health check endpoint
  fastify.get('/health', async () => {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
    };
  });

  await fastify.register(pageRoutes);
  await fastify.register(adminRoutes, { prefix: '/admin' });
  await fastify.register(videosApiRoutes, { prefix: '/api' });

  return fastify;
}
