import { buildApp } from './app.js';
import { ConfigError, loadConfig, type AppConfig } from './config/env.js';
import { connectDatabase, disconnectDatabase } from './database/client.js';
import { LocalBannerStorage } from './services/banner-storage.service.js';
import { MongooseVideoRepository } from './services/video.repository.js';
import { logger } from './utils/logger.js';
import { describeLoggingConfig } from './utils/logging-config.js';

export async function startServer(config: AppConfig): Promise<void> {
  const storage = new LocalBannerStorage(config.staticDir);
  await storage.ensureDirectory();

  // Connect to MongoDB
  await connectDatabase(config.mongodbUrl);

  const fastify = await buildApp({
    config,
    repository: new MongooseVideoRepository(),
    storage,
  });

  // Graceful shutdown
  async function closeGracefully(signal: string): Promise<void> {
    logger.info(`Received ${signal}, closing gracefully...`);

    try {
      await fastify.close();
      await disconnectDatabase();

      logger.info('Server closed successfully');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void closeGracefully('SIGTERM'));
  process.on('SIGINT', () => void closeGracefully('SIGINT'));

  logger.info({ logging: describeLoggingConfig() }, 'Logging configuration');

  // Start server
  await fastify.listen({ port: config.port, host: config.host });
  logger.info(`Server running on http://localhost:${config.port}`);
}

export function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ issues: error.issues }, 'Invalid configuration');
    } else {
      logger.error({ error }, 'Failed to load configuration');
    }
    process.exit(1);
  }
}
