import 'dotenv/config';
import { loadConfigOrExit, startServer } from './server.js';
import { logger } from './utils/logger.js';

const config = loadConfigOrExit();

try {
  await startServer(config);
} catch (error) {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
}
