import mongoose from 'mongoose';
import { logger } from '../utils/logger.js';

export async function connectDatabase(mongodbUrl: string): Promise<void> {
  try {
    await mongoose.connect(mongodbUrl);
    logger.info('MongoDB connected successfully');
  } catch (error) {
    logger.error({ error }, 'MongoDB connection failed');
    throw error;
  }
}

export async function disconnectDatabase(): Promise<void> {
  try {
    await mongoose.disconnect();
    logger.info('MongoDB disconnected');
  } catch (error) {
    logger.error({ error }, 'MongoDB disconnection failed');
  }
}

// Handle connection events
mongoose.connection.on('error', (err) => {
  logger.error({ error: err }, 'Mongoose connection error');
});

mongoose.connection.on('disconnected', () => {
  logger.info('Mongoose disconnected from MongoDB');
});
