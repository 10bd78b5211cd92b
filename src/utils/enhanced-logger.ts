/**
 * Enhanced Logger with Category-Based Control
 * Wraps pino logger with configurable categories
 */

import { logger } from './logger.js';
import { isLogEnabled } from './logging-config.js';

type LogData = Record<string, unknown>;

export const enhancedLogger = {
  // ========== ADMIN ACTIONS ==========

  adminAction(action: string, data: LogData, message: string): void {
    if (!isLogEnabled('adminActions')) return;

    logger.info({
      event: 'ADMIN_ACTION',
      action,
      timestamp: new Date().toISOString(),
      ...data,
    }, message);
  },

  // ========== PAGE VIEWS ==========

  pageView(page: string, data: LogData): void {
    if (!isLogEnabled('pageViews')) return;

    logger.info({
      event: 'PAGE_VIEW',
      page,
      ...data,
    }, `Rendered ${page} page`);
  },

  // ========== STORAGE ==========

  storage(action: 'WRITE' | 'DELETE', data: LogData, message: string): void {
    if (!isLogEnabled('storage')) return;

    logger.info({
      event: 'STORAGE',
      action,
      ...data,
    }, message);
  },

  // ========== ERRORS ==========

  error(context: string, error: unknown, data: LogData = {}): void {
    if (!isLogEnabled('errors')) return;

    logger.error({
      event: 'ERROR',
      context,
      error: error instanceof Error ? { message: error.message, stack: error.stack } : error,
      ...data,
    }, `Error in ${context}`);
  },
};
