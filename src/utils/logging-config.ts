/**
 * Centralized Logging Configuration
 * Control what gets logged via environment variables
 */

export interface LoggingConfig {
  adminActions: boolean;
  pageViews: boolean;
  storage: boolean;
  errors: boolean;
}

// Parse boolean from env var (supports: true, false, 1, 0, yes, no)
export function parseEnvBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  const lower = value.toLowerCase();
  return lower === 'true' || lower === '1' || lower === 'yes';
}

export const loggingConfig: LoggingConfig = {
  adminActions: parseEnvBoolean(process.env.LOG_ADMIN_ACTIONS, true),
  pageViews: parseEnvBoolean(process.env.LOG_PAGE_VIEWS, false), // One line per request, noisy in production
  storage: parseEnvBoolean(process.env.LOG_STORAGE, true),
  errors: parseEnvBoolean(process.env.LOG_ERRORS, true),
};

export function isLogEnabled(category: keyof LoggingConfig): boolean {
  return loggingConfig[category];
}

/**
 * Summary of the active categories, logged once on startup
 */
export function describeLoggingConfig(): Record<keyof LoggingConfig, 'on' | 'off'> {
  return {
    adminActions: loggingConfig.adminActions ? 'on' : 'off',
    pageViews: loggingConfig.pageViews ? 'on' : 'off',
    storage: loggingConfig.storage ? 'on' : 'off',
    errors: loggingConfig.errors ? 'on' : 'off',
  };
}
