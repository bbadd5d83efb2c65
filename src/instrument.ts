import * as Sentry from '@sentry/node';
import type { BaseLogger } from 'pino';

import type { Config } from './config/index.js';

// Only initialize if a sentry block is configured
// This allows running without Sentry in development
export function initSentry(options: Config['sentry'], logger: BaseLogger): boolean {
  if (!options) {
    logger.info('Sentry not configured, error tracking disabled');
    return false;
  }

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    tracesSampleRate: options.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: options.environment }, 'Sentry initialized');
  return true;
}

// Re-export Sentry for use in error handler
export { Sentry };
