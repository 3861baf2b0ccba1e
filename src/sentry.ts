/**
 * Sentry Error Tracking
 *
 * Initializes Sentry when SENTRY_DSN is set. Import before other modules in
 * server.ts so unhandled errors are captured.
 */

import * as Sentry from '@sentry/node';
import { config } from './config';

const dsn = config.sentry.dsn;

if (dsn) {
  Sentry.init({
    dsn,
    environment: config.sentry.environment,
    release: `navigation-rules@${process.env.npm_package_version || '1.0.0'}`,
    tracesSampleRate: config.sentry.tracesSampleRate,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers['authorization'];
        delete event.request.headers['x-admin-token'];
      }
      return event;
    },

    enabled: config.app.isProduction || !!process.env.SENTRY_FORCE_ENABLE,

    ignoreErrors: ['ECONNRESET', 'EPIPE', 'AbortError'],
  });
}

export { Sentry };
