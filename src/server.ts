/**
 * Navigation Rules Server
 *
 * Entry point: validates configuration, builds the resolver chain, serves
 * the HTTP app and closes the database pool on shutdown.
 */

// Sentry must be imported first to capture all errors
import './sentry';
import { serve } from '@hono/node-server';
import { config, validateConfig } from './config';
import { db } from './db';
import { logger } from './logger';
import { createApp } from './app';
import { createNavigationRuntime } from './navigation';
import { GracefulShutdown } from './lib/shutdown';

async function main(): Promise<void> {
  validateConfig();

  const navigation = await createNavigationRuntime(config.navigation);
  const app = createApp({ navigation });

  const server = serve({ fetch: app.fetch, port: config.app.port }, (info) => {
    logger.info({ port: info.port, env: config.app.env }, 'Navigation rules server listening');
  });

  const shutdown = new GracefulShutdown();

  shutdown.register('httpServer', 0, () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    })
  );
  shutdown.register('database', 10, () => db.close());
  shutdown.listen();
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Server failed to start');
  process.exit(1);
});
