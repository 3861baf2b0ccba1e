/**
 * HTTP Application
 *
 * - Hono for HTTP handling
 * - tRPC for the navigation and health API
 * - Pino request logging
 *
 * createApp() wires routes only; server.ts owns the listening socket.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { trpcServer } from '@hono/trpc-server';
import { appRouter } from './routers';
import { createContextFactory } from './trpc';
import { config } from './config';
import { db } from './db';
import { httpLogger } from './logger';
import { createHonoErrorHandler } from './lib/errors/error-handler';
import { requestIdMiddleware, type RequestIdVariables } from './middleware/request-id';
import type { NavigationRuntime } from './navigation';

export interface AppOptions {
  navigation: NavigationRuntime;
  adminApiToken?: string;
}

export function createApp(options: AppOptions) {
  const app = new Hono<{ Variables: RequestIdVariables }>();

  // ==========================================================================
  // MIDDLEWARE
  // ==========================================================================

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    const status = c.res.status;
    const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    httpLogger[level]({
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status,
      duration,
    }, `${c.req.method} ${c.req.path} → ${status} (${duration}ms)`);
  });

  const allowedOrigins = config.app.allowedOrigins.length > 0
    ? config.app.allowedOrigins
    : ['http://localhost:3000', 'http://localhost:5173'];

  app.use('*', cors({
    origin: (requestOrigin) => (allowedOrigins.includes(requestOrigin) ? requestOrigin : null),
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Admin-Token', 'X-Request-Id'],
    maxAge: 3600,
  }));

  app.onError(createHonoErrorHandler());

  // ==========================================================================
  // HEALTH CHECK
  // ==========================================================================

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      sources: options.navigation.resolver.sourceNames,
      environment: config.app.env,
    });
  });

  // Ready when every configured source can answer
  app.get('/health/readiness', async (c) => {
    if (!options.navigation.persistedSource) {
      return c.json({ ready: true });
    }

    const start = Date.now();
    try {
      await db.query('SELECT 1');
      return c.json({ ready: true, dbLatencyMs: Date.now() - start });
    } catch (error) {
      httpLogger.warn({ err: error }, 'Readiness probe: database unreachable');
      return c.json({ ready: false }, 503);
    }
  });

  app.get('/health/liveness', (c) => {
    return c.json({ alive: true, uptime: process.uptime() });
  });

  // ==========================================================================
  // tRPC HANDLER
  // ==========================================================================

  app.use('/trpc/*', trpcServer({
    router: appRouter,
    createContext: createContextFactory({
      navigation: options.navigation,
      adminApiToken: options.adminApiToken,
    }),
  }));

  return app;
}
