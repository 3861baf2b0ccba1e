/**
 * Health Router
 */

import { router, publicProcedure } from '../trpc';
import { db } from '../db';
import { config } from '../config';

export const healthRouter = router({
  ping: publicProcedure
    .query(() => ({ status: 'ok', timestamp: new Date().toISOString() })),

  status: publicProcedure
    .query(async ({ ctx }) => {
      const { persistedSource, staticSource, resolver } = ctx.navigation;

      const database = persistedSource && db.isConfigured()
        ? await db.healthCheck()
        : { connected: false, schemaVersion: null, latencyMs: 0 };

      const healthy = persistedSource === null || database.connected;

      return {
        status: healthy ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        sources: resolver.sourceNames,
        persisted: persistedSource
          ? { circuit: persistedSource.getCircuitState(), database }
          : null,
        static: staticSource ? { rules: staticSource.size } : null,
        environment: config.app.env,
      };
    }),
});
