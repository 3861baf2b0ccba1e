/**
 * App Router
 *
 * Main tRPC router combining all domain routers.
 */

import { router } from '../trpc';
import { navigationRouter } from './navigation';
import { healthRouter } from './health';

export const appRouter = router({
  navigation: navigationRouter,
  health: healthRouter,
});

export type AppRouter = typeof appRouter;
