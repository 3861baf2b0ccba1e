/**
 * tRPC Setup
 *
 * Context, procedures and the error mapping shared by every router.
 * Rule administration is guarded by the `x-admin-token` header.
 */

import { timingSafeEqual } from 'crypto';
import { initTRPC } from '@trpc/server';
import { config } from './config';
import { AppError } from './lib/errors';
import { toTRPCError } from './lib/errors/error-handler';
import type { NavigationRuntime } from './navigation';

// ============================================================================
// CONTEXT
// ============================================================================

export interface Context extends Record<string, unknown> {
  navigation: NavigationRuntime;
  /** Token presented by the caller, if any */
  adminToken: string | null;
  /** Token the server expects; empty disables rule administration */
  expectedAdminToken: string;
}

export interface ContextOptions {
  navigation: NavigationRuntime;
  adminApiToken?: string;
}

export function createContextFactory(options: ContextOptions) {
  const expectedAdminToken = options.adminApiToken ?? config.admin.apiToken;

  return async (opts: { req: Request; resHeaders: Headers }): Promise<Context> => {
    // @hono/trpc-server passes a Web API Request; headers need .get()
    return {
      navigation: options.navigation,
      adminToken: opts.req.headers.get('x-admin-token'),
      expectedAdminToken,
    };
  };
}

// ============================================================================
// TRPC INITIALIZATION
// ============================================================================

const t = initTRPC.context<Context>().create({
  errorFormatter: ({ shape, error }) => ({
    ...shape,
    data: {
      ...shape.data,
      appCode: error.cause instanceof AppError ? error.cause.code : undefined,
      // Strip stack traces to prevent information leakage
      stack: undefined,
    },
  }),
});

// Map AppError subclasses thrown by services to the matching tRPC codes
const mapAppErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok && result.error.cause instanceof AppError) {
    throw toTRPCError(result.error.cause);
  }
  return result;
});

export const router = t.router;
export const publicProcedure = t.procedure.use(mapAppErrors);

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

// AppErrors thrown here are turned into FORBIDDEN / UNAUTHORIZED by mapAppErrors
const isAdmin = t.middleware(async ({ ctx, next }) => {
  if (!ctx.expectedAdminToken) {
    throw AppError.forbidden('Rule administration is disabled');
  }

  if (!ctx.adminToken || !tokensMatch(ctx.adminToken, ctx.expectedAdminToken)) {
    throw AppError.unauthorized('Admin token required');
  }

  return next();
});

export const adminProcedure = publicProcedure.use(isAdmin);
