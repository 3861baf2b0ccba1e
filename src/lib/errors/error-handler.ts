import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { TRPCError } from '@trpc/server';
import { Sentry } from '../../sentry';
import { logger } from '../../logger';
import {
  AppError,
  ValidationError,
  AuthenticationError,
  AuthorizationError,
} from './index';

function report(err: unknown): void {
  try {
    Sentry.captureException(err);
  } catch (sentryError) {
    logger.debug({ err: sentryError }, 'Sentry capture failed');
  }
}

function logAppError(err: AppError, context: string): void {
  const logMethod = err.statusCode >= 500 ? 'error' : 'warn';
  logger[logMethod]({ err, statusCode: err.statusCode }, `${context}: ${err.code}`);
  if (err.statusCode >= 500) {
    report(err);
  }
}

export function createHonoErrorHandler(): ErrorHandler {
  return (err, c) => {
    if (err instanceof AppError) {
      const { code, message, statusCode } = err;
      logAppError(err, 'AppError');
      return c.json({ error: { code, message, statusCode } }, statusCode as ContentfulStatusCode);
    }

    logger.error({ err }, 'Unhandled error');
    report(err);

    return c.json(
      { error: { code: 'INTERNAL_SERVER_ERROR', message: 'Internal Server Error', statusCode: 500 } },
      500
    );
  };
}

export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }

  if (error instanceof AppError) {
    logAppError(error, 'AppError in tRPC');

    let trpcCode: TRPCError['code'];

    // InvalidRuleError is a ValidationError subclass
    if (error instanceof ValidationError) {
      trpcCode = 'BAD_REQUEST';
    } else if (error instanceof AuthenticationError) {
      trpcCode = 'UNAUTHORIZED';
    } else if (error instanceof AuthorizationError) {
      trpcCode = 'FORBIDDEN';
    } else {
      trpcCode = 'INTERNAL_SERVER_ERROR';
    }

    return new TRPCError({ code: trpcCode, message: error.message, cause: error });
  }

  logger.error({ err: error }, 'Unhandled error in tRPC');
  report(error);

  return new TRPCError({
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Internal Server Error',
    cause: error,
  });
}
