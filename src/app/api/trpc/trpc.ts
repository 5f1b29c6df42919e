/**
 * This is your entry point to setup the root configuration for tRPC on the server.
 * - `initTRPC` should only be used once per app.
 * - We export only the functionality that we use so we can enforce which base procedures should be used
 */
import { initTRPC } from '@trpc/server';
import { ZodError } from 'zod';
import type { Context } from '@/app/api/trpc/context';
import { ValidationError } from '@/app/lib/errors';
import { ErrorHandler } from '@/app/lib/utils/error-handler';

/**
 * Initialization of tRPC backend
 * Should be done only once per backend!
 */
const t = initTRPC.context<Context>().create({
  /**
   * Error handling. Input validation failures carry the flattened zod error,
   * domain validation failures their field-scoped messages.
   */
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError: error.cause instanceof ZodError ? error.cause.flatten() : null,
        fieldErrors: error.cause instanceof ValidationError ? error.cause.errors : null,
      },
    };
  },
});

/**
 * Converts domain errors thrown by services into TRPC errors. tRPC hands a
 * failed resolver back as an INTERNAL_SERVER_ERROR result wrapping the
 * original error, so that is what gets translated.
 */
const withErrorHandling = t.middleware(async ({ next, path }) => {
  const result = await next();
  if (result.ok) {
    return result;
  }

  const { error } = result;
  if (error.code !== 'INTERNAL_SERVER_ERROR' || error.cause === undefined) {
    throw error;
  }
  throw ErrorHandler.toTRPCError(error.cause, { operation: path });
});

/**
 * Export reusable router and procedure helpers
 * that can be used throughout the router
 */
export const router = t.router;
export const publicProcedure = t.procedure.use(withErrorHandling);
