import { TRPCError } from '@trpc/server';
import { logger } from '@/app/lib/logger';
import { ConflictError, NotFoundError, ValidationError } from '@/app/lib/errors';

/**
 * Standard error codes used throughout the application
 */
export const ErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  BAD_REQUEST: 'BAD_REQUEST',
  INTERNAL_SERVER_ERROR: 'INTERNAL_SERVER_ERROR',
  CONFLICT: 'CONFLICT',
  VALIDATION_ERROR: 'BAD_REQUEST',
} as const;

/**
 * Error context for better logging and debugging
 */
export interface ErrorContext {
  resourceId?: string | number;
  resourceType?: string;
  operation?: string;
  additionalData?: Record<string, unknown>;
}

/**
 * Standardized error handling utility
 * Provides consistent error logging and user-facing error messages
 */
export class ErrorHandler {
  /**
   * Creates a TRPC error and logs it. Internal errors log at error level,
   * everything else at warn.
   */
  static createError(
    code: keyof typeof ErrorCodes,
    message: string,
    context?: ErrorContext,
    cause?: Error
  ): TRPCError {
    const errorCode = ErrorCodes[code];
    const logMessage = this.formatLogMessage(message, context, cause);

    if (code === 'INTERNAL_SERVER_ERROR') {
      logger.error(logMessage);
    } else {
      logger.warn(logMessage);
    }

    return new TRPCError({
      code: errorCode,
      message,
      cause,
    });
  }

  /**
   * Converts a domain error into the matching TRPC error. Validation messages
   * pass through unchanged so the caller sees the specific blocking reason.
   */
  static toTRPCError(error: unknown, context?: ErrorContext): TRPCError {
    if (error instanceof TRPCError) {
      return error;
    }

    if (error instanceof ValidationError) {
      return this.createError('VALIDATION_ERROR', error.message, context, error);
    }

    if (error instanceof NotFoundError) {
      return this.createError(
        'NOT_FOUND',
        error.message,
        { ...context, resourceType: error.resourceType, resourceId: error.resourceId },
        error
      );
    }

    if (error instanceof ConflictError) {
      return this.createError('CONFLICT', error.message, context, error);
    }

    if (error instanceof Error && this.isDatabaseError(error)) {
      return this.handleDatabaseError(error, context);
    }

    if (error instanceof Error) {
      return this.createError('INTERNAL_SERVER_ERROR', 'An unexpected error occurred', context, error);
    }

    return this.createError('INTERNAL_SERVER_ERROR', 'An unexpected error occurred', context);
  }

  /**
   * Handles database errors and converts them to appropriate TRPC errors
   */
  static handleDatabaseError(error: Error, context?: ErrorContext): TRPCError {
    const message = error.message.toLowerCase();

    if (message.includes('duplicate key') || message.includes('unique constraint')) {
      return this.createError(
        'CONFLICT',
        'A record with this information already exists',
        context,
        error
      );
    }

    if (message.includes('foreign key') || message.includes('violates')) {
      return this.createError(
        'BAD_REQUEST',
        'This operation would violate data integrity constraints',
        context,
        error
      );
    }

    return this.createError('INTERNAL_SERVER_ERROR', 'A database error occurred', context, error);
  }

  /**
   * Formats a log message with context information
   */
  private static formatLogMessage(message: string, context?: ErrorContext, cause?: Error): string {
    const parts = [message];

    if (context) {
      const contextParts: string[] = [];

      if (context.operation) contextParts.push(`operation: ${context.operation}`);
      if (context.resourceType && context.resourceId !== undefined) {
        contextParts.push(`resource: ${context.resourceType}:${context.resourceId}`);
      }

      if (contextParts.length > 0) {
        parts.push(`(${contextParts.join(', ')})`);
      }

      if (context.additionalData) {
        parts.push(`data: ${JSON.stringify(context.additionalData)}`);
      }
    }

    if (cause && cause.message !== message) {
      parts.push(`cause: ${cause.message}`);
    }

    return parts.join(' ');
  }

  /**
   * Checks if an error is a database-related error
   */
  static isDatabaseError(error: Error): boolean {
    const message = error.message.toLowerCase();
    const dbErrorKeywords = [
      'duplicate key',
      'unique constraint',
      'foreign key',
      'violates',
      'constraint',
      'relation',
      'column',
      'database',
      'connection',
      'timeout',
    ];

    return dbErrorKeywords.some((keyword) => message.includes(keyword));
  }

  /**
   * Runs an operation and rethrows any failure as a TRPCError
   */
  static async wrapOperation<T>(operation: () => Promise<T>, context?: ErrorContext): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.toTRPCError(error, context);
    }
  }
}

/**
 * Convenience function to create a not found error
 */
export function createNotFoundError(resourceType: string, resourceId: string | number): TRPCError {
  return ErrorHandler.toTRPCError(new NotFoundError(resourceType, resourceId));
}
