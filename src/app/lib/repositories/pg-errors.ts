import { DatabaseError } from 'pg';
import {
  ConflictError,
  DUPLICATE_SUBSCRIPTION_CHILD_MESSAGE,
  EMAIL_TAKEN_MESSAGE,
  ValidationError,
} from '@/app/lib/errors';

export const UNIQUE_VIOLATION = '23505';

export const CONSTRAINTS = {
  donorEmail: 'donors_email_kept_unique',
  donationSubscriptionChild: 'donations_subscription_child_unique',
  sponsorshipActivePledge: 'sponsorships_active_pledge_unique',
  invoiceExternalId: 'invoices_external_invoice_id_unique',
} as const;

/**
 * Name of the unique constraint a write violated, or null for any other failure.
 * Drizzle sometimes wraps the driver error, so the cause is checked too.
 */
export function uniqueViolationConstraint(error: unknown): string | null {
  const candidate =
    error instanceof DatabaseError
      ? error
      : error instanceof Error && error.cause instanceof DatabaseError
        ? error.cause
        : null;

  if (candidate?.code !== UNIQUE_VIOLATION) {
    return null;
  }
  return candidate.constraint ?? null;
}

/**
 * Rewrites a unique violation on one of our constraints as the matching domain
 * error. Anything else is returned as-is for the caller to rethrow.
 */
export function translateUniqueViolation(error: unknown): unknown {
  const constraint = uniqueViolationConstraint(error);

  switch (constraint) {
    case CONSTRAINTS.donorEmail:
      return ValidationError.field('email', EMAIL_TAKEN_MESSAGE);
    case CONSTRAINTS.donationSubscriptionChild:
      return ValidationError.base(DUPLICATE_SUBSCRIPTION_CHILD_MESSAGE);
    case CONSTRAINTS.sponsorshipActivePledge:
    case CONSTRAINTS.invoiceExternalId:
      return new ConflictError(constraint);
    default:
      return error;
  }
}

export async function withConstraintTranslation<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateUniqueViolation(error);
  }
}
