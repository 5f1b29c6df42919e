import {
  DONATION_STATUSES,
  PAYMENT_METHODS,
  type DonationStatus,
  type PaymentMethod,
} from '@/app/lib/db/schema/enums';
import { ValidationError } from '@/app/lib/errors';

export function isDonationStatus(value: string): value is DonationStatus {
  return (DONATION_STATUSES as readonly string[]).includes(value);
}

export function isPaymentMethod(value: string): value is PaymentMethod {
  return (PAYMENT_METHODS as readonly string[]).includes(value);
}

export function parseDonationStatus(value: string): DonationStatus {
  if (!isDonationStatus(value)) {
    throw ValidationError.field('status', `'${value}' is not a valid status`);
  }
  return value;
}

export function parsePaymentMethod(value: string | null | undefined): PaymentMethod {
  if (value === null || value === undefined || value.trim() === '') {
    throw ValidationError.field('payment_method', "can't be blank");
  }
  if (!isPaymentMethod(value)) {
    throw ValidationError.field('payment_method', `'${value}' is not a valid payment_method`);
  }
  return value;
}

/**
 * Anything other than a settled payment goes to the review queue.
 */
export function needsReview(status: DonationStatus): boolean {
  return status !== 'succeeded';
}

export interface ProviderStatusResolution {
  status: DonationStatus;
  reason: string | null;
}

const PROVIDER_STATUS_MAP: Record<string, DonationStatus> = {
  succeeded: 'succeeded',
  failed: 'failed',
  refunded: 'refunded',
  canceled: 'canceled',
  cancelled: 'canceled',
};

/**
 * Maps a payment provider's status string onto a settlement status. Unknown or
 * missing values are parked as needs_attention with the raw value as the reason.
 */
export function mapProviderStatus(raw: string | null | undefined): ProviderStatusResolution {
  const key = (raw ?? '').trim().toLowerCase();
  const status = PROVIDER_STATUS_MAP[key];
  if (status) {
    return { status, reason: null };
  }
  return {
    status: 'needs_attention',
    reason: `Unrecognized payment status: ${raw ?? 'none'}`,
  };
}
