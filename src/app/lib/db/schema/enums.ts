import { pgEnum } from 'drizzle-orm/pg-core';

export const PROJECT_TYPES = ['general', 'campaign', 'sponsorship'] as const;
export const DONATION_STATUSES = [
  'succeeded',
  'failed',
  'refunded',
  'canceled',
  'needs_attention',
] as const;
export const PAYMENT_METHODS = ['stripe', 'check', 'cash', 'bank_transfer'] as const;
export const CHILD_GENDERS = ['boy', 'girl'] as const;

// Money columns are int4
export const MAX_AMOUNT_CENTS = 2_147_483_647;

export type ProjectType = (typeof PROJECT_TYPES)[number];
export type DonationStatus = (typeof DONATION_STATUSES)[number];
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];
export type ChildGender = (typeof CHILD_GENDERS)[number];

/**
 * Project type enum
 */
export const projectTypeEnum = pgEnum('project_type', PROJECT_TYPES);

/**
 * Settlement outcome of a donation
 */
export const donationStatusEnum = pgEnum('donation_status', DONATION_STATUSES);

export const paymentMethodEnum = pgEnum('payment_method', PAYMENT_METHODS);

export const childGenderEnum = pgEnum('child_gender', CHILD_GENDERS);
