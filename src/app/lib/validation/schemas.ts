import { z } from 'zod';
import { CHILD_GENDERS, PAYMENT_METHODS, DONATION_STATUSES, MAX_AMOUNT_CENTS } from '@/app/lib/db/schema/enums';
import { VISIBILITIES } from '@/app/lib/utils/visibility';
import { ARCHIVABLE_ENTITIES } from '@/app/lib/services/archive.service';

/**
 * Common validation schemas used across multiple routers
 */

// Base schemas for common types
export const idSchema = z.number().int().positive();
export const amountSchema = z.number().int().positive().max(MAX_AMOUNT_CENTS); // Cents
export const calendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');
const optionalText = z.string().nullable().optional();

export const visibilitySchema = z.enum(VISIBILITIES);
export const donationStatusSchema = z.enum(DONATION_STATUSES);
export const paymentMethodSchema = z.enum(PAYMENT_METHODS);
export const childGenderSchema = z.enum(CHILD_GENDERS);
export const archivableEntitySchema = z.enum(ARCHIVABLE_ENTITIES);

// Pagination schemas
export const paginationSchema = z.object({
  limit: z.number().int().min(1).max(100).optional(),
  offset: z.number().int().min(0).optional(),
});

export const listSchema = paginationSchema.extend({
  visibility: visibilitySchema.optional(),
});

/**
 * Raw donor attributes. Format checks happen in the identity resolver so the
 * same rules apply to imported records.
 */
export const donorHintsSchema = z.object({
  name: optionalText,
  email: optionalText,
  phone: optionalText,
  addressLine1: optionalText,
  addressLine2: optionalText,
  city: optionalText,
  state: optionalText,
  zipCode: optionalText,
  country: optionalText,
});

const externalIdsSchema = z.object({
  externalSubscriptionId: optionalText,
  externalInvoiceId: optionalText,
  externalChargeId: optionalText,
  externalCustomerId: optionalText,
});

export const createDonationSchema = externalIdsSchema
  .extend({
    donorId: idSchema.optional(),
    donor: donorHintsSchema.optional(),
    childId: idSchema.nullable().optional(),
    projectId: idSchema.nullable().optional(),
    amount: amountSchema,
    date: calendarDateSchema,
    paymentMethod: paymentMethodSchema,
    status: donationStatusSchema.optional(),
    description: optionalText,
    needsAttentionReason: optionalText,
  })
  .refine((input) => input.donorId !== undefined || input.donor !== undefined, {
    message: 'Either donorId or donor is required',
    path: ['donorId'],
  });

export const paymentRecordSchema = externalIdsSchema.extend({
  amountCents: amountSchema,
  date: calendarDateSchema,
  donor: donorHintsSchema,
  childId: idSchema.nullable().optional(),
  projectId: idSchema.nullable().optional(),
  paymentMethod: paymentMethodSchema,
  status: z.string().nullable().optional(), // Raw provider status
  description: optionalText,
  invoiceTotalCents: amountSchema.nullable().optional(),
});

export const mergeSelectionsSchema = z.object({
  name: idSchema.optional(),
  email: idSchema.optional(),
  phone: idSchema.optional(),
  address: idSchema.optional(),
});
