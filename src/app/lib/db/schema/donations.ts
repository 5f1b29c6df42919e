import { sql } from 'drizzle-orm';
import {
  pgTable,
  serial,
  text,
  timestamp,
  varchar,
  boolean,
  integer,
  date,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

import { donationStatusEnum, paymentMethodEnum } from './enums';
import { donors } from './donors';
import { children } from './children';
import { projects } from './projects';
import { sponsorships } from './sponsorships';

/**
 * Donations table to track financial contributions
 */
export const donations = pgTable(
  'donations',
  {
    id: serial('id').primaryKey(),
    donorId: integer('donor_id')
      .references(() => donors.id)
      .notNull(),
    projectId: integer('project_id')
      .references(() => projects.id)
      .notNull(),
    sponsorshipId: integer('sponsorship_id').references(() => sponsorships.id),
    childId: integer('child_id').references(() => children.id),
    amount: integer('amount').notNull(), // Stored in cents
    date: date('date', { mode: 'string' }).notNull(),
    paymentMethod: paymentMethodEnum('payment_method').notNull(),
    status: donationStatusEnum('status').default('succeeded').notNull(),
    description: text('description'),
    externalSubscriptionId: varchar('external_subscription_id', { length: 255 }),
    externalInvoiceId: varchar('external_invoice_id', { length: 255 }),
    externalChargeId: varchar('external_charge_id', { length: 255 }),
    externalCustomerId: varchar('external_customer_id', { length: 255 }),
    duplicateSubscriptionDetected: boolean('duplicate_subscription_detected')
      .default(false)
      .notNull(),
    needsAttentionReason: text('needs_attention_reason'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    uniqueSubscriptionChild: uniqueIndex('donations_subscription_child_unique')
      .on(table.externalSubscriptionId, table.childId)
      .where(sql`${table.externalSubscriptionId} is not null`),
    donorIdx: index('donations_donor_id_idx').on(table.donorId),
    projectDateIdx: index('donations_project_id_date_idx').on(table.projectId, table.date),
    statusIdx: index('donations_status_idx').on(table.status),
    invoiceIdx: index('donations_external_invoice_id_idx').on(table.externalInvoiceId),
    chargeIdx: index('donations_external_charge_id_idx').on(table.externalChargeId),
  })
);
