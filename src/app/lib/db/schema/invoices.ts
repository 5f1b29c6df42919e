import { pgTable, serial, timestamp, varchar, integer, date, index } from 'drizzle-orm/pg-core';

/**
 * External payment invoices. One invoice aggregates the donations that share its
 * external invoice id (e.g. a single charge covering several sponsored children).
 */
export const invoices = pgTable(
  'invoices',
  {
    id: serial('id').primaryKey(),
    externalInvoiceId: varchar('external_invoice_id', { length: 255 }).notNull().unique(),
    externalChargeId: varchar('external_charge_id', { length: 255 }),
    externalCustomerId: varchar('external_customer_id', { length: 255 }),
    externalSubscriptionId: varchar('external_subscription_id', { length: 255 }),
    totalAmount: integer('total_amount').notNull(), // Stored in cents
    invoiceDate: date('invoice_date', { mode: 'string' }).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    chargeIdx: index('invoices_external_charge_id_idx').on(table.externalChargeId),
  })
);
