import { sql } from 'drizzle-orm';
import {
  pgTable,
  serial,
  timestamp,
  varchar,
  integer,
  index,
  uniqueIndex,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';

/**
 * Donors table. Email is unique case-insensitively among donors that are not archived.
 */
export const donors = pgTable(
  'donors',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    email: varchar('email', { length: 255 }).notNull(),
    phone: varchar('phone', { length: 30 }),
    addressLine1: varchar('address_line1', { length: 255 }),
    addressLine2: varchar('address_line2', { length: 255 }),
    city: varchar('city', { length: 100 }),
    state: varchar('state', { length: 50 }),
    zipCode: varchar('zip_code', { length: 20 }),
    country: varchar('country', { length: 60 }).default('US'),
    // Timestamp of the newest external record applied to this donor
    lastUpdatedAt: timestamp('last_updated_at'),
    archivedAt: timestamp('archived_at'),
    // Set on donors merged away into another donor
    mergedIntoId: integer('merged_into_id').references((): AnyPgColumn => donors.id),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    uniqueKeptEmail: uniqueIndex('donors_email_kept_unique')
      .on(sql`lower(${table.email})`)
      .where(sql`${table.archivedAt} is null`),
    archivedAtIdx: index('donors_archived_at_idx').on(table.archivedAt),
    mergedIntoIdx: index('donors_merged_into_id_idx').on(table.mergedIntoId),
  })
);
