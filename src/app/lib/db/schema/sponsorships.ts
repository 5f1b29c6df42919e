import { sql } from 'drizzle-orm';
import { pgTable, serial, timestamp, integer, date, index, uniqueIndex } from 'drizzle-orm/pg-core';

import { donors } from './donors';
import { children } from './children';
import { projects } from './projects';

/**
 * Recurring monthly pledges. A sponsorship is active while end_date is null.
 */
export const sponsorships = pgTable(
  'sponsorships',
  {
    id: serial('id').primaryKey(),
    donorId: integer('donor_id')
      .references(() => donors.id)
      .notNull(),
    childId: integer('child_id')
      .references(() => children.id)
      .notNull(),
    projectId: integer('project_id')
      .references(() => projects.id)
      .notNull(),
    monthlyAmount: integer('monthly_amount').notNull(), // Stored in cents
    startDate: date('start_date', { mode: 'string' }).notNull(),
    endDate: date('end_date', { mode: 'string' }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    // At most one active pledge per donor, child and amount
    uniqueActivePledge: uniqueIndex('sponsorships_active_pledge_unique')
      .on(table.donorId, table.childId, table.monthlyAmount)
      .where(sql`${table.endDate} is null`),
    donorIdx: index('sponsorships_donor_id_idx').on(table.donorId),
    childIdx: index('sponsorships_child_id_idx').on(table.childId),
    projectIdx: index('sponsorships_project_id_idx').on(table.projectId),
  })
);
