import { pgTable, serial, timestamp, varchar, index } from 'drizzle-orm/pg-core';

import { childGenderEnum } from './enums';

/**
 * Children available for sponsorship
 */
export const children = pgTable(
  'children',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    gender: childGenderEnum('gender'),
    archivedAt: timestamp('archived_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    archivedAtIdx: index('children_archived_at_idx').on(table.archivedAt),
  })
);
