import { pgTable, serial, text, timestamp, varchar, boolean, index } from 'drizzle-orm/pg-core';

import { projectTypeEnum } from './enums';

/**
 * Projects that donations are credited to. Sponsorship-type projects are
 * provisioned one per sponsorship; system projects can never be deleted.
 */
export const projects = pgTable(
  'projects',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: 255 }).notNull(),
    description: text('description'),
    projectType: projectTypeEnum('project_type').default('general').notNull(),
    system: boolean('system').default(false).notNull(),
    archivedAt: timestamp('archived_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    titleIdx: index('projects_title_idx').on(table.title),
    archivedAtIdx: index('projects_archived_at_idx').on(table.archivedAt),
  })
);
