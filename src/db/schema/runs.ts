import { pgTable, text, integer, timestamp, index } from 'drizzle-orm/pg-core';

export const runs = pgTable(
  'runs',
  {
    id: text('id').primaryKey(),
    status: text('status', { enum: ['success', 'failure'] }).notNull(),
    duration: integer('duration').notNull(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    branch: text('branch'),
    commitSha: text('commit_sha'),
    author: text('author'),
    workflow: text('workflow'),
    url: text('url'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    startedAtIdx: index('runs_started_at_idx').on(table.startedAt),
  }),
);
