import { pgTable, uuid, serial, text, timestamp } from 'drizzle-orm/pg-core';
import { runs } from './runs';

export const anomalies = pgTable('anomalies', {
  id: uuid('id').primaryKey().defaultRandom(),
  runId: text('run_id').notNull().references(() => runs.id),
  issue: text('issue').notNull(),
  fix: text('fix').notNull(),
  severity: text('severity', { enum: ['low', 'medium', 'high', 'critical'] }).notNull(),
  detectedAt: timestamp('detected_at', { withTimezone: true }).notNull().defaultNow(),
  // Insertion order; breaks ties between anomalies detected in the same pass
  seq: serial('seq').notNull(),
});
