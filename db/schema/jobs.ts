import { sqliteTable, integer, text, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { clients } from './clients';

export const jobs = sqliteTable(
  'jobs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    clientId: integer('client_id')
      .notNull()
      .references(() => clients.id),
    jobDate: text('job_date').notNull(),
    description: text('description').notNull(),
    hours: real('hours').notNull(),
    hourlyRate: real('hourly_rate').notNull(),
    // hours * hourly_rate, written on create/update only
    total: real('total').notNull(),
    notes: text('notes'),
    status: text('status').default('draft'),
    invoiceNumber: integer('invoice_number'),
    invoiceStatus: text('invoice_status').default('draft'),
    invoiceSentDate: text('invoice_sent_date'),
    invoicePaidDate: text('invoice_paid_date'),
    createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
    updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => ({
    clientIdIdx: index('jobs_client_id_idx').on(table.clientId),
    jobDateIdx: index('jobs_job_date_idx').on(table.jobDate),
    invoiceNumberUnique: uniqueIndex('jobs_invoice_number_unique').on(table.invoiceNumber),
  })
);

export type Job = typeof jobs.$inferSelect;
export type NewJob = typeof jobs.$inferInsert;
