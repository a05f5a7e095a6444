import { sqliteTable, integer, text } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

export const invoiceSequences = sqliteTable('invoice_sequences', {
  id: integer('id').primaryKey(),
  nextNumber: integer('next_number').notNull().default(1),
  updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
});

export type InvoiceSequence = typeof invoiceSequences.$inferSelect;
export type NewInvoiceSequence = typeof invoiceSequences.$inferInsert;
