import { sqliteTable, integer, text, real } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

/**
 * Singleton row (id = 1) holding the business identity printed on invoices.
 */
export const companySettings = sqliteTable('company_settings', {
  id: integer('id').primaryKey(),
  companyName: text('company_name').notNull(),
  ownerName: text('owner_name').notNull(),
  address: text('address').notNull(),
  phone: text('phone').notNull(),
  email: text('email').notNull(),
  defaultHourlyRate: real('default_hourly_rate').notNull().default(140),
  updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
});

export type CompanySettings = typeof companySettings.$inferSelect;
export type NewCompanySettings = typeof companySettings.$inferInsert;
