import { sqliteTable, integer, text, real } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

export const goals = sqliteTable('goals', {
  id: integer('id').primaryKey(),
  yearlyNetGoal: real('yearly_net_goal').notNull().default(30000),
  yearlyGrossGoal: real('yearly_gross_goal').notNull().default(43500),
  taxRate: real('tax_rate').notNull().default(0.31),
  updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
});

export type Goals = typeof goals.$inferSelect;
export type NewGoals = typeof goals.$inferInsert;
