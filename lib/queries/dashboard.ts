import { count, gte, like, sql, type AnyColumn, type SQL } from 'drizzle-orm';
import { type DbExecutor, getDb } from '@/lib/db';
import { jobs } from '@/db/schema/jobs';
import { clients } from '@/db/schema/clients';
import { roundMoney } from '@/lib/financials/goals';
import { ok, err, type Result } from '@/lib/result';
import { addDays, toDateKey, toMonthKey } from '@/lib/utils/dateKeys';

export type DashboardStats = {
  totalRevenue: number;
  totalHours: number;
  totalClients: number;
  totalJobs: number;
  yearRevenue: number;
  monthRevenue: number;
  weekRevenue: number;
};

export const TRAILING_WEEK_DAYS = 7;

function sumOf(column: AnyColumn): SQL<number> {
  return sql<number>`coalesce(sum(${column}), 0)`.mapWith(Number);
}

/**
 * Revenue and volume totals. Year and month windows match on the job date's
 * calendar prefix; the week window is the trailing seven days from `now`.
 */
export async function getDashboardStats(
  now: Date = new Date(),
  db: DbExecutor = getDb()
): Promise<Result<DashboardStats>> {
  try {
    const [totals] = await db
      .select({ revenue: sumOf(jobs.total), hours: sumOf(jobs.hours), jobCount: count() })
      .from(jobs);
    const [clientTotals] = await db.select({ clientCount: count() }).from(clients);
    const [year] = await db
      .select({ revenue: sumOf(jobs.total) })
      .from(jobs)
      .where(like(jobs.jobDate, `${now.getFullYear()}-%`));
    const [month] = await db
      .select({ revenue: sumOf(jobs.total) })
      .from(jobs)
      .where(like(jobs.jobDate, `${toMonthKey(now)}-%`));
    const [week] = await db
      .select({ revenue: sumOf(jobs.total) })
      .from(jobs)
      .where(gte(jobs.jobDate, toDateKey(addDays(now, -TRAILING_WEEK_DAYS))));

    return ok({
      totalRevenue: roundMoney(totals?.revenue ?? 0),
      totalHours: roundMoney(totals?.hours ?? 0),
      totalClients: clientTotals?.clientCount ?? 0,
      totalJobs: totals?.jobCount ?? 0,
      yearRevenue: roundMoney(year?.revenue ?? 0),
      monthRevenue: roundMoney(month?.revenue ?? 0),
      weekRevenue: roundMoney(week?.revenue ?? 0),
    });
  } catch (error) {
    console.error('Error computing dashboard stats:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to compute stats', error);
  }
}
