import { eq } from 'drizzle-orm';
import { type DbExecutor, getDb } from '@/lib/db';
import { companySettings, type CompanySettings } from '@/db/schema/company_settings';
import { goals, type Goals } from '@/db/schema/goals';
import { ok, err, type Result } from '@/lib/result';

export const SINGLETON_ID = 1;

export async function getCompanySettings(db: DbExecutor = getDb()): Promise<Result<CompanySettings | null>> {
  try {
    const [row] = await db.select().from(companySettings).where(eq(companySettings.id, SINGLETON_ID)).limit(1);
    return ok(row ?? null);
  } catch (error) {
    console.error('Error getting company settings:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to load settings', error);
  }
}

export async function getGoals(db: DbExecutor = getDb()): Promise<Result<Goals | null>> {
  try {
    const [row] = await db.select().from(goals).where(eq(goals.id, SINGLETON_ID)).limit(1);
    return ok(row ?? null);
  } catch (error) {
    console.error('Error getting goals:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to load goals', error);
  }
}
