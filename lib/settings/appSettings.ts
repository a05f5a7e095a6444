import { getDb, type Db } from '@/lib/db';
import type { CompanySettings } from '@/db/schema/company_settings';
import type { Goals } from '@/db/schema/goals';
import { GOALS_SEED } from '@/lib/db/migrate';
import { getCompanySettings, getGoals } from '@/lib/queries/settings';
import { ok, type Result } from '@/lib/result';

export const FALLBACK_HOURLY_RATE = 140;

/**
 * Company settings and goals, read once per database and handed to the
 * operations that need them.
 */
export type AppSettings = {
  company: CompanySettings | null;
  goals: Pick<Goals, 'yearlyNetGoal' | 'yearlyGrossGoal' | 'taxRate'>;
};

let cached: { db: Db; settings: AppSettings } | null = null;

export async function loadAppSettings(db: Db = getDb()): Promise<Result<AppSettings>> {
  const [companyResult, goalsResult] = await Promise.all([getCompanySettings(db), getGoals(db)]);
  if (!companyResult.ok) return companyResult;
  if (!goalsResult.ok) return goalsResult;

  const settings: AppSettings = {
    company: companyResult.data,
    goals: goalsResult.data ?? { ...GOALS_SEED },
  };
  cached = { db, settings };
  return ok(settings);
}

/**
 * Returns the loaded settings, loading them on first use or after the
 * database has been swapped.
 */
export async function getAppSettings(): Promise<Result<AppSettings>> {
  const db = getDb();
  if (cached && cached.db === db) return ok(cached.settings);
  return loadAppSettings(db);
}

export function defaultHourlyRate(settings: AppSettings): number {
  return settings.company?.defaultHourlyRate ?? FALLBACK_HOURLY_RATE;
}
