import { eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { getDb } from '@/lib/db';
import { companySettings, type CompanySettings } from '@/db/schema/company_settings';
import { SINGLETON_ID } from '@/lib/queries/settings';
import { loadAppSettings, FALLBACK_HOURLY_RATE } from '@/lib/settings/appSettings';
import { ok, err, toAppError, describeZodError, type Result } from '@/lib/result';
import { companySettingsInputSchema } from '@/lib/validators/settings';

/**
 * Full replace of the company settings row. Reloads the in-memory settings
 * so later invoices pick up the change.
 */
export async function updateCompanySettings(input: unknown): Promise<Result<CompanySettings>> {
  try {
    const validated = companySettingsInputSchema.parse(input);
    const db = getDb();

    const [row] = await db
      .update(companySettings)
      .set({
        companyName: validated.company_name,
        ownerName: validated.owner_name,
        address: validated.address,
        phone: validated.phone,
        email: validated.email,
        defaultHourlyRate: validated.default_hourly_rate ?? FALLBACK_HOURLY_RATE,
        updatedAt: sql`CURRENT_TIMESTAMP`,
      })
      .where(eq(companySettings.id, SINGLETON_ID))
      .returning();

    if (!row) return err('NOT_FOUND', 'Settings not found');

    const reloaded = await loadAppSettings(db);
    if (!reloaded.ok) return reloaded;
    return ok(row);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return err('VALIDATION_ERROR', describeZodError(error), error.issues);
    }
    console.error('Error updating company settings:', error);
    const appError = toAppError(error);
    return err(appError.code, appError.message, appError.details);
  }
}
