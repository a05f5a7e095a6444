import { eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { getDb } from '@/lib/db';
import { clients, type Client, type NewClient } from '@/db/schema/clients';
import { ok, err, toAppError, describeZodError, type Result } from '@/lib/result';
import { clientInputSchema, type ParsedClientInput } from '@/lib/validators/clients';
import { defaultHourlyRate, type AppSettings } from '@/lib/settings/appSettings';

function toClientValues(validated: ParsedClientInput, settings: AppSettings): NewClient {
  return {
    name: validated.name,
    email: validated.email,
    phone: validated.phone,
    address: validated.address,
    hourlyRate: validated.hourly_rate ?? defaultHourlyRate(settings),
    notes: validated.notes,
  };
}

function failure(context: string, error: unknown): Result<never> {
  if (error instanceof z.ZodError) {
    return err('VALIDATION_ERROR', describeZodError(error), error.issues);
  }
  console.error(`Error ${context}:`, error);
  const appError = toAppError(error);
  return err(appError.code, appError.message, appError.details);
}

export async function createClient(input: unknown, settings: AppSettings): Promise<Result<Client>> {
  try {
    const validated = clientInputSchema.parse(input);
    const db = getDb();

    const [row] = await db.insert(clients).values(toClientValues(validated, settings)).returning();
    if (!row) return err('PERSISTENCE_ERROR', 'Failed to create client');
    return ok(row);
  } catch (error) {
    return failure('creating client', error);
  }
}

/**
 * Replaces every editable field of a client.
 */
export async function updateClient(
  clientId: number,
  input: unknown,
  settings: AppSettings
): Promise<Result<Client>> {
  try {
    const validated = clientInputSchema.parse(input);
    const db = getDb();

    const [row] = await db
      .update(clients)
      .set({ ...toClientValues(validated, settings), updatedAt: sql`CURRENT_TIMESTAMP` })
      .where(eq(clients.id, clientId))
      .returning();

    if (!row) return err('NOT_FOUND', 'Client not found');
    return ok(row);
  } catch (error) {
    return failure('updating client', error);
  }
}
