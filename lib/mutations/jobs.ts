import { eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { getDb } from '@/lib/db';
import { jobs, type Job } from '@/db/schema/jobs';
import { clients } from '@/db/schema/clients';
import { allocateInvoiceNumber } from '@/lib/invoices/numbering';
import { ok, err, toAppError, describeZodError, type Result } from '@/lib/result';
import { jobCreateSchema, jobUpdateSchema } from '@/lib/validators/jobs';

/**
 * Job total. Always derived from hours and rate, never taken from the caller.
 */
export function computeJobTotal(hours: number, hourlyRate: number): number {
  return hours * hourlyRate;
}

function failure(context: string, error: unknown): Result<never> {
  if (error instanceof z.ZodError) {
    return err('VALIDATION_ERROR', describeZodError(error), error.issues);
  }
  console.error(`Error ${context}:`, error);
  const appError = toAppError(error);
  return err(appError.code, appError.message, appError.details);
}

/**
 * Creates a draft job and gives it the next invoice number in the same
 * transaction. Missing hours count as 0; a missing rate falls back to the
 * client's hourly rate.
 */
export async function createJob(input: unknown): Promise<Result<Job>> {
  try {
    const validated = jobCreateSchema.parse(input);
    const db = getDb();

    return db.transaction((tx): Result<Job> => {
      const client = tx
        .select({ id: clients.id, hourlyRate: clients.hourlyRate })
        .from(clients)
        .where(eq(clients.id, validated.client_id))
        .get();
      if (!client) return err('VALIDATION_ERROR', 'Client not found');

      const hours = validated.hours ?? 0;
      const hourlyRate = validated.hourly_rate ?? client.hourlyRate;
      const invoiceNumber = allocateInvoiceNumber(tx);

      const row = tx
        .insert(jobs)
        .values({
          clientId: client.id,
          jobDate: validated.job_date,
          description: validated.description,
          hours,
          hourlyRate,
          total: computeJobTotal(hours, hourlyRate),
          notes: validated.notes,
          status: 'draft',
          invoiceNumber,
          invoiceStatus: 'draft',
        })
        .returning()
        .get();
      if (!row) return err('PERSISTENCE_ERROR', 'Failed to create job');

      return ok(row);
    });
  } catch (error) {
    return failure('creating job', error);
  }
}

/**
 * Replaces a job's editable fields and recomputes its total. A missing rate
 * keeps the job's current rate.
 */
export async function updateJob(jobId: number, input: unknown): Promise<Result<Job>> {
  try {
    const validated = jobUpdateSchema.parse(input);
    const db = getDb();

    return db.transaction((tx): Result<Job> => {
      const existing = tx.select({ hourlyRate: jobs.hourlyRate }).from(jobs).where(eq(jobs.id, jobId)).get();
      if (!existing) return err('NOT_FOUND', 'Job not found');

      const hours = validated.hours ?? 0;
      const hourlyRate = validated.hourly_rate ?? existing.hourlyRate;

      const row = tx
        .update(jobs)
        .set({
          jobDate: validated.job_date,
          description: validated.description,
          hours,
          hourlyRate,
          total: computeJobTotal(hours, hourlyRate),
          notes: validated.notes,
          status: validated.status ?? 'draft',
          updatedAt: sql`CURRENT_TIMESTAMP`,
        })
        .where(eq(jobs.id, jobId))
        .returning()
        .get();
      if (!row) return err('NOT_FOUND', 'Job not found');

      return ok(row);
    });
  } catch (error) {
    return failure('updating job', error);
  }
}

/**
 * Deletes a job by id. Deleting an id that does not exist is not an error.
 */
export async function deleteJob(jobId: number): Promise<Result<{ deleted: boolean }>> {
  try {
    const db = getDb();
    const result = await db.delete(jobs).where(eq(jobs.id, jobId));
    return ok({ deleted: result.changes > 0 });
  } catch (error) {
    return failure('deleting job', error);
  }
}
