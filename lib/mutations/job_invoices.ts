import { eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { getDb } from '@/lib/db';
import { jobs } from '@/db/schema/jobs';
import { ensureInvoiceNumber } from '@/lib/invoices/numbering';
import { ok, err, toAppError, describeZodError, type Result } from '@/lib/result';
import { invoiceStatusUpdateSchema, type InvoiceStatus } from '@/lib/validators/jobs';
import { toDateKey } from '@/lib/utils/dateKeys';

export type InvoiceStatusChange = {
  invoiceNumber: number;
  status: InvoiceStatus;
};

/**
 * Date columns written for each status: `sent` and `paid` stamp their own date
 * and leave the other alone, `draft` clears both.
 */
export function invoiceDatesForStatus(
  status: InvoiceStatus,
  today: string
): { invoiceSentDate?: string | null; invoicePaidDate?: string | null } {
  if (status === 'sent') return { invoiceSentDate: today };
  if (status === 'paid') return { invoicePaidDate: today };
  return { invoiceSentDate: null, invoicePaidDate: null };
}

/**
 * Moves a job's invoice to a new status. The job gets its invoice number here
 * if it does not have one yet.
 */
export async function updateInvoiceStatus(
  jobId: number,
  input: unknown,
  now: Date = new Date()
): Promise<Result<InvoiceStatusChange>> {
  try {
    const { status } = invoiceStatusUpdateSchema.parse(input);
    const db = getDb();

    return db.transaction((tx): Result<InvoiceStatusChange> => {
      const job = tx
        .select({ id: jobs.id, invoiceNumber: jobs.invoiceNumber })
        .from(jobs)
        .where(eq(jobs.id, jobId))
        .get();
      if (!job) return err('NOT_FOUND', 'Job not found');

      const invoiceNumber = ensureInvoiceNumber(tx, job);
      tx.update(jobs)
        .set({
          invoiceStatus: status,
          ...invoiceDatesForStatus(status, toDateKey(now)),
          updatedAt: sql`CURRENT_TIMESTAMP`,
        })
        .where(eq(jobs.id, jobId))
        .run();

      return ok({ invoiceNumber, status });
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      return err('VALIDATION_ERROR', describeZodError(error), error.issues);
    }
    console.error('Error updating invoice status:', error);
    const appError = toAppError(error);
    return err(appError.code, appError.message, appError.details);
  }
}
