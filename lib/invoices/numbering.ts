import { and, eq, isNull, max, sql } from 'drizzle-orm';
import { type DbExecutor, getDb } from '@/lib/db';
import { jobs, type Job } from '@/db/schema/jobs';
import { invoiceSequences } from '@/db/schema/invoice_sequences';

const SEQUENCE_ID = 1;

/**
 * Next invoice number: one past the highest number on any job, or the stored
 * sequence value when that is higher (the job holding the top number may have
 * been deleted). Starts at 1.
 */
export function readNextInvoiceNumber(db: DbExecutor): number {
  const [top] = db.select({ value: max(jobs.invoiceNumber) }).from(jobs).all();
  const sequence = db
    .select({ nextNumber: invoiceSequences.nextNumber })
    .from(invoiceSequences)
    .where(eq(invoiceSequences.id, SEQUENCE_ID))
    .get();

  const fromJobs = (top?.value ?? 0) + 1;
  return Math.max(fromJobs, sequence?.nextNumber ?? 1);
}

export function getNextInvoiceNumber(): number {
  return readNextInvoiceNumber(getDb());
}

/**
 * Hands out the next number and moves the sequence past it. Must run inside
 * the transaction that writes the number onto a job.
 */
export function allocateInvoiceNumber(tx: DbExecutor): number {
  const allocated = readNextInvoiceNumber(tx);
  tx.insert(invoiceSequences)
    .values({ id: SEQUENCE_ID, nextNumber: allocated + 1 })
    .onConflictDoUpdate({
      target: invoiceSequences.id,
      set: { nextNumber: allocated + 1, updatedAt: sql`CURRENT_TIMESTAMP` },
    })
    .run();
  return allocated;
}

/**
 * Returns the job's invoice number, assigning one first if it has none.
 * An assigned number is never recomputed.
 */
export function ensureInvoiceNumber(tx: DbExecutor, job: Pick<Job, 'id' | 'invoiceNumber'>): number {
  if (job.invoiceNumber !== null) return job.invoiceNumber;

  const assigned = allocateInvoiceNumber(tx);
  tx.update(jobs)
    .set({ invoiceNumber: assigned })
    .where(and(eq(jobs.id, job.id), isNull(jobs.invoiceNumber)))
    .run();
  return assigned;
}
