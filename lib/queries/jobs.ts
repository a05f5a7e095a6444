import { desc, eq, getTableColumns } from 'drizzle-orm';
import { type DbExecutor, getDb } from '@/lib/db';
import { jobs, type Job } from '@/db/schema/jobs';
import { clients } from '@/db/schema/clients';
import { ok, err, type Result } from '@/lib/result';

export type JobWithClientName = Job & { clientName: string };

export type JobWithClient = JobWithClientName & {
  clientEmail: string | null;
  clientPhone: string | null;
  clientAddress: string | null;
};

/**
 * Jobs joined with their client's name, newest job date first.
 */
export async function listJobs(
  params: { clientId?: number | null } = {},
  db: DbExecutor = getDb()
): Promise<Result<JobWithClientName[]>> {
  try {
    const rows = await db
      .select({ ...getTableColumns(jobs), clientName: clients.name })
      .from(jobs)
      .innerJoin(clients, eq(jobs.clientId, clients.id))
      .where(params.clientId ? eq(jobs.clientId, params.clientId) : undefined)
      .orderBy(desc(jobs.jobDate), desc(jobs.id));

    return ok(rows);
  } catch (error) {
    console.error('Error listing jobs:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to fetch jobs', error);
  }
}

export function selectJobWithClient(db: DbExecutor, jobId: number): JobWithClient | undefined {
  return db
    .select({
      ...getTableColumns(jobs),
      clientName: clients.name,
      clientEmail: clients.email,
      clientPhone: clients.phone,
      clientAddress: clients.address,
    })
    .from(jobs)
    .innerJoin(clients, eq(jobs.clientId, clients.id))
    .where(eq(jobs.id, jobId))
    .get();
}

export async function getJobById(jobId: number, db: DbExecutor = getDb()): Promise<Result<JobWithClient>> {
  try {
    const row = selectJobWithClient(db, jobId);
    if (!row) {
      return err('NOT_FOUND', 'Job not found');
    }
    return ok(row);
  } catch (error) {
    console.error('Error fetching job:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to fetch job', error);
  }
}
