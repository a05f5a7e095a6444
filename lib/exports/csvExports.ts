import { desc, eq, getTableColumns } from 'drizzle-orm';
import { type DbExecutor, getDb } from '@/lib/db';
import { clients } from '@/db/schema/clients';
import { jobs } from '@/db/schema/jobs';
import { listClients } from '@/lib/queries/clients';
import { ok, err, type Result } from '@/lib/result';
import { stringifyCsv, type CsvValue } from '@/lib/utils/csv';
import { toFileTimestamp } from '@/lib/utils/dateKeys';

export const CLIENT_EXPORT_HEADERS = [
  'ID',
  'Name',
  'Email',
  'Phone',
  'Address',
  'Hourly Rate',
  'Notes',
  'Created At',
  'Updated At',
] as const;

export const JOB_EXPORT_HEADERS = [
  'ID',
  'Client Name',
  'Job Date',
  'Description',
  'Hours',
  'Hourly Rate',
  'Total',
  'Notes',
  'Status',
  'Invoice Number',
  'Invoice Status',
  'Created At',
] as const;

export type CsvExport = {
  filename: string;
  content: string;
};

export function exportFilename(kind: 'clients' | 'jobs', now: Date): string {
  return `${kind}_export_${toFileTimestamp(now)}.csv`;
}

export async function exportClientsCsv(now: Date = new Date(), db: DbExecutor = getDb()): Promise<Result<CsvExport>> {
  const clientsResult = await listClients(db);
  if (!clientsResult.ok) return clientsResult;

  const rows: CsvValue[][] = clientsResult.data.map((client) => [
    client.id,
    client.name,
    client.email,
    client.phone,
    client.address,
    client.hourlyRate,
    client.notes,
    client.createdAt,
    client.updatedAt,
  ]);

  return ok({
    filename: exportFilename('clients', now),
    content: stringifyCsv([[...CLIENT_EXPORT_HEADERS], ...rows]),
  });
}

/**
 * Every job, newest job date first. Jobs whose client is gone still export,
 * with an empty client name.
 */
export async function exportJobsCsv(now: Date = new Date(), db: DbExecutor = getDb()): Promise<Result<CsvExport>> {
  try {
    const jobRows = await db
      .select({ ...getTableColumns(jobs), clientName: clients.name })
      .from(jobs)
      .leftJoin(clients, eq(jobs.clientId, clients.id))
      .orderBy(desc(jobs.jobDate), desc(jobs.id));

    const rows: CsvValue[][] = jobRows.map((job) => [
      job.id,
      job.clientName,
      job.jobDate,
      job.description,
      job.hours,
      job.hourlyRate,
      job.total,
      job.notes,
      job.status,
      job.invoiceNumber,
      job.invoiceStatus,
      job.createdAt,
    ]);

    return ok({
      filename: exportFilename('jobs', now),
      content: stringifyCsv([[...JOB_EXPORT_HEADERS], ...rows]),
    });
  } catch (error) {
    console.error('Error exporting jobs:', error);
    return err('PERSISTENCE_ERROR', error instanceof Error ? error.message : 'Failed to export jobs', error);
  }
}
