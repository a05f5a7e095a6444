import { readJsonBody, withRoute } from '@/lib/api/withRoute';
import { err, ok, describeZodError } from '@/lib/result';
import { listJobs } from '@/lib/queries/jobs';
import { createJob } from '@/lib/mutations/jobs';
import { jobListQuerySchema } from '@/lib/validators/jobs';
import { toJobListItemJson } from '@/lib/serializers';

/**
 * GET /api/jobs?client_id=...
 */
export async function GET(req: Request): Promise<Response> {
  const handler = withRoute(async (request: Request) => {
    const { searchParams } = new URL(request.url);
    const query = jobListQuerySchema.safeParse({
      client_id: searchParams.get('client_id') || undefined,
    });
    if (!query.success) return err('VALIDATION_ERROR', describeZodError(query.error));

    const result = await listJobs({ clientId: query.data.client_id });
    if (!result.ok) return result;
    return ok(result.data.map(toJobListItemJson));
  });

  return handler(req);
}

/**
 * POST /api/jobs
 */
export async function POST(req: Request): Promise<Response> {
  const handler = withRoute(
    async (request: Request) => {
      const body = await readJsonBody(request);
      const created = await createJob(body);
      if (!created.ok) return created;
      return ok({ success: true, id: created.data.id, invoice_number: created.data.invoiceNumber });
    },
    { status: 201 }
  );

  return handler(req);
}
