import { readJsonBody, withRoute } from '@/lib/api/withRoute';
import { ok } from '@/lib/result';
import { listClients } from '@/lib/queries/clients';
import { createClient } from '@/lib/mutations/clients';
import { getAppSettings } from '@/lib/settings/appSettings';
import { toClientJson } from '@/lib/serializers';

/**
 * GET /api/clients
 */
export async function GET(req: Request): Promise<Response> {
  const handler = withRoute(async () => {
    const result = await listClients();
    if (!result.ok) return result;
    return ok(result.data.map(toClientJson));
  });

  return handler(req);
}

/**
 * POST /api/clients
 */
export async function POST(req: Request): Promise<Response> {
  const handler = withRoute(
    async (request: Request) => {
      const body = await readJsonBody(request);
      const settings = await getAppSettings();
      if (!settings.ok) return settings;
      const created = await createClient(body, settings.data);
      if (!created.ok) return created;
      return ok({ success: true, id: created.data.id });
    },
    { status: 201 }
  );

  return handler(req);
}
