import { readJsonBody, withRoute } from '@/lib/api/withRoute';
import { err, ok } from '@/lib/result';
import { getCompanySettings } from '@/lib/queries/settings';
import { updateCompanySettings } from '@/lib/mutations/settings';
import { toSettingsJson } from '@/lib/serializers';

/**
 * GET /api/settings
 */
export async function GET(req: Request): Promise<Response> {
  const handler = withRoute(
    async () => {
      const result = await getCompanySettings();
      if (!result.ok) return result;
      if (!result.data) return err('NOT_FOUND', 'Settings not found');
      return ok(toSettingsJson(result.data));
    },
    { lookup: true }
  );

  return handler(req);
}

/**
 * PUT /api/settings
 */
export async function PUT(req: Request): Promise<Response> {
  const handler = withRoute(async (request: Request) => {
    const body = await readJsonBody(request);
    const updated = await updateCompanySettings(body);
    if (!updated.ok) return updated;
    return ok({ success: true });
  });

  return handler(req);
}
