import { withRoute } from '@/lib/api/withRoute';
import { ok } from '@/lib/result';
import { getAppSettings } from '@/lib/settings/appSettings';
import { computeGoalsBreakdown } from '@/lib/financials/goals';
import { toGoalsJson } from '@/lib/serializers';

/**
 * GET /api/goals
 */
export async function GET(req: Request): Promise<Response> {
  const handler = withRoute(async () => {
    const settings = await getAppSettings();
    if (!settings.ok) return settings;
    return ok(toGoalsJson(computeGoalsBreakdown(settings.data.goals)));
  });

  return handler(req);
}
