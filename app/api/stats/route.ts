import { withRoute } from '@/lib/api/withRoute';
import { ok } from '@/lib/result';
import { getDashboardStats } from '@/lib/queries/dashboard';
import { toStatsJson } from '@/lib/serializers';

/**
 * GET /api/stats
 */
export async function GET(req: Request): Promise<Response> {
  const handler = withRoute(async () => {
    const result = await getDashboardStats();
    if (!result.ok) return result;
    return ok(toStatsJson(result.data));
  });

  return handler(req);
}
