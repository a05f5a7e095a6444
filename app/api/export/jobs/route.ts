import { fileResponse, jsonErr } from '@/lib/api-response';
import { exportJobsCsv } from '@/lib/exports/csvExports';

/**
 * GET /api/export/jobs
 */
export async function GET(): Promise<Response> {
  const result = await exportJobsCsv();
  if (!result.ok) return jsonErr(result.error);
  return fileResponse(result.data.content, {
    contentType: 'text/csv; charset=utf-8',
    filename: result.data.filename,
  });
}
