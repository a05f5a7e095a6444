import { fileResponse, jsonErr } from '@/lib/api-response';
import { exportClientsCsv } from '@/lib/exports/csvExports';

/**
 * GET /api/export/clients
 */
export async function GET(): Promise<Response> {
  const result = await exportClientsCsv();
  if (!result.ok) return jsonErr(result.error);
  return fileResponse(result.data.content, {
    contentType: 'text/csv; charset=utf-8',
    filename: result.data.filename,
  });
}
