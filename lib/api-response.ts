import type { AppError, Result } from '@/lib/result';

export type ResponseOptions = {
  /** Status for a successful response (defaults to 200). */
  status?: number;
  /**
   * Lookup endpoints answer a missing record with a bare `{ error }` body
   * instead of `{ success: false, error }`.
   */
  lookup?: boolean;
};

export function statusForError(error: AppError): number {
  return error.code === 'NOT_FOUND' ? 404 : 400;
}

/**
 * Creates a successful JSON Response. The data is the body as-is.
 */
export function jsonOk<T>(data: T, status = 200): Response {
  return Response.json(data, { status });
}

/**
 * Creates an error JSON Response from AppError.
 *
 * @returns `{ success: false, error }`, or `{ error }` for a lookup miss
 */
export function jsonErr(error: AppError, options: ResponseOptions = {}): Response {
  const status = statusForError(error);
  if (options.lookup && error.code === 'NOT_FOUND') {
    return Response.json({ error: error.message }, { status });
  }
  return Response.json({ success: false, error: error.message }, { status });
}

/**
 * Creates a JSON Response from a Result<T>.
 * Automatically handles both success and error cases.
 */
export function jsonResult<T>(result: Result<T>, options: ResponseOptions = {}): Response {
  if (result.ok) {
    return jsonOk(result.data, options.status);
  }
  return jsonErr(result.error, options);
}

/**
 * Response for a generated file download.
 */
export function fileResponse(body: ArrayBuffer | string, params: { contentType: string; filename: string }): Response {
  return new Response(body, {
    headers: {
      'Content-Type': params.contentType,
      'Content-Disposition': `attachment; filename="${params.filename}"`,
      'Cache-Control': 'private, no-store, max-age=0',
    },
  });
}
