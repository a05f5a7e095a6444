import { type Result, toAppError } from '@/lib/result';
import { jsonErr, jsonResult, type ResponseOptions } from '@/lib/api-response';

/**
 * Route handler function type.
 * Accepts a Request and returns a Promise<Result<T>>.
 */
type RouteHandler<T> = (req: Request) => Promise<Result<T>>;

/**
 * Wraps a route handler to provide consistent error handling.
 *
 * - Catches unexpected exceptions
 * - Converts them to AppError
 * - Returns consistent JSON responses
 * - Logs errors for debugging
 *
 * @example
 * ```typescript
 * // app/api/clients/route.ts
 * export async function POST(req: Request): Promise<Response> {
 *   const handler = withRoute(async (request: Request) => {
 *     const body = await readJsonBody(request);
 *     return await createClient(body, settings);
 *   }, { status: 201 });
 *   return handler(req);
 * }
 * ```
 */
export function withRoute<T>(handler: RouteHandler<T>, options: ResponseOptions = {}) {
  return async (req: Request): Promise<Response> => {
    try {
      const result = await handler(req);
      if (!result.ok && result.error.code === 'PERSISTENCE_ERROR') {
        console.error('Route failed:', {
          message: result.error.message,
          details: result.error.details,
          url: req.url,
          method: req.method,
        });
      }
      return jsonResult(result, options);
    } catch (error) {
      // Unexpected error - log it and convert to AppError
      const appError = toAppError(error);
      console.error('Unexpected error in route handler:', {
        code: appError.code,
        message: appError.message,
        details: appError.details,
        url: req.url,
        method: req.method,
      });
      return jsonErr(appError, options);
    }
  };
}

/**
 * Parses a request body as JSON. A missing body reads as an empty object.
 */
export async function readJsonBody(req: Request): Promise<unknown> {
  const text = await req.text();
  if (!text.trim()) return {};
  return JSON.parse(text);
}
