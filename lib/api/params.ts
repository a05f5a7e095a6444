import { err, ok, type Result } from '@/lib/result';
import { idInputSchema } from '@/lib/validators/shared';

/**
 * Path ids are positive integers. Anything else names a record that cannot
 * exist, so it reads as a miss rather than a bad request.
 */
export function parseIdParam(value: string | undefined, notFoundMessage: string): Result<number> {
  const parsed = idInputSchema.safeParse(value ?? '');
  if (!parsed.success) return err('NOT_FOUND', notFoundMessage);
  return ok(parsed.data);
}
