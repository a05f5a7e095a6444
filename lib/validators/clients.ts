import { z } from 'zod';
import { numericInputSchema, optionalTextSchema } from './shared';

/**
 * Client create/update body. Updates replace every field, so both share one shape.
 */
export const clientInputSchema = z.object({
  name: z.string({ required_error: 'Name is required' }).trim().min(1, 'Name is required'),
  email: optionalTextSchema,
  phone: optionalTextSchema,
  address: optionalTextSchema,
  hourly_rate: numericInputSchema.optional(),
  notes: optionalTextSchema,
});

export type ParsedClientInput = z.infer<typeof clientInputSchema>;
