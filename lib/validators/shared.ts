import { z } from 'zod';

/**
 * Optional free text. Blank strings are stored as null.
 */
export const optionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

/**
 * A number sent either as a JSON number or a numeric string ("3.5").
 */
export const numericInputSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite());

export const idInputSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().int().positive());

export const dateOnlySchema = z
  .string({ required_error: 'Required' })
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format');
