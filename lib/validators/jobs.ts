import { z } from 'zod';
import { dateOnlySchema, idInputSchema, numericInputSchema, optionalTextSchema } from './shared';

export const INVOICE_STATUSES = ['draft', 'sent', 'paid'] as const;

/**
 * Invoice status enum schema.
 * Separate from job.status, which is free-form.
 */
export const invoiceStatusSchema = z.enum(INVOICE_STATUSES, {
  errorMap: () => ({ message: `Status must be one of: ${INVOICE_STATUSES.join(', ')}` }),
});

export const jobCreateSchema = z.object({
  client_id: idInputSchema,
  job_date: dateOnlySchema,
  description: z.string({ required_error: 'Description is required' }).trim().min(1, 'Description is required'),
  hours: numericInputSchema.optional(),
  hourly_rate: numericInputSchema.optional(),
  notes: optionalTextSchema,
});

/**
 * Full replace of a job's editable fields. Invoice fields are changed through
 * the status endpoint only.
 */
export const jobUpdateSchema = z.object({
  job_date: dateOnlySchema,
  description: z.string({ required_error: 'Description is required' }).trim().min(1, 'Description is required'),
  hours: numericInputSchema.optional(),
  hourly_rate: numericInputSchema.optional(),
  notes: optionalTextSchema,
  status: z.string().trim().min(1).optional(),
});

export const invoiceStatusUpdateSchema = z.object({
  status: invoiceStatusSchema,
});

export const jobListQuerySchema = z.object({
  client_id: idInputSchema.optional(),
});

export type InvoiceStatus = z.infer<typeof invoiceStatusSchema>;
