import { z } from 'zod';
import { numericInputSchema } from './shared';

const settingsText = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? '');

export const companySettingsInputSchema = z.object({
  company_name: z.string({ required_error: 'Company name is required' }).trim().min(1, 'Company name is required'),
  owner_name: settingsText,
  address: settingsText,
  phone: settingsText,
  email: settingsText,
  default_hourly_rate: numericInputSchema.optional(),
});
