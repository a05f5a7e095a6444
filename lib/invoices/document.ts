import { getDb } from '@/lib/db';
import type { CompanySettings } from '@/db/schema/company_settings';
import { selectJobWithClient, type JobWithClient } from '@/lib/queries/jobs';
import { ensureInvoiceNumber } from '@/lib/invoices/numbering';
import { COMPANY_SETTINGS_SEED } from '@/lib/db/migrate';
import type { AppSettings } from '@/lib/settings/appSettings';
import { err, ok, toAppError, type Result } from '@/lib/result';
import { toDateKey } from '@/lib/utils/dateKeys';
import {
  formatCurrency,
  formatHourlyRate,
  formatHours,
  formatInvoiceNumber,
  nonEmptyLines,
} from '@/lib/invoices/format';

export const PAID_WATERMARK = 'PAID';

// Tax is not applied yet; goals.tax_rate is only used for planning.
export const INVOICE_TAX_RATE_PERCENT = 0;

export type InvoiceLineItem = {
  description: string;
  hours: string;
  rate: string;
  amount: string;
  note: string | null;
};

/**
 * Everything the PDF template prints, already formatted.
 */
export type InvoiceDocumentData = {
  company: {
    name: string;
    contactLines: string[];
  };
  invoice: {
    number: string;
    invoiceDate: string;
    serviceDate: string;
    status: string;
  };
  billTo: string[];
  lineItems: InvoiceLineItem[];
  totals: {
    subtotal: string;
    taxLabel: string;
    tax: string;
    totalDue: string;
  };
  footer: {
    thanks: string;
    tagline: string;
  };
  watermark: string | null;
};

export function buildInvoiceDocument(params: {
  job: JobWithClient;
  invoiceNumber: number;
  company: CompanySettings | null;
  now: Date;
}): InvoiceDocumentData {
  const { job, company } = params;
  const companyName = company?.companyName?.trim() || COMPANY_SETTINGS_SEED.companyName;
  const subtotal = job.total;
  const tax = (subtotal * INVOICE_TAX_RATE_PERCENT) / 100;
  const invoiceStatus = job.invoiceStatus ?? 'draft';

  return {
    company: {
      name: companyName,
      contactLines: nonEmptyLines([company?.ownerName, company?.address, company?.phone, company?.email]),
    },
    invoice: {
      number: formatInvoiceNumber(params.invoiceNumber),
      invoiceDate: toDateKey(params.now),
      serviceDate: job.jobDate,
      status: invoiceStatus.toUpperCase(),
    },
    billTo: nonEmptyLines([job.clientName, job.clientAddress, job.clientEmail, job.clientPhone]),
    lineItems: [
      {
        description: job.description,
        hours: formatHours(job.hours),
        rate: formatHourlyRate(job.hourlyRate),
        amount: formatCurrency(job.total),
        note: job.notes?.trim() || null,
      },
    ],
    totals: {
      subtotal: formatCurrency(subtotal),
      taxLabel: `Tax (${INVOICE_TAX_RATE_PERCENT}%)`,
      tax: formatCurrency(tax),
      totalDue: formatCurrency(subtotal + tax),
    },
    footer: {
      thanks: 'Thank you for your business!',
      tagline: `${companyName} - Professional Consulting Services`,
    },
    watermark: invoiceStatus === 'paid' ? PAID_WATERMARK : null,
  };
}

/**
 * Loads the job and its client, assigns the invoice number on first render,
 * and builds the document. Fails with NOT_FOUND before anything is rendered.
 */
export async function getInvoiceDocumentData(params: {
  jobId: number;
  settings: AppSettings;
  now?: Date;
}): Promise<Result<{ data: InvoiceDocumentData; invoiceNumber: number }>> {
  try {
    const db = getDb();
    const loaded = db.transaction((tx) => {
      const job = selectJobWithClient(tx, params.jobId);
      if (!job) return null;
      const invoiceNumber = ensureInvoiceNumber(tx, job);
      return { job: { ...job, invoiceNumber }, invoiceNumber };
    });

    if (!loaded) return err('NOT_FOUND', 'Job not found');

    const data = buildInvoiceDocument({
      job: loaded.job,
      invoiceNumber: loaded.invoiceNumber,
      company: params.settings.company,
      now: params.now ?? new Date(),
    });
    return ok({ data, invoiceNumber: loaded.invoiceNumber });
  } catch (error) {
    console.error('Error loading invoice document:', error);
    const appError = toAppError(error);
    return err(appError.code, appError.message, appError.details);
  }
}
