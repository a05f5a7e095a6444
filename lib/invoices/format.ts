export const INVOICE_NUMBER_PREFIX = 'INV';

export function formatCurrency(amount: number, currency = 'USD'): string {
  const normalized = Number.isFinite(amount) ? amount : 0;
  try {
    return new Intl.NumberFormat('en-US', {
      style: 'currency',
      currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    }).format(normalized);
  } catch {
    return `${currency} ${normalized.toFixed(2)}`;
  }
}

export function formatHourlyRate(rate: number): string {
  return `${formatCurrency(rate)}/hr`;
}

export function formatHours(hours: number): string {
  if (!Number.isFinite(hours)) return '0.00';
  return hours.toFixed(2);
}

/**
 * `INV-0007`. Numbers past 9999 keep all their digits.
 */
export function formatInvoiceNumber(invoiceNumber: number): string {
  return `${INVOICE_NUMBER_PREFIX}-${String(invoiceNumber).padStart(4, '0')}`;
}

export function invoicePdfFilename(invoiceNumber: number): string {
  return `Invoice-${formatInvoiceNumber(invoiceNumber)}.pdf`;
}

export function nonEmptyLines(values: Array<string | null | undefined>): string[] {
  return values
    .map((value) => (typeof value === 'string' ? value.trim() : ''))
    .filter(Boolean);
}
