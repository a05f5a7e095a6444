export type CsvValue = string | number | null | undefined;

function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

/**
 * Rows joined with CRLF, fields quoted only when they contain a quote, comma
 * or line break. The output ends with a line break.
 */
export function stringifyCsv(rows: CsvValue[][]): string {
  return rows.map((row) => row.map((value) => escapeCsvValue(toCsvField(value))).join(',')).join('\r\n') + '\r\n';
}
