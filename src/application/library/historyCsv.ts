import type { BorrowRequestView } from '../ports.js';

export const HISTORY_CSV_HEADER = ['Book Title', 'Start Date', 'End Date', 'Status'] as const;

const NEEDS_QUOTING = /[",\r\n]/;

function csvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`; // Escape quotes
}

function csvRow(fields: readonly string[]): string {
  return `${fields.map(csvField).join(',')}\r\n`;
}

/**
 * Render a borrowing history as CSV: a header row, then one row per request.
 * Every row, the last included, ends with CRLF.
 */
export function renderHistoryCsv(history: readonly BorrowRequestView[]): string {
  return (
    csvRow(HISTORY_CSV_HEADER) +
    history
      .map((entry) => csvRow([entry.bookTitle, entry.range.start, entry.range.end, entry.status]))
      .join('')
  );
}
