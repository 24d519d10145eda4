import { describe, it, expect } from 'vitest';
import { renderHistoryCsv } from '../historyCsv.js';
import type { BorrowRequestView } from '../../ports.js';

function entry(bookTitle: string, start: string, end: string, status: BorrowRequestView['status']): BorrowRequestView {
  return { id: 1, userId: 1, bookId: 1, bookTitle, range: { start, end }, status };
}

describe('renderHistoryCsv', () => {
  it('should render only the header for an empty history', () => {
    expect(renderHistoryCsv([])).toBe('Book Title,Start Date,End Date,Status\r\n');
  });

  it('should render one CRLF-terminated row per request', () => {
    const csv = renderHistoryCsv([
      entry('Moby-Dick', '2024-01-01', '2024-01-10', 'Approved'),
      entry('Frankenstein', '2024-02-01', '2024-02-03', 'Pending'),
    ]);

    expect(csv).toBe(
      'Book Title,Start Date,End Date,Status\r\n' +
        'Moby-Dick,2024-01-01,2024-01-10,Approved\r\n' +
        'Frankenstein,2024-02-01,2024-02-03,Pending\r\n'
    );
  });

  it('should quote titles containing commas or quotes', () => {
    const csv = renderHistoryCsv([
      entry('Sense, and Sensibility', '2024-01-01', '2024-01-02', 'Denied'),
      entry('The "Raven"', '2024-01-03', '2024-01-04', 'Pending'),
    ]);

    expect(csv.split('\r\n')).toEqual([
      'Book Title,Start Date,End Date,Status',
      '"Sense, and Sensibility",2024-01-01,2024-01-02,Denied',
      '"The ""Raven""",2024-01-03,2024-01-04,Pending',
      '',
    ]);
  });
});
