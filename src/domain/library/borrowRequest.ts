import { InvalidActionError, RequestAlreadyProcessedError } from '../errors.js';

export const BorrowStatus = {
  Pending: 'Pending',
  Approved: 'Approved',
  Denied: 'Denied',
} as const;

export type BorrowStatus = (typeof BorrowStatus)[keyof typeof BorrowStatus];

export const BORROW_STATUSES: readonly BorrowStatus[] = Object.values(BorrowStatus);

export function isBorrowStatus(value: string): value is BorrowStatus {
  return BORROW_STATUSES.some((status) => status === value);
}

/**
 * Inclusive calendar-date range. Both ends are ISO `YYYY-MM-DD` strings,
 * so lexical comparison matches chronological order. The ends are not
 * ordered: a reversed range is stored as submitted.
 */
export interface DateRange {
  readonly start: string;
  readonly end: string;
}

export interface BorrowRequest {
  readonly id: number;
  readonly userId: number;
  readonly bookId: number;
  readonly range: DateRange;
  readonly status: BorrowStatus;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True when `value` is a real calendar date written as `YYYY-MM-DD`
 * (rejects e.g. 2024-02-30).
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  // setUTCFullYear keeps years 0-99 literal; Date.UTC would shift them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  return date.toISOString().slice(0, 10) === value;
}

/**
 * Two inclusive ranges overlap when each starts no later than the other ends.
 * Ranges that share a single boundary day overlap.
 */
export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.start <= b.end && a.end >= b.start;
}

export const REVIEW_ACTIONS = ['approve', 'deny'] as const;

export type ReviewAction = (typeof REVIEW_ACTIONS)[number];

export function parseReviewAction(value: unknown): ReviewAction {
  const action = REVIEW_ACTIONS.find((candidate) => candidate === value);
  if (!action) {
    throw new InvalidActionError();
  }
  return action;
}

/**
 * Whether deny is limited to Pending requests.
 *
 * `always` keeps the historical behaviour: a Denied or Approved request can
 * be denied again. `pending-only` gives deny the same terminal-state guard
 * as approve.
 */
export type DenyPolicy = 'always' | 'pending-only';

export function assertCanApprove(request: BorrowRequest): void {
  if (request.status !== BorrowStatus.Pending) {
    throw new RequestAlreadyProcessedError();
  }
}

export function assertCanDeny(request: BorrowRequest, policy: DenyPolicy): void {
  if (policy === 'pending-only' && request.status !== BorrowStatus.Pending) {
    throw new RequestAlreadyProcessedError();
  }
}
