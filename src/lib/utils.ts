import { endOfDay, format, isValid, setMilliseconds, startOfDay } from 'date-fns';
import type { DateRange } from '@/lib/types';

export const CURRENCY_PREFIX = 'Ksh';

/**
 * Formats an amount as `Ksh 1234.50`: fixed prefix, exactly two decimals, no grouping.
 */
export function formatMoney(amount: number): string {
  return `${CURRENCY_PREFIX} ${amount.toFixed(2)}`;
}

/**
 * Formats a date as yyyy-MM-dd HH:mm (local time).
 */
export function formatDateTime(date: Date): string {
  if (!isValid(date)) {
    return 'Invalid Date';
  }
  return format(date, 'yyyy-MM-dd HH:mm');
}

/**
 * Formats a date as yyyy-MM-dd (local time).
 */
export function formatDay(date: Date): string {
  if (!isValid(date)) {
    return 'Invalid Date';
  }
  return format(date, 'yyyy-MM-dd');
}

/**
 * Turns a picked pair of calendar days into a filter covering both days entirely:
 * `from` at 00:00:00, `to` at 23:59:59 of its day.
 */
export function toInclusiveDayRange(from: Date, to: Date): Required<DateRange> {
  return {
    from: startOfDay(from),
    to: setMilliseconds(endOfDay(to), 0),
  };
}
