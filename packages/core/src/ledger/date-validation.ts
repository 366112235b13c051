/**
 * Entry date validation
 *
 * Dates are unix seconds at a UTC midnight strictly before the current time.
 * Ordering between successive entries is not enforced.
 */

export const SECONDS_PER_DAY = 86_400;

export type DateRejection = 'zero' | 'not_integer' | 'misaligned' | 'future';

/**
 * Return why a date is rejected, or null when it is valid
 *
 * @param date - Entry date in unix seconds
 * @param nowSeconds - Current wall-clock time in unix seconds
 */
export function checkEntryDate(date: number, nowSeconds: number): DateRejection | null {
  if (!Number.isSafeInteger(date) || date < 0) {
    return 'not_integer';
  }
  if (date === 0) {
    return 'zero';
  }
  if (date % SECONDS_PER_DAY !== 0) {
    return 'misaligned';
  }
  if (date >= nowSeconds) {
    return 'future';
  }
  return null;
}

/**
 * Unix seconds for a JavaScript Date, truncated
 */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * UTC midnight (unix seconds) of the day containing the given time
 */
export function startOfUtcDay(seconds: number): number {
  return seconds - (seconds % SECONDS_PER_DAY);
}
