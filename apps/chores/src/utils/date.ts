import { addDays, differenceInCalendarDays, isValid, parseISO } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";

export { addDays };

/** Calendar date of `date` in `timeZone`, as YYYY-MM-DD. */
export function toDateKey(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, "yyyy-MM-dd");
}

export function isDateKey(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parseISO(value));
}

/**
 * Whole weeks from the calendar date `startKey` to the date `now` falls on in
 * `timeZone`; negative before the start. Counted on calendar days so a DST
 * shift never moves a run into the neighbouring week.
 */
export function weeksBetween(
  startKey: string,
  now: Date,
  timeZone: string,
): number {
  const days = differenceInCalendarDays(
    parseISO(toDateKey(now, timeZone)),
    parseISO(startKey),
  );
  return Math.floor(days / 7);
}
