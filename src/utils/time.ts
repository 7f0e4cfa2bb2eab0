import { addDays as addCalendarDays, subYears } from 'date-fns';

export function addDays(iso: string, days: number): string {
  return addCalendarDays(new Date(iso), days).toISOString();
}

/** Calendar date (`YYYY-MM-DD`) `years` before `now`. */
export function yearsAgo(now: Date, years: number): string {
  return subYears(now, years).toISOString().slice(0, 10);
}

/** UTC calendar date (`YYYY-MM-DD`) of `now`. */
export function dayOf(now: Date): string {
  return now.toISOString().slice(0, 10);
}
