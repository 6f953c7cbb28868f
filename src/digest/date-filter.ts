/**
 * UTC calendar date as YYYY-MM-DD.
 */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * "Today" means the same UTC calendar day as `now`; the time of day is ignored.
 * An entry without a publish time never counts as today.
 */
export function matchesToday(published: Date | null, todayOnly: boolean, now: Date = new Date()): boolean {
  if (!todayOnly) return true;
  if (published === null) return false;
  return utcDay(published) === utcDay(now);
}
