/** Trailing windows the progress views offer. */
export const DATE_RANGES = ["1 Week", "2 Weeks", "1 Month", "3 Months", "6 Months", "1 Year"] as const;

export type DateRange = (typeof DATE_RANGES)[number];

export const DATE_RANGE_DAYS: Record<DateRange, number> = {
  "1 Week": 7,
  "2 Weeks": 14,
  "1 Month": 30,
  "3 Months": 90,
  "6 Months": 180,
  "1 Year": 365,
};

const DAY_MS = 24 * 60 * 60 * 1000;

/** Formats a Date as its UTC calendar day, YYYY-MM-DD. */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** First calendar day (inclusive) of the window ending at `now`. */
export function windowStart(range: DateRange, now: Date = new Date()): string {
  return toIsoDay(new Date(now.getTime() - DATE_RANGE_DAYS[range] * DAY_MS));
}
