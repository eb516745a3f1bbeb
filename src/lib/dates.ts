const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real YYYY-MM-DD calendar date (rejects 2024-02-30 and friends).
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

// Stats API date keys may carry a time part after the day
export function isDateKey(value: string): boolean {
  return isCalendarDate(value.slice(0, 10)) && (value.length === 10 || value[10] === "T" || value[10] === " ");
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function startOfYear(date: Date): string {
  return `${date.getUTCFullYear()}-01-01`;
}
