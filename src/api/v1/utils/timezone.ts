const MS_PER_DAY = 24 * 60 * 60 * 1000;

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Utility function to convert date to local ISO string format
 * This handles local timezone conversion automatically
 */
export function toLocalISOString(date = new Date()) {
  return (
    date.getFullYear() + "-" +
    pad(date.getMonth() + 1) + "-" +
    pad(date.getDate()) + "T" +
    pad(date.getHours()) + ":" +
    pad(date.getMinutes()) + ":" +
    pad(date.getSeconds()) + "." +
    String(date.getMilliseconds()).padStart(3, '0')
  );
}

/** Local calendar date as YYYY-MM-DD, the format of every `date` column */
export function toDateOnly(date: Date): string {
  return toLocalISOString(date).slice(0, 10);
}

export function today(): string {
  return toDateOnly(new Date());
}

function parseDateOnly(value: string): number {
  const [year, month, day] = value.split("-").map(Number);
  const time = Date.UTC(year, month - 1, day);
  if (Number.isNaN(time)) {
    throw new Error(`Invalid calendar date: ${value}`);
  }
  return time;
}

export function addDays(dateOnly: string, days: number): string {
  return new Date(parseDateOnly(dateOnly) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseDateOnly(to) - parseDateOnly(from)) / MS_PER_DAY);
}
