// ============================================================================
// LOCAL DATE-TIME UTILITIES
// ============================================================================
// Reminder fire times are wall-clock times in the server's zone, written
// without an offset (YYYY-MM-DDTHH:MM:SS). `new Date()` reads that form back
// as local time, so the round trip is exact.

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatLocalIso(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

export function addDays(date: Date, days: number): Date {
  const d = new Date(date);
  d.setDate(d.getDate() + days);
  return d;
}

export function atTime(date: Date, hours: number, minutes: number): Date {
  const d = new Date(date);
  d.setHours(hours, minutes, 0, 0);
  return d;
}

/**
 * Parses an absolute timestamp (local wall-clock or with offset).
 * Returns null for anything Date cannot read.
 */
export function parseTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}/.test(trimmed)) return null;
  // A bare date would be read as UTC midnight
  const date = new Date(/^\d{4}-\d{2}-\d{2}$/.test(trimmed) ? `${trimmed}T00:00:00` : trimmed);
  return isNaN(date.getTime()) ? null : date;
}
