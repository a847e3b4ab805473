/** yyyy-MM-dd */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Format a Date as yyyy-MM-dd in local time */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/**
 * Strictly parse a yyyy-MM-dd calendar date. Returns null for other shapes and
 * for dates that do not exist (2026-02-30).
 */
export function parseIsoDate(input: string): Date | null {
  if (!ISO_DATE_RE.test(input)) return null;

  const d = new Date(input + 'T00:00:00');
  if (isNaN(d.getTime())) return null;
  return formatDate(d) === input ? d : null;
}

/** Today's calendar date as yyyy-MM-dd */
export function today(now: Date = new Date()): string {
  return formatDate(now);
}
