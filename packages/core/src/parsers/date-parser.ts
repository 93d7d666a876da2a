/**
 * Session headers carry plain yyyy-MM-dd dates. Anything else is an
 * undated title.
 */

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Format a Date as yyyy-MM-dd (local time) */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/**
 * Parse a session title as a yyyy-MM-dd date.
 * Returns null if the title isn't a real calendar date (e.g. 2026-02-30).
 */
export function parseSessionDate(input: string): string | null {
  const trimmed = input.trim();
  if (!ISO_DATE_RE.test(trimmed)) return null;

  const d = new Date(trimmed + 'T00:00:00');
  if (isNaN(d.getTime())) return null;

  // Verify the parsed date matches the input (rejects rollovers like 2026-02-30)
  return formatDate(d) === trimmed ? trimmed : null;
}
