/**
 * Normalizes a raw cell or API value into the key used to join registrants with members.
 *
 * Returns null for missing values, blank strings and the literal "nan" that spreadsheet
 * exports leave in empty numeric cells. Idempotent.
 */
export function normalizeEmail(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const normalized = String(value).trim().toLowerCase();
  if (normalized === '' || normalized === 'nan') return null;
  return normalized;
}

/** Trimmed raw email as the registrant typed it, or null when it would not normalize. */
export function displayEmail(value: unknown): string | null {
  if (normalizeEmail(value) === null) return null;
  return String(value).trim();
}
