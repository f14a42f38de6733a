const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

/**
 * Format an instant as an RFC 3339 UTC timestamp with the fraction trimmed
 * of trailing zeros (and dropped entirely when zero).
 */
export function formatRfc3339Nano(date: Date): string {
  const iso = date.toISOString();
  const [whole, fraction] = iso.slice(0, -1).split('.');
  const trimmed = (fraction ?? '').replace(/0+$/, '');
  return trimmed ? `${whole}.${trimmed}Z` : `${whole}Z`;
}

/**
 * Parse an RFC 3339 timestamp. Fractions finer than a millisecond are
 * truncated. Returns null when the value is not a valid timestamp.
 */
export function parseRfc3339(value: string): Date | null {
  const match = RFC3339.exec(value);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction, zulu, sign, offH, offM] = match;
  const fields = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = fields;
  if (mo < 1 || mo > 12 || d < 1 || h > 23 || mi > 59 || s > 59) return null;

  const ms = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, s, ms);
  // Out-of-range days roll over (Feb 30 -> Mar 2)
  if (date.getUTCDate() !== d) return null;
  const utc = date.getTime();

  let offsetMinutes = 0;
  if (!zulu) {
    const oh = Number(offH);
    const om = Number(offM);
    if (oh > 23 || om > 59) return null;
    offsetMinutes = (sign === '-' ? -1 : 1) * (oh * 60 + om);
  }

  return new Date(utc - offsetMinutes * 60_000);
}
