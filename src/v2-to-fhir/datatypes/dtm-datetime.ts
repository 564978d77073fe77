/**
 * HL7v2 date/time values → FHIR strings.
 *
 * Conversion is fixed-width slicing; no calendar validation is done, so
 * "20240231" becomes "2024-02-31".
 */

const LEADING_DIGITS_RE = /^\d+/;

/**
 * Convert an HL7 DT (YYYYMMDD...) to a FHIR date (YYYY-MM-DD).
 * Returns undefined when fewer than 8 characters are available.
 */
export function convertDTToDate(dt: string | undefined): string | undefined {
  if (!dt || dt.length < 8) return undefined;

  return `${dt.substring(0, 4)}-${dt.substring(4, 6)}-${dt.substring(6, 8)}`;
}

/**
 * Convert an HL7 TS/DTM (YYYYMMDDHHMM[SS]) to a local ISO-8601 date-time
 * without offset: YYYY-MM-DDTHH:MM:SS.
 *
 * Seconds default to "00" when only 12 or 13 digits are sent. Anything after
 * the 14th digit (fractions, timezone) is ignored. Values with fewer than 12
 * leading digits are not date-times and yield undefined.
 */
export function convertDTMToLocalDateTime(dtm: string | undefined): string | undefined {
  if (!dtm) return undefined;

  const digits = LEADING_DIGITS_RE.exec(dtm.trim())?.[0];
  if (!digits || digits.length < 12) return undefined;

  const year = digits.substring(0, 4);
  const month = digits.substring(4, 6);
  const day = digits.substring(6, 8);
  const hour = digits.substring(8, 10);
  const minute = digits.substring(10, 12);
  const second = digits.length >= 14 ? digits.substring(12, 14) : "00";

  return `${year}-${month}-${day}T${hour}:${minute}:${second}`;
}
