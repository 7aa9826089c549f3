/**
 * Date helpers
 *
 * Due dates are normalized once, at the store boundary, to an ISO 8601 UTC
 * timestamp. Everything downstream compares instants, never reformatted strings.
 */

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

// Date, optional time, optional offset. A missing offset means UTC.
const DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Normalize a due date to `YYYY-MM-DDTHH:mm:ss.sssZ`.
 *
 * - "2025-03-07" → "2025-03-07T00:00:00.000Z"
 * - "2025-03-07T14:30" → "2025-03-07T14:30:00.000Z"
 * - "2025-03-07T14:30:00+02:00" → "2025-03-07T12:30:00.000Z"
 * - "2025-03-07T14:30:00.123456" → "2025-03-07T14:30:00.123Z"
 *
 * @returns The normalized timestamp, or null if the value is not a valid ISO date
 */
export function normalizeDueDate(value: string): string | null {
  const trimmed = value.trim();

  const dateOnly = DATE_ONLY.exec(trimmed);
  if (dateOnly) {
    const iso = `${trimmed}T00:00:00.000Z`;
    const parsed = new Date(iso);
    // Reject rollovers such as 2025-02-30
    if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== trimmed) {
      return null;
    }
    return iso;
  }

  const dateTime = DATE_TIME.exec(trimmed);
  if (!dateTime) {
    return null;
  }

  const [, datePart, timePart, offset] = dateTime;
  const zone = offset ? normalizeOffset(offset) : 'Z';
  // Fractions become exactly milliseconds; further digits are dropped
  const time = timePart?.replace(
    /\.(\d+)$/,
    (_, digits: string) => `.${digits.padEnd(3, '0').slice(0, 3)}`
  );
  const parsed = new Date(`${datePart}T${time}${zone}`);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }

  return parsed.toISOString();
}

/**
 * "z" → "Z", "+0200" → "+02:00"
 */
function normalizeOffset(offset: string): string {
  if (offset.toUpperCase() === 'Z') {
    return 'Z';
  }
  return offset.length === 5 ? `${offset.slice(0, 3)}:${offset.slice(3)}` : offset;
}

/**
 * Whether a due date lies strictly before `now`
 */
export function isBefore(isoTimestamp: string, now: Date): boolean {
  const time = Date.parse(isoTimestamp);
  return !Number.isNaN(time) && time < now.getTime();
}

/**
 * "2025-03-07T14:30:00.000Z" → "2025-03-07"
 */
export function toDateOnly(isoTimestamp: string): string {
  return isoTimestamp.slice(0, 10);
}

/**
 * "2025-03-07T14:30:00.000Z" → "2025-03-07 14:30:00" (UTC)
 * Returns the input unchanged when it cannot be parsed.
 */
export function formatDateTime(isoTimestamp: string): string {
  const time = Date.parse(isoTimestamp);
  if (Number.isNaN(time)) {
    return isoTimestamp;
  }
  return new Date(time).toISOString().slice(0, 19).replace('T', ' ');
}
