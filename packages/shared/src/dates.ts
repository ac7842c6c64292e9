import { z } from 'zod';

const IsoDateSchema = z.string().date();
const IsoDateTimeSchema = z.string().datetime({ offset: true, local: true });

/** Rewrite a trailing `Z` as the equivalent `+00:00` offset. */
export function normalizeUtcSuffix(value: string): string {
  return value.endsWith('Z') ? `${value.slice(0, -1)}+00:00` : value;
}

/** Rewrite a space between date and time as the `T` separator. */
export function normalizeDateTimeSeparator(value: string): string {
  return value.replace(/^(\d{4}-\d{2}-\d{2}) /, '$1T');
}

/**
 * True when `value` is an ISO-8601 calendar date or date-time.
 * Date-times may use `T` or a space as separator and carry an offset, a `Z`, or no zone.
 */
export function isIsoTimestamp(value: string): boolean {
  const normalized = normalizeUtcSuffix(normalizeDateTimeSeparator(value));
  return (
    IsoDateTimeSchema.safeParse(normalized).success ||
    IsoDateSchema.safeParse(normalized).success
  );
}
