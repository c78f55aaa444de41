import { UTCDate } from "@date-fns/utc";
import { format, isValid, parseISO } from "date-fns";

const LINEAR_DATE_FORMAT = "EEE MMM dd yyyy HH:mm:ss 'GMT+0000 (GMT)'";

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

// parseISO reads a timestamp without an offset in the host's zone.
function assumeUtc(value: string): string {
  if (!/[T ]/.test(value)) return `${value}T00:00:00Z`;
  return ZONE_DESIGNATOR.test(value) ? value : `${value}Z`;
}

/**
 * Parse an ISO 8601 timestamp, throwing on anything date-fns can't read.
 * Timestamps without an offset are taken as UTC.
 */
export function parseHeightDate(value: string): Date {
  const parsed = parseISO(assumeUtc(value));
  if (!isValid(parsed)) {
    throw new Error(`Invalid date "${value}"`);
  }
  return parsed;
}

/**
 * Convert an ISO 8601 timestamp into the format Linear's CSV importer reads.
 *
 * `2025-01-08T10:17:10.439Z` → `Wed Jan 08 2025 10:17:10 GMT+0000 (GMT)`
 */
export function toLinearDate(value?: string | null): string {
  if (!value) return "";
  const parsed = parseHeightDate(value);
  return format(new UTCDate(parsed.getTime()), LINEAR_DATE_FORMAT);
}
