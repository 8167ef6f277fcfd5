import { format, isValid, parse, parseISO } from 'date-fns';

/** Timestamp layout used in RealTimeDeltas headers and Monitoring_/RealTimeDeltas_ names. */
export const DEVICE_TIMESTAMP_FORMAT = 'yyMMdd_HHmmss';

// Two-digit years resolve to 1950-2049
const CENTURY_REFERENCE = new Date(2000, 0, 1);

const DEVICE_TIMESTAMP_PATTERN = /^\d{6}_\d{6}$/;
const TRAILING_TIMESTAMP_PATTERN = /(?:^|_)(\d{6}_\d{6})$/;

export function parseDeviceTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!DEVICE_TIMESTAMP_PATTERN.test(trimmed)) return null;
  const parsed = parse(trimmed, DEVICE_TIMESTAMP_FORMAT, CENTURY_REFERENCE);
  return isValid(parsed) ? parsed : null;
}

/**
 * Accepts either the device layout or an ISO 8601 string (some capture.ini files
 * written by newer software versions use the latter).
 */
export function parseFlexibleTimestamp(value: string | null | undefined): Date | null {
  const device = parseDeviceTimestamp(value);
  if (device || !value) return device;
  const iso = parseISO(value.trim());
  return isValid(iso) ? iso : null;
}

/** Extracts the `_yyMMdd_HHmmss` suffix from names such as `Monitoring_240312_081500`. */
export function timestampFromName(name: string): Date | null {
  const match = TRAILING_TIMESTAMP_PATTERN.exec(name);
  return match ? parseDeviceTimestamp(match[1]) : null;
}

export function calendarDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export const isUsableDate = (date: Date | null | undefined): date is Date =>
  date instanceof Date && isValid(date);
