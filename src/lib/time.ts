import { TZDate } from '@date-fns/tz';
import { format } from 'date-fns';

/**
 * Local wall-clock time as the sheets display it: MM/DD/YYYY HH:MM:SS
 */
export function formatSheetTimestamp(date: Date): string {
  return format(date, 'MM/dd/yyyy HH:mm:ss');
}

/**
 * ISO-8601 timestamp rendered in a fixed UTC offset or IANA zone, e.g. 2025-02-25T20:15:27.000+04:00
 */
export function formatIsoWithOffset(date: Date, timeZone: string): string {
  return format(new TZDate(date, timeZone), "yyyy-MM-dd'T'HH:mm:ss.SSSxxx");
}
