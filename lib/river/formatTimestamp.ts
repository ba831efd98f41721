import { isValid } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * Feed timestamps carry no offset (e.g. "2024-06-03T06:15:00.000"). They are
 * pinned to UTC on the way in and formatted in UTC on the way out, so the
 * wall-clock fields come back exactly as delivered whatever zone the host runs in.
 */
export const FEED_CLOCK = 'UTC';

export function parseFeedTimestamp(timestamp: string): Date | null {
  const date = fromZonedTime(timestamp, FEED_CLOCK);
  return isValid(date) ? date : null;
}

/** "06/03/2024 18:15 PM" */
export function formatHeaderTimestamp(date: Date): string {
  return formatInTimeZone(date, FEED_CLOCK, 'MM/dd/yyyy HH:mm a');
}

/** Calendar day key used for daily aggregation */
export function toDayKey(date: Date): string {
  return formatInTimeZone(date, FEED_CLOCK, 'yyyy-MM-dd');
}

/** Start of a day key on the feed clock */
export function fromDayKey(dayKey: string): Date {
  return fromZonedTime(`${dayKey}T00:00:00`, FEED_CLOCK);
}

/** Short axis label, e.g. "Jun 3 06:15" */
export function formatTickLabel(date: Date): string {
  return formatInTimeZone(date, FEED_CLOCK, 'MMM d HH:mm');
}
