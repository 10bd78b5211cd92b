import { format } from 'date-fns';
import { UTCDate } from '@date-fns/utc';

// Records carry UTC timestamps and pages show them as such

/** "January 05, 2024" */
export function formatDisplayDate(date: Date): string {
  return format(new UTCDate(date.getTime()), 'MMMM dd, yyyy');
}

/** "January 05, 2024 at 03:07 PM" */
export function formatDisplayDateTime(date: Date): string {
  return format(new UTCDate(date.getTime()), "MMMM dd, yyyy 'at' hh:mm a");
}
