/**
 * Timestamps are stored as second-precision ISO 8601 UTC text so that
 * lexicographic comparison in SQL matches chronological order.
 */
export function isoTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
