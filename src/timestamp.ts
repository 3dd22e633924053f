/** Format a date as `yyyy-MM-dd HH:mm:ss` in GMT */
export function formatTimestamp(date: Date): string {
  // toISOString is always UTC: 2024-03-05T09:07:01.123Z
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
