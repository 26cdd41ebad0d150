/** `2025-01-15T10:04:59.000Z` → `2025-01-15 10:04` (UTC). */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 16);
}

/**
 * Compact duration between two instants: `45s`, `12m`, `2h`, `1h 23m`.
 */
export function formatSpan(from: Date, to: Date): string {
  const secs = Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000));
  if (secs < 60) return `${secs}s`;
  if (secs < 3600) return `${Math.floor(secs / 60)}m`;
  const totalMinutes = Math.floor(secs / 60);
  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;
  return m ? `${h}h ${m}m` : `${h}h`;
}

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 3) + '...';
}

export function pluralize(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}
