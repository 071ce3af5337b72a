/**
 * Time Utils Module
 */

/**
 * Wall-clock part (HH:MM:SS) of an ISO timestamp, in the offset it was sent
 * with. "2025-03-01T14:05:00+01:00" → "14:05:00".
 */
export function formatClockTime(iso: string): string {
  const match = /T(\d{2}):(\d{2})(?::(\d{2}))?/.exec(iso);
  if (!match) {
    throw new Error(`Invalid timestamp: ${iso}`);
  }
  const [, hours, minutes, seconds = '00'] = match;
  return `${hours}:${minutes}:${seconds}`;
}

/**
 * Human readable duration for log lines
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
