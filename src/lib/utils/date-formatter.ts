/**
 * Duration formatting for log and CLI output
 * - Under a day: "H:MM:SS" (e.g. "2:05:09")
 * - A day or more: "N day(s), H:MM:SS" (e.g. "1 day, 0:00:10")
 */
export function formatTimedelta(totalSeconds: number): string {
  const sign = totalSeconds < 0 ? '-' : '';
  const seconds = Math.abs(Math.round(totalSeconds));

  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
  if (days === 0) {
    return `${sign}${clock}`;
  }
  return `${sign}${days} ${days === 1 ? 'day' : 'days'}, ${clock}`;
}

/** Unix timestamp (seconds) as an ISO string, or "never" for 0 */
export const formatUnixTime = (timestamp: number): string =>
  timestamp > 0 ? new Date(timestamp * 1000).toISOString() : 'never';
