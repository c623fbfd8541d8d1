const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** `2024-05-01` */
export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** `2024-05-01 09:30 UTC` */
export function formatUtcMinute(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}

/** `2024-05-01 09:30:15` (UTC) */
export function formatUtcSecond(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/** `20240501-093015` (UTC), used in archive file names */
export function formatCompactStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** ISO timestamp without milliseconds: `2024-05-01T09:30:15Z` */
export function isoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Whole days elapsed between an ISO timestamp and `now`. Returns null for an
 * unparseable timestamp.
 */
export function daysSince(timestamp: string, now: Date): number | null {
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return null;
  return Math.floor((now.getTime() - time) / 86_400_000);
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
