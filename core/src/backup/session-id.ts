/**
 * Session identifiers: the local creation time at second resolution.
 */

const SESSION_ID_PATTERN = /^\d{8}_\d{6}$/;

const pad = (n: number): string => String(n).padStart(2, "0");

/** Format as `YYYYMMDD_HHMMSS` in local time. */
export function formatSessionId(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function isSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}

/** The id one second after `id`. */
export function nextSessionId(id: string): string {
  const field = (start: number, end: number): number => Number.parseInt(id.slice(start, end), 10);
  const date = new Date(
    field(0, 4),
    field(4, 6) - 1,
    field(6, 8),
    field(9, 11),
    field(11, 13),
    field(13, 15) + 1,
  );
  return formatSessionId(date);
}
