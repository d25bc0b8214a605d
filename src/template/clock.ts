/**
 * Clock and local-time formatting for the date tags.
 *
 * All formatting uses the host's local time zone.
 */

/** Source of the current time. Injected in tests. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** YYYY-MM-DD */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** YYYY-MM-DD HH:MM */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * RFC 3339 timestamp with the local UTC offset, e.g.
 * `2025-01-15T14:30:00+01:00`. Milliseconds appear only when non-zero.
 */
export function formatRfc3339(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const offset = `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;

  const ms = date.getMilliseconds();
  const fraction = ms === 0 ? "" : `.${pad(ms, 3)}`;

  return (
    `${formatDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:` +
    `${pad(date.getSeconds())}${fraction}${offset}`
  );
}
