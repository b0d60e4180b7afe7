const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

export const UNKNOWN = '?';

function unit(n: number, name: string): string {
  return `${n} ${name}${n === 1 ? '' : 's'}`;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Epoch seconds as a UTC Date, or null when it does not map to a four-digit year.
 */
export function toUtcDate(timestamp: number): Date | null {
  if (!Number.isFinite(timestamp)) return null;
  const date = new Date(timestamp * 1000);
  if (Number.isNaN(date.getTime())) return null;
  const year = date.getUTCFullYear();
  if (year < 0 || year > 9999) return null;
  return date;
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/** Shortest round-trip digits of `n`, written out without exponent notation. */
export function toPlainDecimal(n: number): string {
  const text = String(n);
  const m = EXPONENT_FORM.exec(text);
  if (!m) return text;

  const [, sign, lead, fraction = '', exponent] = m;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function formatBalance(balance: number | undefined, ticker: string): string {
  return balance === undefined ? UNKNOWN : `${toPlainDecimal(balance)}${ticker}`;
}

// YYYY-MM-DD HH:MM:SS in UTC
export function formatTimestamp(timestamp: number | undefined): string {
  if (timestamp === undefined) return UNKNOWN;
  const d = toUtcDate(timestamp);
  if (!d) return UNKNOWN;
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

/**
 * "1 day, 0 hours, 3 minutes, 1 second". Leading zero units are dropped down
 * to seconds, which are always shown. Negative input counts as zero.
 */
export function formatDuration(totalSeconds: number): string {
  const s = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(s / SECONDS_PER_DAY);
  const hours = Math.floor((s % SECONDS_PER_DAY) / SECONDS_PER_HOUR);
  const minutes = Math.floor((s % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const seconds = s % SECONDS_PER_MINUTE;

  const parts: string[] = [];
  if (days > 0) parts.push(unit(days, 'day'));
  if (days > 0 || hours > 0) parts.push(unit(hours, 'hour'));
  if (days > 0 || hours > 0 || minutes > 0) parts.push(unit(minutes, 'minute'));
  parts.push(unit(seconds, 'second'));
  return parts.join(', ');
}

export function formatElapsedSince(timestamp: number | undefined, nowSeconds: number): string {
  if (timestamp === undefined || toUtcDate(timestamp) === null) return UNKNOWN;
  // Explorer clocks can run ahead of ours; a future time reads as "0 seconds".
  return formatDuration(nowSeconds - timestamp);
}
