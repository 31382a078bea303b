function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatIntervalSeconds(seconds: number | null | undefined): string {
  if (seconds == null || !Number.isFinite(seconds) || seconds <= 0) return ':00';
  const whole = Math.trunc(seconds);
  const minutes = Math.floor(whole / 60);
  const secs = whole % 60;
  return minutes === 0 ? `:${pad2(secs)}` : `${minutes}:${pad2(secs)}`;
}

/**
 * Reads digits typed on an interval keypad: up to two digits are seconds,
 * otherwise the last two are seconds and the rest minutes ("115" is 1:15).
 */
export function parseIntervalDigits(digits: string): number {
  const cleaned = digits.replace(/\D/g, '');
  if (!cleaned) return 0;
  const value = Number(cleaned);
  if (cleaned.length <= 2) return value;
  return Math.floor(value / 100) * 60 + (value % 100);
}

/** Accepts "1:30", ":45", "45", "@ 1:10" or ":15 rest". */
export function parseIntervalString(value: string): number | null {
  const cleaned = value.replace(/@|rest/gi, '').trim();
  const clock = /^(\d*):(\d{1,2})$/.exec(cleaned);
  if (clock) return (clock[1] ? Number(clock[1]) : 0) * 60 + Number(clock[2]);
  if (/^\d+$/.test(cleaned)) return Number(cleaned);
  return null;
}
