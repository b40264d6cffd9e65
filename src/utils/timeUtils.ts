const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(tz: string): Intl.DateTimeFormat {
  let fmt = formatterCache.get(tz);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: tz,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      weekday: "short",
      hourCycle: "h23",
    });
    formatterCache.set(tz, fmt);
  }
  return fmt;
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

export type SessionParts = {
  date: string;          // YYYY-MM-DD in the session timezone
  secondsOfDay: number;  // whole seconds since local midnight
  weekday: number;       // 0 = Sunday
};

/**
 * Wall-clock parts of an instant in the given IANA timezone
 */
export function getSessionParts(tsMs: number, tz: string): SessionParts {
  const parts = getFormatter(tz).formatToParts(new Date(tsMs));
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  const hour = Number(get("hour"));
  const minute = Number(get("minute"));
  const second = Number(get("second"));
  return {
    date: `${get("year")}-${get("month")}-${get("day")}`,
    secondsOfDay: hour * 3600 + minute * 60 + second,
    weekday: WEEKDAYS[get("weekday")] ?? 0,
  };
}

export function getSessionDateString(tsMs: number, tz: string): string {
  return getSessionParts(tsMs, tz).date;
}

function tzOffsetMs(tsMs: number, tz: string): number {
  const { date, secondsOfDay } = getSessionParts(tsMs, tz);
  const [y, m, d] = date.split("-").map(Number);
  const asUtc = Date.UTC(y ?? 1970, (m ?? 1) - 1, d ?? 1) + secondsOfDay * 1000;
  return asUtc - Math.floor(tsMs / 1000) * 1000;
}

/**
 * Epoch ms of a local wall-clock time on a session date.
 * Two passes settle the offset across a DST transition.
 */
export function sessionTimeToEpochMs(date: string, secondsOfDay: number, tz: string): number {
  const [y, m, d] = date.split("-").map(Number);
  const naive = Date.UTC(y ?? 1970, (m ?? 1) - 1, d ?? 1) + secondsOfDay * 1000;
  let guess = naive - tzOffsetMs(naive, tz);
  guess = naive - tzOffsetMs(guess, tz);
  return guess;
}

/**
 * Parse "HH:MM" or "HH:MM:SS" to seconds since midnight; null when malformed
 */
export function parseClockTime(value: string): number | null {
  const m = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(value.trim());
  if (!m) return null;
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  const second = Number(m[3] ?? "0");
  if (hour > 23 || minute > 59 || second > 59) return null;
  return hour * 3600 + minute * 60 + second;
}

export function formatClockTime(secondsOfDay: number): string {
  const h = Math.floor(secondsOfDay / 3600);
  const m = Math.floor((secondsOfDay % 3600) / 60);
  const s = secondsOfDay % 60;
  const base = `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
  return s ? `${base}:${String(s).padStart(2, "0")}` : base;
}

export function isValidTimeZone(tz: string): boolean {
  try {
    getFormatter(tz);
    return true;
  } catch {
    return false;
  }
}
