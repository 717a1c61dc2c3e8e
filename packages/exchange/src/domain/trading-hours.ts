import type { TradingHours } from "../types/config.js";

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-GB", { timeZone, hour: "2-digit", minute: "2-digit", hourCycle: "h23" });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function parseClock(hhmm: string): number {
  const match = /^(\d{2}):(\d{2})$/.exec(hhmm);
  if (!match) throw new Error(`Invalid time of day: ${hhmm}`);
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) throw new Error(`Invalid time of day: ${hhmm}`);
  return hours * 60 + minutes;
}

/** Minutes since local midnight in `timeZone`. */
export function minutesOfDay(now: number, timeZone: string): number {
  let hours = 0;
  let minutes = 0;
  for (const part of formatterFor(timeZone).formatToParts(now)) {
    if (part.type === "hour") hours = Number(part.value);
    if (part.type === "minute") minutes = Number(part.value);
  }
  return hours * 60 + minutes;
}

/**
 * Inclusive window check. A window whose end is before its start wraps past
 * midnight (22:00-06:00 covers both late evening and early morning).
 */
export function isWithinTradingHours(hours: TradingHours, now: number): boolean {
  if (!hours.enabled) return true;
  const start = parseClock(hours.start);
  const end = parseClock(hours.end);
  const t = minutesOfDay(now, hours.timezone);
  return start <= end ? t >= start && t <= end : t >= start || t <= end;
}
