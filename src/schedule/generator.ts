import { ConfigError, ParseError } from "../common/errors";
import { canonicalDecimal, formatDecimal, parseDecimal } from "../common/values";
import { SchedulePoint } from "../types";

export const MINUTES_PER_DAY = 24 * 60;

const NIGHT_POINTS = 2;
const DAY_POINTS = 4;

const TIME_RE = /^(\d{1,2}):(\d{2})$/;
const TOKEN_RE = /^(\d{2}:\d{2})\/(\S+)$/;

export function parseTimeOfDay(time: string): number {
  const m = TIME_RE.exec(time.trim());
  if (!m) {
    throw new ParseError(`Invalid time of day '${time}', expected HH:MM`, time);
  }
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  if (hours > 23 || minutes > 59) {
    throw new ParseError(`Time of day out of range: '${time}'`, time);
  }
  return hours * 60 + minutes;
}

export function formatTimeOfDay(minutes: number): string {
  const m = mod(Math.round(minutes), MINUTES_PER_DAY);
  const hh = Math.floor(m / 60);
  const mm = m % 60;
  return `${String(hh).padStart(2, "0")}:${String(mm).padStart(2, "0")}`;
}

function mod(a: number, n: number): number {
  return ((a % n) + n) % n;
}

/** Nearest integer, ties to the even neighbour. */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const fraction = x - floor;
  if (fraction !== 0.5) return Math.round(x);
  return floor % 2 === 0 ? floor : floor + 1;
}

interface Segment {
  start: number;
  duration: number;
  temperature: number;
  points: number[];
}

function segment(
  start: number,
  duration: number,
  count: number,
  temperature: number
): Segment {
  const step = duration / count;
  const points: number[] = [];
  for (let i = 0; i < count; i++) {
    points.push(mod(roundHalfEven(start + i * step), MINUTES_PER_DAY));
  }
  return { start, duration, temperature, points };
}

/**
 * Moves the interior point nearest midnight of the segment that wraps past
 * midnight onto 00:00. Segment starts stay where the user put them.
 */
function forceMidnight(night: Segment, day: Segment): void {
  const all = [...night.points, ...day.points];
  if (all.includes(0)) return;

  const wrapping = night.start > day.start ? night : day;
  const untilMidnight = MINUTES_PER_DAY - wrapping.start;

  let nearest = 1;
  let nearestDistance = Infinity;
  for (let i = 1; i < wrapping.points.length; i++) {
    const offset = mod(wrapping.points[i] - wrapping.start, MINUTES_PER_DAY);
    const distance = Math.abs(offset - untilMidnight);
    if (distance < nearestDistance) {
      nearest = i;
      nearestDistance = distance;
    }
  }
  wrapping.points[nearest] = 0;
}

/**
 * Builds the day's breakpoints: two at the night temperature spread over
 * night -> day, four at the day temperature spread over day -> night.
 * The result is sorted by time of day, has no repeated times and always
 * holds a 00:00 entry.
 */
export function generateSchedule(
  dayTime: string,
  dayTemperature: number,
  nightTime: string,
  nightTemperature: number
): SchedulePoint[] {
  const day = parseTimeOfDay(dayTime);
  const night = parseTimeOfDay(nightTime);
  if (day === night) {
    throw new ConfigError(
      `Day time and night time must differ (both ${formatTimeOfDay(day)})`
    );
  }

  const nightSegment = segment(
    night,
    mod(day - night, MINUTES_PER_DAY),
    NIGHT_POINTS,
    nightTemperature
  );
  const daySegment = segment(
    day,
    mod(night - day, MINUTES_PER_DAY),
    DAY_POINTS,
    dayTemperature
  );
  forceMidnight(nightSegment, daySegment);

  const generated: SchedulePoint[] = [nightSegment, daySegment].flatMap((s) =>
    s.points.map((minutes) => ({ minutes, temperature: s.temperature }))
  );
  generated.sort((a, b) => a.minutes - b.minutes);

  const seen = new Set<number>();
  return generated.filter((p) => {
    if (seen.has(p.minutes)) return false;
    seen.add(p.minutes);
    return true;
  });
}

export function formatSchedule(points: readonly SchedulePoint[]): string {
  return points
    .map((p) => `${formatTimeOfDay(p.minutes)}/${formatDecimal(p.temperature)}`)
    .join(" ");
}

export function parseSchedule(schedule: string): SchedulePoint[] {
  const tokens = schedule.trim().split(/\s+/).filter(Boolean);
  if (!tokens.length) {
    throw new ParseError("Empty schedule", schedule);
  }
  return tokens.map((token) => {
    const { time, temperature } = splitToken(token);
    const value = parseDecimal(temperature);
    if (value === null) {
      throw new ParseError(`Invalid temperature in '${token}'`, schedule);
    }
    return { minutes: parseTimeOfDay(time), temperature: value };
  });
}

/**
 * Splits "HH:MM/temp" without validating the parts beyond their shape.
 */
export function splitToken(token: string): { time: string; temperature: string } {
  const m = TOKEN_RE.exec(token);
  if (!m) {
    throw new ParseError(`Invalid schedule token '${token}'`, token);
  }
  return { time: m[1], temperature: m[2] };
}

export function isScheduleString(v: unknown): v is string {
  if (typeof v !== "string") return false;
  const tokens = v.trim().split(/\s+/).filter(Boolean);
  return (
    tokens.length > 0 &&
    tokens.every((t) => {
      const m = TOKEN_RE.exec(t);
      return m !== null && parseDecimal(m[2]) !== null;
    })
  );
}

export function canonicalScheduleTokens(
  schedule: string
): { time: string; temperature: string }[] {
  return schedule
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((token) => {
      const { time, temperature } = splitToken(token);
      return { time, temperature: canonicalDecimal(temperature) };
    });
}
