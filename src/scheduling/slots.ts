import {
  addDays,
  differenceInCalendarDays,
  format,
  isValid,
  isWeekend,
  parseISO,
} from 'date-fns';
import { nl } from 'date-fns/locale';
import type { BusyInterval, DaySlots } from './types';

export const SLOT_OFFSET_DAYS = 1;
export const INITIAL_SLOT_COUNT = 3;
export const MORNING_HOURS = [10, 11];
export const AFTERNOON_HOURS = [14, 16];
export const INTERVIEW_DURATION_MINUTES = 30;

/** Fixed offer per weekday (date-fns `getDay`, Monday = 1) when no calendar is wired. */
export const FALLBACK_TIMES: Readonly<Record<number, readonly string[]>> = {
  1: ['10 uur', '15 uur'],
  2: ['9 uur', '14 uur'],
  3: ['11 uur', '16 uur'],
  4: ['10 uur', 'half 3'],
  5: ['half 10', '13 uur'],
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar days are local-midnight Date values; only `zonedInstant` turns
 * them into real instants in the recruiter's time zone.
 */
export function parseCalendarDate(value: string): Date | null {
  if (!ISO_DATE.test(value)) {
    return null;
  }
  const day = parseISO(value);
  return isValid(day) && format(day, 'yyyy-MM-dd') === value ? day : null;
}

export function toIsoDate(day: Date): string {
  return format(day, 'yyyy-MM-dd');
}

export function todayIn(timeZone: string, now: Date = new Date()): Date {
  const iso = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
  return parseISO(iso);
}

/** `count` weekdays, starting `offsetDays` after `today`. */
export function businessDays(today: Date, offsetDays: number, count: number): Date[] {
  const days: Date[] = [];
  let day = addDays(today, offsetDays);
  while (days.length < count) {
    if (!isWeekend(day)) {
      days.push(day);
    }
    day = addDays(day, 1);
  }
  return days;
}

export function dayLabel(day: Date, today: Date): string {
  const prefix = differenceInCalendarDays(day, today) === 1 ? 'morgen ' : '';
  return `${prefix}${format(day, 'EEEE d MMMM', { locale: nl })}`;
}

export function formatDaySlots(label: string, times: string[]): string {
  if (times.length <= 1) {
    return `${label} om ${times.join('')}`;
  }
  return `${label} om ${times.slice(0, -1).join(', ')} en ${times[times.length - 1]}`;
}

export function buildDaySlots(day: Date, today: Date, times: string[]): DaySlots {
  const label = dayLabel(day, today);
  return { date: toIsoDate(day), label, times, text: formatDaySlots(label, times) };
}

function zoneOffsetMs(instant: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((entry) => entry.type === type)?.value ?? '0');
  const wallClockAsUtc = Date.UTC(
    part('year'),
    part('month') - 1,
    part('day'),
    part('hour'),
    part('minute'),
    part('second'),
  );
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return wallClockAsUtc - wholeSeconds;
}

/** The instant at `hour:minute` wall-clock time on `day` in `timeZone`. */
export function zonedInstant(day: Date, hour: number, minute: number, timeZone: string): Date {
  const wallClock = Date.UTC(day.getFullYear(), day.getMonth(), day.getDate(), hour, minute, 0);
  const firstGuess = wallClock - zoneOffsetMs(new Date(wallClock), timeZone);
  return new Date(wallClock - zoneOffsetMs(new Date(firstGuess), timeZone));
}

export function isSlotAvailable(start: Date, end: Date, busy: BusyInterval[]): boolean {
  return busy.every((interval) => !(start < interval.end && end > interval.start));
}

/** Spoken free times on `day`, mornings first. */
export function freeTimes(day: Date, busy: BusyInterval[], timeZone: string): string[] {
  return [...MORNING_HOURS, ...AFTERNOON_HOURS]
    .filter((hour) => {
      const start = zonedInstant(day, hour, 0, timeZone);
      const end = new Date(start.getTime() + INTERVIEW_DURATION_MINUTES * 60_000);
      return isSlotAvailable(start, end, busy);
    })
    .map((hour) => `${hour} uur`);
}

export interface DayPool {
  day: Date;
  times: string[];
}

/**
 * One time per day for the first `count` days that have any. When every day
 * would offer the same hour, later days take a different free hour instead.
 */
export function pickQuickSlots(pools: DayPool[], count: number, today: Date): DaySlots[] {
  const chosen = pools.filter((pool) => pool.times.length > 0).slice(0, count);
  const firstTimes = new Set(chosen.map((pool) => pool.times[0]));

  if (chosen.length > 1 && firstTimes.size === 1) {
    const used = new Set<string>();
    return chosen.map((pool) => {
      const pick = pool.times.find((time) => !used.has(time)) ?? pool.times[0];
      used.add(pick);
      return buildDaySlots(pool.day, today, [pick]);
    });
  }

  return chosen.map((pool) => buildDaySlots(pool.day, today, [pool.times[0]]));
}

export function fallbackTimes(day: Date): string[] {
  return [...(FALLBACK_TIMES[day.getDay()] ?? [])];
}

/** The first fixed time of each of the next `count` weekdays. */
export function fallbackSlots(today: Date, offsetDays: number, count: number): DaySlots[] {
  return businessDays(today, offsetDays, count).map((day) =>
    buildDaySlots(day, today, fallbackTimes(day).slice(0, 1)),
  );
}

/** Spoken time to hour and minute: "10 uur", "14u", "10:30", "half 3" (14:30), "half 10". */
export function parseSpokenTime(value: string): { hour: number; minute: number } | null {
  const cleaned = value.trim().toLowerCase();

  const half = /^half\s+(\d{1,2})$/.exec(cleaned);
  if (half) {
    let hour = Number(half[1]) - 1;
    // Offices do not open at 2:30, so "half 3" means the afternoon.
    if (hour < 7) {
      hour += 12;
    }
    return hour >= 0 && hour < 24 ? { hour, minute: 30 } : null;
  }

  const clock = /^(\d{1,2})(?:[:.h](\d{2}))?\s*(?:uur|u)?$/.exec(cleaned);
  if (!clock) {
    return null;
  }
  const hour = Number(clock[1]);
  const minute = clock[2] ? Number(clock[2]) : 0;
  if (hour > 23 || minute > 59) {
    return null;
  }
  return { hour, minute };
}

export function isTomorrow(date: string, today: Date): boolean {
  const day = parseCalendarDate(date);
  return day !== null && differenceInCalendarDays(day, today) === 1;
}
