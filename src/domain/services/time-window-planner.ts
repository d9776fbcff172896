import { formatInTimeZone, zonedTimeToUtc } from 'date-fns-tz';
import { ConfigError } from '../errors/config.error';
import { TimeWindowVO } from '../value-objects/time-window.vo';

/**
 * Time Window Planner
 *
 * Turns a calendar day plus a planning mode into ordered, contiguous,
 * non-overlapping windows. Boundaries are wall-clock times in the given
 * timezone; `hour 24` is midnight of the following day. A boundary that
 * falls into a daylight-saving gap resolves to the first instant after it.
 *
 * Pure and deterministic: no clock reads and no I/O.
 */

export interface HoursPlanMode {
  kind: 'hours';
  startHour: number;
  endHour: number;
}

export interface SplitPlanMode {
  kind: 'split';
  intervalHours: number;
}

export type PlanMode = HoursPlanMode | SplitPlanMode;

export interface PlanModeInput {
  startHour?: number;
  endHour?: number;
  splitInterval?: number;
}

const MINUTES_PER_HOUR = 60;
const MINUTES_PER_DAY = 24 * MINUTES_PER_HOUR;
const MS_PER_MINUTE = 60 * 1000;
const WALL_CLOCK_FORMAT = "yyyy-MM-dd'T'HH:mm";
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Build a plan mode from optional CLI-style parameters.
 * No parameters at all means the whole day.
 */
export function resolvePlanMode(input: PlanModeInput): PlanMode {
  const hasHours = input.startHour !== undefined || input.endHour !== undefined;

  if (hasHours && input.splitInterval !== undefined) {
    throw new ConfigError(
      'Explicit start/end hours and a split interval cannot be combined; choose one mode',
    );
  }

  if (input.splitInterval !== undefined) {
    return { kind: 'split', intervalHours: input.splitInterval };
  }

  return {
    kind: 'hours',
    startHour: input.startHour ?? 0,
    endHour: input.endHour ?? 24,
  };
}

export function plan(date: string, mode: PlanMode, timezone: string): TimeWindowVO[] {
  assertCalendarDate(date);
  assertTimezone(timezone);

  const boundaries = mode.kind === 'hours' ? hourBoundaries(mode) : splitBoundaries(mode);
  const instants = boundaries.map((minuteOfDay) => wallClockToInstant(date, minuteOfDay, timezone));

  const windows: TimeWindowVO[] = [];
  for (let i = 0; i < instants.length - 1; i++) {
    // a window lying entirely inside a skipped hour has no recordings
    if (instants[i].getTime() >= instants[i + 1].getTime()) {
      continue;
    }
    windows.push(TimeWindowVO.create({ start: instants[i], end: instants[i + 1], timezone }));
  }

  if (windows.length === 0) {
    throw new ConfigError(
      `Hours ${describeBoundaries(boundaries)} do not exist on ${date} in ${timezone} (daylight saving gap)`,
    );
  }
  return windows;
}

/**
 * The day to export: the explicit date when given, otherwise today's
 * calendar date in `timezone` minus `daysAgo`.
 */
export function resolveTargetDate(
  explicitDate: string | undefined,
  daysAgo: number,
  timezone: string,
  now: Date,
): string {
  assertTimezone(timezone);

  if (explicitDate !== undefined) {
    assertCalendarDate(explicitDate);
    return explicitDate;
  }

  if (!Number.isInteger(daysAgo) || daysAgo < 0) {
    throw new ConfigError(`exportDaysAgo must be a non-negative integer, got ${daysAgo}`);
  }

  const today = formatInTimeZone(now, timezone, 'yyyy-MM-dd');
  return addCalendarDays(today, -daysAgo);
}

export function addCalendarDays(date: string, days: number): string {
  const [year, month, day] = parseCalendarDate(date);
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}

export function assertCalendarDate(date: string): void {
  parseCalendarDate(date);
}

export function assertTimezone(timezone: string): void {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
  } catch {
    throw new ConfigError(`Unknown timezone: ${timezone}`);
  }
}

function parseCalendarDate(date: string): [number, number, number] {
  const match = CALENDAR_DATE_PATTERN.exec(date);
  if (!match) {
    throw new ConfigError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));

  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new ConfigError(`Invalid date "${date}", no such calendar day`);
  }

  return [year, month, day];
}

function hourBoundaries(mode: HoursPlanMode): number[] {
  const { startHour, endHour } = mode;

  for (const [name, hour] of [
    ['startHour', startHour],
    ['endHour', endHour],
  ] as const) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 24) {
      throw new ConfigError(`${name} must be an integer between 0 and 24, got ${hour}`);
    }
  }

  if (startHour >= endHour) {
    throw new ConfigError(`startHour (${startHour}) must be before endHour (${endHour})`);
  }

  return [startHour * MINUTES_PER_HOUR, endHour * MINUTES_PER_HOUR];
}

function splitBoundaries(mode: SplitPlanMode): number[] {
  const { intervalHours } = mode;

  if (!Number.isFinite(intervalHours) || intervalHours <= 0) {
    throw new ConfigError(`Split interval must be a positive number of hours, got ${intervalHours}`);
  }

  const stepMinutes = Math.round(intervalHours * MINUTES_PER_HOUR);
  if (stepMinutes < 1 || Math.abs(stepMinutes - intervalHours * MINUTES_PER_HOUR) > 1e-6) {
    throw new ConfigError(
      `Split interval must be a whole number of minutes, got ${intervalHours} hours`,
    );
  }

  const boundaries: number[] = [];
  for (let minute = 0; minute < MINUTES_PER_DAY; minute += stepMinutes) {
    boundaries.push(minute);
  }
  // last window is clipped to midnight of the next day
  boundaries.push(MINUTES_PER_DAY);
  return boundaries;
}

function wallClockToInstant(date: string, minuteOfDay: number, timezone: string): Date {
  const dayOffset = Math.floor(minuteOfDay / MINUTES_PER_DAY);
  const day = dayOffset === 0 ? date : addCalendarDays(date, dayOffset);
  const wallClock = `${day}T${formatMinuteOfDay(minuteOfDay % MINUTES_PER_DAY)}`;

  let instant = zonedTimeToUtc(`${wallClock}:00`, timezone);
  if (localWallClock(instant, timezone) === wallClock) {
    return instant;
  }

  // Skipped by a daylight-saving change: walk to the first minute at or after it
  if (localWallClock(instant, timezone) < wallClock) {
    while (localWallClock(instant, timezone) < wallClock) {
      instant = new Date(instant.getTime() + MS_PER_MINUTE);
    }
  } else {
    while (localWallClock(new Date(instant.getTime() - MS_PER_MINUTE), timezone) >= wallClock) {
      instant = new Date(instant.getTime() - MS_PER_MINUTE);
    }
  }
  return instant;
}

function localWallClock(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, WALL_CLOCK_FORMAT);
}

function describeBoundaries(boundaries: number[]): string {
  return `${formatMinuteOfDay(boundaries[0])}-${formatMinuteOfDay(boundaries[boundaries.length - 1])}`;
}

function formatMinuteOfDay(minuteOfDay: number): string {
  const hh = String(Math.floor(minuteOfDay / MINUTES_PER_HOUR)).padStart(2, '0');
  const mm = String(minuteOfDay % MINUTES_PER_HOUR).padStart(2, '0');
  return `${hh}:${mm}`;
}
