/**
 * Clock and calendar helpers shared by validation, parsing and annotation
 */

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/;

/**
 * Parse H:MM, HH:MM or HH:MM:SS[.fff] into seconds since midnight
 *
 * Fractional seconds are truncated.
 *
 * @returns undefined when the token is not a valid time of day
 */
export function parseClock(token: string): number | undefined {
  const match = CLOCK_PATTERN.exec(token);
  if (!match) {
    return undefined;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * 3723 -> '01:02:03'
 */
export function formatClock(secondsOfDay: number): string {
  const hours = Math.floor(secondsOfDay / 3600);
  const minutes = Math.floor((secondsOfDay % 3600) / 60);
  const seconds = secondsOfDay % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}

/**
 * 62 -> '01:02'
 */
export function formatHourMinute(minutesOfDay: number): string {
  const hours = Math.floor(minutesOfDay / 60);
  const minutes = minutesOfDay % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isValidCalendarDay(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function toIsoDate(year: number, month: number, day: number): string {
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Recognise the date layouts the service and FITS headers use
 *
 * YYYY.MM.DD, YYYY-MM-DD, YYYY/MM/DD, MM/DD/YYYY, M/D/YYYY
 *
 * @returns ISO date (YYYY-MM-DD), or undefined
 */
export function parseCalendarDate(token: string): string | undefined {
  let year: number;
  let month: number;
  let day: number;

  const yearFirst = /^(\d{4})[-./](\d{1,2})[-./](\d{1,2})$/.exec(token);
  const yearLast = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(token);

  if (yearFirst) {
    year = Number(yearFirst[1]);
    month = Number(yearFirst[2]);
    day = Number(yearFirst[3]);
  } else if (yearLast) {
    month = Number(yearLast[1]);
    day = Number(yearLast[2]);
    year = Number(yearLast[3]);
  } else {
    return undefined;
  }

  return isValidCalendarDay(year, month, day) ? toIsoDate(year, month, day) : undefined;
}
