/**
 * Calendar primitives on top of luxon.
 *
 * Calendar dates are carried as luxon DateTimes at midnight UTC, so day and
 * month arithmetic on them never meets a daylight-saving transition. Only
 * `combineDateAndTime` brings a date into the zone of the reference instant.
 */

import { DateTime, type Zone } from 'luxon';
import {
  fail,
  ok,
  MONTHS,
  WEEKDAYS,
  type CalendarDate,
  type Month,
  type ProcessingResult,
  type TimeNode,
  type TimeOfDay,
  type Weekday
} from '../types';

/** ISO weekday number, Monday = 1 ... Sunday = 7, as luxon's `weekday` */
export function weekdayNumber(weekday: Weekday): number {
  return WEEKDAYS.indexOf(weekday) + 1;
}

export function monthNumber(month: Month): number {
  return MONTHS.indexOf(month) + 1;
}

/**
 * False for invalid DateTimes and for arithmetic results outside the range
 * a JavaScript Date can represent
 */
export function isRepresentable(value: DateTime): boolean {
  return value.isValid && Number.isFinite(value.toMillis()) && Number.isFinite(value.year);
}

/** The calendar date of an instant, as seen in the instant's own zone */
export function dateOf(instant: DateTime): DateTime {
  return DateTime.utc(instant.year, instant.month, instant.day);
}

export function timeOf(instant: DateTime): TimeOfDay {
  return { hour: instant.hour, minute: instant.minute, second: instant.second };
}

export function toCalendarDate(date: DateTime): CalendarDate {
  return { year: date.year, month: date.month, day: date.day };
}

/**
 * Build a calendar date, rejecting combinations that do not exist (no clamping)
 */
export function constructDate(year: number, month: number, day: number): ProcessingResult<DateTime> {
  const date = DateTime.utc(year, month, day);
  if (!isRepresentable(date)) {
    return fail([{ kind: 'invalidDate', year, month, day }]);
  }
  return ok(date);
}

/**
 * Validate a time of day: hour 0-23, minute 0-59, second 0-59
 */
export function constructTime(time: TimeNode): ProcessingResult<TimeOfDay> {
  const second = time.kind === 'hourMinuteSecond' ? time.second : 0;
  const isValid = time.hour <= 23 && time.minute <= 59 && second <= 59;

  if (!isValid) {
    return fail([time.kind === 'hourMinuteSecond'
      ? { kind: 'invalidTime', hour: time.hour, minute: time.minute, second: time.second }
      : { kind: 'invalidTime', hour: time.hour, minute: time.minute }]);
  }
  return ok({ hour: time.hour, minute: time.minute, second });
}

/**
 * Local date-time in `zone`. Fails when the wall-clock time is skipped by a
 * daylight-saving transition, instead of silently moving it.
 */
export function combineDateAndTime(date: DateTime, time: TimeOfDay, zone: Zone): ProcessingResult<DateTime> {
  const combined = DateTime.fromObject(
    { year: date.year, month: date.month, day: date.day, hour: time.hour, minute: time.minute, second: time.second },
    { zone }
  );

  const landsOnRequestedTime = isRepresentable(combined)
    && combined.day === date.day
    && combined.hour === time.hour
    && combined.minute === time.minute
    && combined.second === time.second;

  if (!landsOnRequestedTime) {
    return fail([{ kind: 'nonexistentLocalTime', date: toCalendarDate(date), time, zone: zone.name }]);
  }
  return ok(combined);
}
