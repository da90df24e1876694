import type { DateTime } from 'luxon';
import { constructDate, dateOf, monthNumber, weekdayNumber } from './calendar';
import { applyQuantifier } from './duration';
import { ok, type DateNode, type DateUnit, type ProcessingResult, type RelativeSpecifier, type Weekday } from '../types';

const WEEK_OFFSETS: Readonly<Record<RelativeSpecifier, number>> = {
  this: 0,
  next: 7,
  last: -7
};

/**
 * Days from `today` forward to the next `weekday`.
 * `includeToday` allows 0; otherwise the result is always 1..7.
 */
function daysUntil(today: DateTime, weekday: Weekday, includeToday: boolean): number {
  const diff = (weekdayNumber(weekday) - today.weekday + 7) % 7;
  return diff === 0 && !includeToday ? 7 : diff;
}

/** Days from `today` back to the previous `weekday`, always 1..7 */
function daysSince(today: DateTime, weekday: Weekday): number {
  const diff = (today.weekday - weekdayNumber(weekday) + 7) % 7;
  return diff === 0 ? 7 : diff;
}

function resolveRelativeWeekday(today: DateTime, specifier: RelativeSpecifier, weekday: Weekday): DateTime {
  switch (specifier) {
    case 'this':
      return today.plus({ days: daysUntil(today, weekday, true) });
    case 'next':
      return today.plus({ days: daysUntil(today, weekday, false) });
    case 'last':
      return today.minus({ days: daysSince(today, weekday) });
  }
}

function resolveRelativeTimeUnit(
  today: DateTime,
  specifier: RelativeSpecifier,
  unit: DateUnit
): ProcessingResult<DateTime> {
  switch (specifier) {
    case 'this':
      return ok(today);
    case 'next':
      return applyQuantifier(today, { count: 1, unit }, 'forward');
    case 'last':
      return applyQuantifier(today, { count: 1, unit }, 'backward');
  }
}

/**
 * Resolve a date expression to a calendar date (midnight UTC) relative to `now`'s date
 */
export function resolveDate(node: DateNode, now: DateTime): ProcessingResult<DateTime> {
  const today = dateOf(now);

  switch (node.kind) {
    case 'today':
      return ok(today);
    case 'tomorrow':
      return ok(today.plus({ days: 1 }));
    case 'overmorrow':
      return ok(today.plus({ days: 2 }));
    case 'yesterday':
      return ok(today.minus({ days: 1 }));
    case 'isoDate':
      return constructDate(node.year, node.month, node.day);
    case 'dayMonthYear':
      return constructDate(node.year, monthNumber(node.month), node.day);
    case 'dayMonth':
      return constructDate(today.year, monthNumber(node.month), node.day);
    case 'relativeWeekWeekday': {
      // Monday-anchored week, then a plain offset inside it
      const monday = today.minus({ days: today.weekday - 1 });
      return ok(monday.plus({ days: WEEK_OFFSETS[node.specifier] + weekdayNumber(node.weekday) - 1 }));
    }
    case 'relativeWeekday':
      return ok(resolveRelativeWeekday(today, node.specifier, node.weekday));
    case 'relativeTimeUnit':
      return resolveRelativeTimeUnit(today, node.specifier, node.unit);
    case 'upcomingWeekday':
      return ok(resolveRelativeWeekday(today, 'next', node.weekday));
  }
}
