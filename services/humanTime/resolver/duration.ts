import type { DateTime, DurationLikeObject } from 'luxon';
import { isRepresentable } from './calendar';
import {
  fail,
  ok,
  type Direction,
  type Duration,
  type ProcessingResult,
  type Quantifier,
  type TimeUnit
} from '../types';

// Smallest unit first
const APPLICATION_ORDER: readonly TimeUnit[] = ['second', 'minute', 'hour', 'day', 'week', 'month', 'year'];

function toDurationObject(quantifier: Quantifier): DurationLikeObject {
  switch (quantifier.unit) {
    case 'year':
      return { years: quantifier.count };
    case 'month':
      return { months: quantifier.count };
    case 'week':
      return { weeks: quantifier.count };
    case 'day':
      return { days: quantifier.count };
    case 'hour':
      return { hours: quantifier.count };
    case 'minute':
      return { minutes: quantifier.count };
    case 'second':
      return { seconds: quantifier.count };
  }
}

/**
 * Move `instant` by one quantifier.
 *
 * Years and months keep the day of month and fail when that day does not
 * exist in the target month. Weeks and days move calendar days keeping the
 * wall-clock time; hours, minutes and seconds move absolute time.
 */
export function applyQuantifier(
  instant: DateTime,
  quantifier: Quantifier,
  direction: Direction
): ProcessingResult<DateTime> {
  const shift = toDurationObject(quantifier);
  const moved = direction === 'forward' ? instant.plus(shift) : instant.minus(shift);

  if (!isRepresentable(moved)) {
    return fail([{ kind: 'outOfRange', direction, unit: quantifier.unit, count: quantifier.count }]);
  }

  if ((quantifier.unit === 'year' || quantifier.unit === 'month') && moved.day !== instant.day) {
    return fail([{
      kind: 'calendarOverflow',
      direction,
      unit: quantifier.unit,
      count: quantifier.count,
      date: instant.toISODate() ?? ''
    }]);
  }

  return ok(moved);
}

/**
 * Apply every quantifier of a duration, smallest unit first.
 * Quantifiers of the same unit keep their input order. The first failing step
 * aborts the whole application.
 */
export function applyDuration(
  instant: DateTime,
  duration: Duration,
  direction: Direction
): ProcessingResult<DateTime> {
  const ordered = [...duration].sort(
    (a, b) => APPLICATION_ORDER.indexOf(a.unit) - APPLICATION_ORDER.indexOf(b.unit)
  );

  let current = instant;
  for (const quantifier of ordered) {
    const step = applyQuantifier(current, quantifier, direction);
    if (!step.success) {
      return step;
    }
    current = step.value;
  }
  return ok(current);
}
