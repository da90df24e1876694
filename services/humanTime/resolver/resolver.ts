/**
 * Human Time Resolver
 *
 * Walks the AST and turns it into a concrete value relative to the caller's
 * "now". Failures are collected as `ProcessingError` lists: a date-time whose
 * date and time are both invalid reports both.
 */

import { DateTime } from 'luxon';
import { combineDateAndTime, constructTime, dateOf, timeOf, toCalendarDate } from './calendar';
import { resolveDate } from './dateResolver';
import { applyDuration } from './duration';
import { resolveOptions } from '../../../schemas/humanTimeOptions.schema';
import {
  fail,
  ok,
  type HumanTime,
  type HumanTimeOptions,
  type ParseResult,
  type ProcessingResult
} from '../types';

/**
 * The instant an anchor stands for: a date takes `now`'s time of day,
 * a time takes `now`'s date.
 */
function toAnchorInstant(result: ParseResult, now: DateTime): ProcessingResult<DateTime> {
  switch (result.kind) {
    case 'dateTime':
      return ok(result.value);
    case 'date': {
      const { year, month, day } = result.value;
      return combineDateAndTime(DateTime.utc(year, month, day), timeOf(now), now.zone);
    }
    case 'time':
      return combineDateAndTime(dateOf(now), result.value, now.zone);
  }
}

function resolveAt(ast: HumanTime, now: DateTime, depth: number, maxNestingDepth: number): ProcessingResult<ParseResult> {
  switch (ast.kind) {
    case 'now':
      return ok({ kind: 'dateTime', value: now });

    case 'time': {
      const time = constructTime(ast.time);
      return time.success ? ok({ kind: 'time', value: time.value }) : time;
    }

    case 'date': {
      const date = resolveDate(ast.date, now);
      return date.success ? ok({ kind: 'date', value: toCalendarDate(date.value) }) : date;
    }

    case 'dateTime': {
      const date = resolveDate(ast.date, now);
      const time = constructTime(ast.time);
      if (!date.success || !time.success) {
        return fail([
          ...(date.success ? [] : date.error),
          ...(time.success ? [] : time.error)
        ]);
      }
      const combined = combineDateAndTime(date.value, time.value, now.zone);
      return combined.success ? ok({ kind: 'dateTime', value: combined.value }) : combined;
    }

    case 'in': {
      const moved = applyDuration(now, ast.duration, 'forward');
      return moved.success ? ok({ kind: 'dateTime', value: moved.value }) : moved;
    }

    case 'ago': {
      let anchor = now;
      if (ast.anchor !== undefined) {
        if (depth + 1 > maxNestingDepth) {
          return fail([{ kind: 'nestingTooDeep', limit: maxNestingDepth }]);
        }
        const inner = resolveAt(ast.anchor, now, depth + 1, maxNestingDepth);
        const instant = inner.success ? toAnchorInstant(inner.value, now) : inner;
        if (!instant.success) {
          return fail([{ kind: 'anchor', errors: instant.error }]);
        }
        anchor = instant.value;
      }
      const moved = applyDuration(anchor, ast.duration, 'backward');
      return moved.success ? ok({ kind: 'dateTime', value: moved.value }) : moved;
    }
  }
}

/**
 * Resolve an AST relative to `now`. Date-times are produced in `now`'s zone.
 * @throws ZodError when `options` are invalid
 */
export function resolveHumanTime(
  ast: HumanTime,
  now: DateTime,
  options: HumanTimeOptions = {}
): ProcessingResult<ParseResult> {
  const { maxNestingDepth } = resolveOptions(options);
  return resolveAt(ast, now, 0, maxNestingDepth);
}
