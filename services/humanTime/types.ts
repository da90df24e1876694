/**
 * Human Time Types
 * AST, results and processing errors shared by the grammar, builder and resolver.
 */

import type { DateTime } from 'luxon';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMERATIONS
// ═══════════════════════════════════════════════════════════════════════════

/** Monday-first, so `WEEKDAYS.indexOf(day) + 1` is the ISO weekday number */
export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday'
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** January first, so `MONTHS.indexOf(month) + 1` is the calendar month number */
export const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december'
] as const;

export type Month = (typeof MONTHS)[number];

export const TIME_UNITS = ['year', 'month', 'week', 'day', 'hour', 'minute', 'second'] as const;

export type TimeUnit = (typeof TIME_UNITS)[number];

/** Units that "this/next/last <unit>" accepts */
export type DateUnit = Extract<TimeUnit, 'year' | 'month' | 'week' | 'day'>;

export type RelativeSpecifier = 'this' | 'next' | 'last';

export type Direction = 'forward' | 'backward';

// ═══════════════════════════════════════════════════════════════════════════
// AST
// ═══════════════════════════════════════════════════════════════════════════

export interface Quantifier {
  readonly count: number;
  readonly unit: TimeUnit;
}

/** Quantifiers in the order they appeared in the input */
export type Duration = readonly [Quantifier, ...Quantifier[]];

export type TimeNode =
  | { readonly kind: 'hourMinute'; readonly hour: number; readonly minute: number }
  | { readonly kind: 'hourMinuteSecond'; readonly hour: number; readonly minute: number; readonly second: number };

export type DateNode =
  | { readonly kind: 'today' }
  | { readonly kind: 'tomorrow' }
  | { readonly kind: 'overmorrow' }
  | { readonly kind: 'yesterday' }
  | { readonly kind: 'isoDate'; readonly year: number; readonly month: number; readonly day: number }
  | { readonly kind: 'dayMonthYear'; readonly day: number; readonly month: Month; readonly year: number }
  | { readonly kind: 'dayMonth'; readonly day: number; readonly month: Month }
  | { readonly kind: 'relativeWeekWeekday'; readonly specifier: RelativeSpecifier; readonly weekday: Weekday }
  | { readonly kind: 'relativeWeekday'; readonly specifier: RelativeSpecifier; readonly weekday: Weekday }
  | { readonly kind: 'relativeTimeUnit'; readonly specifier: RelativeSpecifier; readonly unit: DateUnit }
  | { readonly kind: 'upcomingWeekday'; readonly weekday: Weekday };

export type HumanTime =
  | { readonly kind: 'dateTime'; readonly date: DateNode; readonly time: TimeNode }
  | { readonly kind: 'date'; readonly date: DateNode }
  | { readonly kind: 'time'; readonly time: TimeNode }
  | { readonly kind: 'in'; readonly duration: Duration }
  | { readonly kind: 'ago'; readonly duration: Duration; readonly anchor?: HumanTime }
  | { readonly kind: 'now' };

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(value: T): { readonly success: true; readonly value: T } {
  return { success: true, value };
}

export function fail<E>(error: E): { readonly success: false; readonly error: E } {
  return { success: false, error };
}

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * What the input described. A bare date stays a date: no midnight is implied.
 */
export type ParseResult =
  | { readonly kind: 'dateTime'; readonly value: DateTime }
  | { readonly kind: 'date'; readonly value: CalendarDate }
  | { readonly kind: 'time'; readonly value: TimeOfDay };

// ═══════════════════════════════════════════════════════════════════════════
// PROCESSING ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export type ProcessingError =
  | { readonly kind: 'invalidTime'; readonly hour: number; readonly minute: number; readonly second?: number }
  | { readonly kind: 'invalidDate'; readonly year: number; readonly month: number; readonly day: number }
  | { readonly kind: 'nonexistentLocalTime'; readonly date: CalendarDate; readonly time: TimeOfDay; readonly zone: string }
  | {
      readonly kind: 'calendarOverflow';
      readonly direction: Direction;
      readonly unit: 'year' | 'month';
      readonly count: number;
      /** ISO date the step started from */
      readonly date: string;
    }
  | { readonly kind: 'outOfRange'; readonly direction: Direction; readonly unit: TimeUnit; readonly count: number }
  | { readonly kind: 'anchor'; readonly errors: readonly ProcessingError[] }
  | { readonly kind: 'nestingTooDeep'; readonly limit: number };

export type ProcessingResult<T> = Result<T, readonly ProcessingError[]>;

export interface HumanTimeOptions {
  maxInputLength?: number;
  maxNestingDepth?: number;
}
