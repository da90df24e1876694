/**
 * Human Time Grammar
 *
 * The closed set of supported phrasings, written as PEG rules over normalized
 * (lowercase, single-spaced) input. Alternatives are tried in the order listed;
 * the first combination that consumes the whole input wins.
 *
 *   HumanTime   = DateTime | Date | Time | In | Ago | Now
 *   DateTime    = Date ("," | "at")? Time | Time ("," | "at")? Date
 *   Date        = Today | Tomorrow | Overmorrow | Yesterday | IsoDate
 *               | Num MonthName Num | Num MonthName
 *               | RelativeSpecifier Week Weekday | RelativeSpecifier DateUnit
 *               | RelativeSpecifier Weekday | Weekday
 *   IsoDate     = @(4 digits "-" 2 digits "-" 2 digits)
 *   Time        = @(Num ":" Num (":" Num)?)
 *   In          = "in" Duration
 *   Ago         = Duration "ago" ("at" HumanTime)?
 *   Duration    = Quantifier (("," "and" | "," | "and") Quantifier)* | SingleUnit
 *   Quantifier  = Num TimeUnit
 *   SingleUnit  = ("an" | "a") TimeUnit
 */

import {
  adjacent,
  choice,
  digits,
  keyword,
  lazy,
  literal,
  many,
  matchEntire,
  optional,
  rule,
  seq,
  wordBreak,
  type ParseNode,
  type Parser
} from './combinators';
import { MONTHS, WEEKDAYS, type DateUnit, type Month, type TimeUnit } from '../types';

export type RuleName =
  | 'HumanTime'
  | 'DateTime'
  | 'Date'
  | 'Time'
  | 'In'
  | 'Ago'
  | 'Now'
  | 'Today'
  | 'Tomorrow'
  | 'Overmorrow'
  | 'Yesterday'
  | 'IsoDate'
  | 'Num'
  | 'MonthName'
  | 'Weekday'
  | 'RelativeSpecifier'
  | 'Week'
  | 'DateUnit'
  | 'TimeUnit'
  | 'Duration'
  | 'Quantifier'
  | 'SingleUnit';

export type HumanTimeNode = ParseNode<RuleName>;

type HumanTimeParser = Parser<RuleName>;

// ═══════════════════════════════════════════════════════════════════════════
// WORD TABLES
// ═══════════════════════════════════════════════════════════════════════════

export const TIME_UNIT_WORDS: Readonly<Record<string, TimeUnit>> = {
  year: 'year',
  years: 'year',
  month: 'month',
  months: 'month',
  week: 'week',
  weeks: 'week',
  day: 'day',
  days: 'day',
  hour: 'hour',
  hours: 'hour',
  minute: 'minute',
  minutes: 'minute',
  second: 'second',
  seconds: 'second'
};

export const DATE_UNIT_WORDS: Readonly<Record<string, DateUnit>> = {
  year: 'year',
  month: 'month',
  week: 'week',
  day: 'day'
};

/** Full month names plus their three-letter abbreviations */
export const MONTH_WORDS: Readonly<Record<string, Month>> = Object.fromEntries(
  MONTHS.flatMap((month): [string, Month][] => [[month, month], [month.slice(0, 3), month]])
);

const kw = (word: string): HumanTimeParser => keyword<RuleName>(word);
const lit = (text: string): HumanTimeParser => literal<RuleName>(text);
const named = (name: RuleName, parser: HumanTimeParser): HumanTimeParser => rule<RuleName>(name, parser);

const words = (table: Readonly<Record<string, unknown>>): HumanTimeParser =>
  choice(...Object.keys(table).map(kw));

// ═══════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════

const num = named('Num', digits<RuleName>());

const weekday = named('Weekday', choice(...WEEKDAYS.map(kw)));
const monthName = named('MonthName', words(MONTH_WORDS));
const timeUnit = named('TimeUnit', words(TIME_UNIT_WORDS));
const dateUnit = named('DateUnit', words(DATE_UNIT_WORDS));
const week = named('Week', kw('week'));
const relativeSpecifier = named('RelativeSpecifier', choice(kw('this'), kw('next'), kw('last')));

const isoDate = named('IsoDate', adjacent(
  named('Num', digits<RuleName>(4, 4)),
  lit('-'),
  named('Num', digits<RuleName>(2, 2)),
  lit('-'),
  named('Num', digits<RuleName>(2, 2))
));

const date = named('Date', choice(
  named('Today', kw('today')),
  named('Tomorrow', kw('tomorrow')),
  named('Overmorrow', kw('overmorrow')),
  named('Yesterday', kw('yesterday')),
  isoDate,
  seq(num, monthName, num),
  seq(num, monthName),
  seq(relativeSpecifier, week, weekday),
  seq(relativeSpecifier, dateUnit),
  seq(relativeSpecifier, weekday),
  weekday
));

const time = named('Time', adjacent(num, lit(':'), num, optional(adjacent(lit(':'), num))));

// "tomorrow18:30" and "18:30today" are both rejected
const separator = choice(lit(','), kw('at'), wordBreak<RuleName>());

const dateTime = named('DateTime', choice(
  seq(date, separator, time),
  seq(time, separator, date)
));

const quantifier = named('Quantifier', seq(num, timeUnit));
const singleUnit = named('SingleUnit', seq(choice(kw('an'), kw('a')), timeUnit));
const quantifierSeparator = choice(seq(lit(','), kw('and')), lit(','), kw('and'));

const duration = named('Duration', choice(
  seq(quantifier, many(seq(quantifierSeparator, quantifier))),
  singleUnit
));

const inExpression = named('In', seq(kw('in'), duration));

const humanTime: HumanTimeParser = named('HumanTime', choice(
  dateTime,
  date,
  time,
  inExpression,
  lazy(() => ago),
  named('Now', kw('now'))
));

const ago: HumanTimeParser = named('Ago', seq(
  duration,
  kw('ago'),
  optional(seq(kw('at'), humanTime))
));

/**
 * Match normalized input against the grammar.
 * @returns The `HumanTime` root node, or null when no rule covers the whole input
 */
export function matchHumanTime(input: string): HumanTimeNode | null {
  return matchEntire(humanTime, input);
}
