/**
 * AST Builder
 *
 * Translates the grammar's parse tree into the typed `HumanTime` AST.
 * Each rule is dispatched on the sequence of its child rules, so every
 * grammar alternative maps to exactly one AST variant. A tree this module
 * cannot map means the grammar and the builder disagree: that is reported as
 * an `InternalConsistencyError`, never as bad input.
 */

import { InternalConsistencyError } from '../errors';
import {
  DATE_UNIT_WORDS,
  MONTH_WORDS,
  TIME_UNIT_WORDS,
  type HumanTimeNode,
  type RuleName
} from '../grammar/humanTimeGrammar';
import {
  WEEKDAYS,
  type DateNode,
  type Duration,
  type HumanTime,
  type Quantifier,
  type RelativeSpecifier,
  type TimeNode,
  type Weekday
} from '../types';

const RELATIVE_SPECIFIERS: readonly RelativeSpecifier[] = ['this', 'next', 'last'];

const DIGITS_ONLY = /^[0-9]+$/;

function shapeOf(node: HumanTimeNode): string {
  return node.children.map((child) => child.rule).join(' ');
}

function unexpectedShape(node: HumanTimeNode): InternalConsistencyError {
  return new InternalConsistencyError(`unexpected ${node.rule} shape "${shapeOf(node)}"`);
}

function expectRule(node: HumanTimeNode, rule: RuleName): void {
  if (node.rule !== rule) {
    throw new InternalConsistencyError(`expected ${rule} but found ${node.rule}`);
  }
}

function childAt(node: HumanTimeNode, index: number): HumanTimeNode {
  if (index >= node.children.length) {
    throw unexpectedShape(node);
  }
  return node.children[index];
}

function lookup<T>(table: Readonly<Record<string, T>>, node: HumanTimeNode): T {
  if (!Object.hasOwn(table, node.text)) {
    throw new InternalConsistencyError(`no ${node.rule} named "${node.text}"`);
  }
  return table[node.text];
}

function findIn<T extends string>(values: readonly T[], node: HumanTimeNode): T {
  const found = values.find((value) => value === node.text);
  if (found === undefined) {
    throw new InternalConsistencyError(`no ${node.rule} named "${node.text}"`);
  }
  return found;
}

// ═══════════════════════════════════════════════════════════════════════════
// LEAVES
// ═══════════════════════════════════════════════════════════════════════════

function buildNumber(node: HumanTimeNode): number {
  expectRule(node, 'Num');
  const value = Number(node.text);
  if (!DIGITS_ONLY.test(node.text) || !Number.isSafeInteger(value)) {
    throw new InternalConsistencyError(`"${node.text}" is not a representable number`);
  }
  return value;
}

function buildWeekday(node: HumanTimeNode): Weekday {
  expectRule(node, 'Weekday');
  return findIn(WEEKDAYS, node);
}

function buildRelativeSpecifier(node: HumanTimeNode): RelativeSpecifier {
  expectRule(node, 'RelativeSpecifier');
  return findIn(RELATIVE_SPECIFIERS, node);
}

// ═══════════════════════════════════════════════════════════════════════════
// DATE & TIME
// ═══════════════════════════════════════════════════════════════════════════

function buildTime(node: HumanTimeNode): TimeNode {
  expectRule(node, 'Time');
  switch (shapeOf(node)) {
    case 'Num Num':
      return {
        kind: 'hourMinute',
        hour: buildNumber(childAt(node, 0)),
        minute: buildNumber(childAt(node, 1))
      };
    case 'Num Num Num':
      return {
        kind: 'hourMinuteSecond',
        hour: buildNumber(childAt(node, 0)),
        minute: buildNumber(childAt(node, 1)),
        second: buildNumber(childAt(node, 2))
      };
    default:
      throw unexpectedShape(node);
  }
}

function buildIsoDate(node: HumanTimeNode): DateNode {
  expectRule(node, 'IsoDate');
  if (shapeOf(node) !== 'Num Num Num') {
    throw unexpectedShape(node);
  }
  return {
    kind: 'isoDate',
    year: buildNumber(childAt(node, 0)),
    month: buildNumber(childAt(node, 1)),
    day: buildNumber(childAt(node, 2))
  };
}

function buildDate(node: HumanTimeNode): DateNode {
  expectRule(node, 'Date');
  switch (shapeOf(node)) {
    case 'Today':
      return { kind: 'today' };
    case 'Tomorrow':
      return { kind: 'tomorrow' };
    case 'Overmorrow':
      return { kind: 'overmorrow' };
    case 'Yesterday':
      return { kind: 'yesterday' };
    case 'IsoDate':
      return buildIsoDate(childAt(node, 0));
    case 'Num MonthName Num':
      return {
        kind: 'dayMonthYear',
        day: buildNumber(childAt(node, 0)),
        month: lookup(MONTH_WORDS, childAt(node, 1)),
        year: buildNumber(childAt(node, 2))
      };
    case 'Num MonthName':
      return {
        kind: 'dayMonth',
        day: buildNumber(childAt(node, 0)),
        month: lookup(MONTH_WORDS, childAt(node, 1))
      };
    case 'RelativeSpecifier Week Weekday':
      return {
        kind: 'relativeWeekWeekday',
        specifier: buildRelativeSpecifier(childAt(node, 0)),
        weekday: buildWeekday(childAt(node, 2))
      };
    case 'RelativeSpecifier DateUnit':
      return {
        kind: 'relativeTimeUnit',
        specifier: buildRelativeSpecifier(childAt(node, 0)),
        unit: lookup(DATE_UNIT_WORDS, childAt(node, 1))
      };
    case 'RelativeSpecifier Weekday':
      return {
        kind: 'relativeWeekday',
        specifier: buildRelativeSpecifier(childAt(node, 0)),
        weekday: buildWeekday(childAt(node, 1))
      };
    case 'Weekday':
      return { kind: 'upcomingWeekday', weekday: buildWeekday(childAt(node, 0)) };
    default:
      throw unexpectedShape(node);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DURATIONS
// ═══════════════════════════════════════════════════════════════════════════

function buildQuantifier(node: HumanTimeNode): Quantifier {
  switch (`${node.rule}: ${shapeOf(node)}`) {
    case 'Quantifier: Num TimeUnit':
      return {
        count: buildNumber(childAt(node, 0)),
        unit: lookup(TIME_UNIT_WORDS, childAt(node, 1))
      };
    case 'SingleUnit: TimeUnit':
      return { count: 1, unit: lookup(TIME_UNIT_WORDS, childAt(node, 0)) };
    default:
      throw unexpectedShape(node);
  }
}

function buildDuration(node: HumanTimeNode): Duration {
  expectRule(node, 'Duration');
  const shape = shapeOf(node);
  const isSingleUnit = shape === 'SingleUnit';
  const isQuantifierList = node.children.length > 0 && node.children.every((child) => child.rule === 'Quantifier');
  if (!isSingleUnit && !isQuantifierList) {
    throw unexpectedShape(node);
  }

  const [first, ...rest] = node.children.map(buildQuantifier);
  return [first, ...rest];
}

// ═══════════════════════════════════════════════════════════════════════════
// ROOT
// ═══════════════════════════════════════════════════════════════════════════

function buildHumanTimeNode(node: HumanTimeNode): HumanTime {
  expectRule(node, 'HumanTime');
  const child = childAt(node, 0);

  switch (shapeOf(node)) {
    case 'DateTime':
      switch (shapeOf(child)) {
        case 'Date Time':
          return { kind: 'dateTime', date: buildDate(childAt(child, 0)), time: buildTime(childAt(child, 1)) };
        case 'Time Date':
          return { kind: 'dateTime', date: buildDate(childAt(child, 1)), time: buildTime(childAt(child, 0)) };
        default:
          throw unexpectedShape(child);
      }
    case 'Date':
      return { kind: 'date', date: buildDate(child) };
    case 'Time':
      return { kind: 'time', time: buildTime(child) };
    case 'In':
      if (shapeOf(child) !== 'Duration') {
        throw unexpectedShape(child);
      }
      return { kind: 'in', duration: buildDuration(childAt(child, 0)) };
    case 'Ago':
      switch (shapeOf(child)) {
        case 'Duration':
          return { kind: 'ago', duration: buildDuration(childAt(child, 0)) };
        case 'Duration HumanTime':
          return {
            kind: 'ago',
            duration: buildDuration(childAt(child, 0)),
            anchor: buildHumanTimeNode(childAt(child, 1))
          };
        default:
          throw unexpectedShape(child);
      }
    case 'Now':
      return { kind: 'now' };
    default:
      throw unexpectedShape(node);
  }
}

/**
 * Build the AST for a `HumanTime` parse tree.
 * @throws InternalConsistencyError when the tree has a shape no grammar alternative produces
 */
export function buildAst(root: HumanTimeNode): HumanTime {
  return buildHumanTimeNode(root);
}
