/**
 * Test Helpers
 * Shared reference instants and result unwrapping for human time tests
 */

import { DateTime } from 'luxon';
import {
  describeParseError,
  fromHumanTime,
  type HumanTimeOptions,
  type ParseError,
  type ParseResult,
  type ProcessingError
} from '../../services/humanTime';
import { ProcessingFailedError } from '../../services/humanTime/errors';

// ============================================================================
// Reference instants
// ============================================================================

/**
 * Build a fixed "now" in UTC (or `zone`) from an ISO local date-time
 */
export function at(iso: string, zone: string = 'UTC'): DateTime {
  const value = DateTime.fromISO(iso, { zone });
  if (!value.isValid) {
    throw new Error(`Invalid test instant: ${iso}`);
  }
  return value;
}

/** 2010-01-01T00:00:00 UTC, a Friday */
export const NEW_YEAR_2010 = at('2010-01-01T00:00:00');

// ============================================================================
// Result unwrapping
// ============================================================================

export function parseOk(text: string, now: DateTime = NEW_YEAR_2010, options?: HumanTimeOptions): ParseResult {
  const result = fromHumanTime(text, now, options);
  if (!result.success) {
    throw new Error(`"${text}" failed: ${describeParseError(result.error)}`);
  }
  return result.value;
}

export function parseError(text: string, now: DateTime = NEW_YEAR_2010, options?: HumanTimeOptions): ParseError {
  const result = fromHumanTime(text, now, options);
  if (result.success) {
    throw new Error(`"${text}" unexpectedly resolved to ${result.value.kind}`);
  }
  return result.error;
}

/**
 * Resolve a date-time expression and return it as an ISO string
 */
export function resolveIso(text: string, now: DateTime = NEW_YEAR_2010): string | null {
  const result = parseOk(text, now);
  if (result.kind !== 'dateTime') {
    throw new Error(`"${text}" resolved to a ${result.kind}, not a date-time`);
  }
  return result.value.toISO();
}

/**
 * Resolve a date expression and return it as `YYYY-MM-DD`
 */
export function resolveDateString(text: string, now: DateTime = NEW_YEAR_2010): string {
  const result = parseOk(text, now);
  if (result.kind !== 'date') {
    throw new Error(`"${text}" resolved to a ${result.kind}, not a date`);
  }
  const { year, month, day } = result.value;
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function processingErrors(text: string, now: DateTime = NEW_YEAR_2010): readonly ProcessingError[] {
  const error = parseError(text, now);
  if (!(error instanceof ProcessingFailedError)) {
    throw new Error(`"${text}" failed with ${error.code}, not PROCESSING_FAILED`);
  }
  return error.errors;
}
