/**
 * Centralized Messages Configuration
 * All user-facing text in one place
 */

import type { ProcessingError, TimeUnit } from '../services/humanTime/types';

// ═══════════════════════════════════════════════════════════════════════════
// PARSE ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export const PARSE_ERRORS = {
  INVALID_FORMAT: 'Input does not match any supported time expression',
  PROCESSING_FAILED: 'Input was understood but could not be resolved',
  INTERNAL_ERROR: 'Internal error: the parse tree had an unexpected shape'
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// PROCESSING ERRORS
// ═══════════════════════════════════════════════════════════════════════════

const pad = (value: number): string => String(value).padStart(2, '0');

function pluralize(count: number, unit: TimeUnit): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Human-readable description of a single processing error
 */
export function describeProcessingError(error: ProcessingError): string {
  switch (error.kind) {
    case 'invalidTime':
      return error.second === undefined
        ? `Invalid time: hour ${error.hour}, minute ${error.minute}`
        : `Invalid time: hour ${error.hour}, minute ${error.minute}, second ${error.second}`;
    case 'invalidDate':
      return `Invalid date: year ${error.year}, month ${error.month}, day ${error.day}`;
    case 'nonexistentLocalTime':
      return `${error.date.year}-${pad(error.date.month)}-${pad(error.date.day)} ` +
        `${pad(error.time.hour)}:${pad(error.time.minute)}:${pad(error.time.second)} does not exist in ${error.zone}`;
    case 'calendarOverflow':
      return error.direction === 'forward'
        ? `Adding ${pluralize(error.count, error.unit)} to ${error.date} lands on a day that does not exist`
        : `Subtracting ${pluralize(error.count, error.unit)} from ${error.date} lands on a day that does not exist`;
    case 'outOfRange':
      return error.direction === 'forward'
        ? `Adding ${pluralize(error.count, error.unit)} leaves the supported calendar range`
        : `Subtracting ${pluralize(error.count, error.unit)} leaves the supported calendar range`;
    case 'anchor':
      return `Could not resolve the expression after "at": ${error.errors.map(describeProcessingError).join('; ')}`;
    case 'nestingTooDeep':
      return `Expressions nest deeper than ${error.limit} levels`;
  }
}
