import { describeProcessingError } from '../../config/messages';
import { ProcessingFailedError, type ParseError } from './errors';
import type { ParseResult } from './types';

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Render a result for display: `YYYY-MM-DD HH:MM:SS` with the zone name for
 * date-times, `YYYY-MM-DD` for dates, `HH:MM:SS` for times.
 */
export function formatParseResult(result: ParseResult): string {
  switch (result.kind) {
    case 'dateTime':
      return `${result.value.toFormat('yyyy-MM-dd HH:mm:ss')} ${result.value.zone.name}`;
    case 'date':
      return `${pad(result.value.year, 4)}-${pad(result.value.month)}-${pad(result.value.day)}`;
    case 'time':
      return `${pad(result.value.hour)}:${pad(result.value.minute)}:${pad(result.value.second)}`;
  }
}

/**
 * Multi-line description of a parse failure; processing failures list each
 * collected error on its own line.
 */
export function describeParseError(error: ParseError): string {
  if (error instanceof ProcessingFailedError) {
    return [
      `[${error.code}] ${error.errors.length === 1 ? 'Could not resolve the expression' : `Could not resolve the expression (${error.errors.length} errors)`}`,
      ...error.errors.map((processingError) => `  - ${describeProcessingError(processingError)}`)
    ].join('\n');
  }
  return `[${error.code}] ${error.message}`;
}
