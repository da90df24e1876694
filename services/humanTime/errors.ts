import { PARSE_ERRORS, describeProcessingError } from '../../config/messages';
import type { ProcessingError } from './types';

export type ParseErrorCode = 'INVALID_FORMAT' | 'PROCESSING_FAILED' | 'INTERNAL_ERROR';

/**
 * Base class of every failure `fromHumanTime` returns
 */
export class HumanTimeError extends Error {
  code: ParseErrorCode;

  constructor(message: string, code: ParseErrorCode) {
    super(message);
    this.name = 'HumanTimeError';
    this.code = code;
  }
}

/**
 * The input matched no supported phrasing, or left text unconsumed
 */
export class InvalidFormatError extends HumanTimeError {
  constructor() {
    super(PARSE_ERRORS.INVALID_FORMAT, 'INVALID_FORMAT');
    this.name = 'InvalidFormatError';
  }
}

/**
 * The input matched but resolving it against "now" failed.
 * Carries every independent failure found, not only the first.
 */
export class ProcessingFailedError extends HumanTimeError {
  errors: readonly ProcessingError[];

  constructor(errors: readonly ProcessingError[]) {
    super(
      `${PARSE_ERRORS.PROCESSING_FAILED}: ${errors.map(describeProcessingError).join('; ')}`,
      'PROCESSING_FAILED'
    );
    this.name = 'ProcessingFailedError';
    this.errors = errors;
  }
}

/**
 * The grammar produced a tree the AST builder cannot map.
 * Always a defect in this library, never bad input.
 */
export class InternalConsistencyError extends HumanTimeError {
  reason: string;

  constructor(reason: string) {
    super(`${PARSE_ERRORS.INTERNAL_ERROR} (${reason})`, 'INTERNAL_ERROR');
    this.name = 'InternalConsistencyError';
    this.reason = reason;
  }
}

export type ParseError = InvalidFormatError | ProcessingFailedError | InternalConsistencyError;
