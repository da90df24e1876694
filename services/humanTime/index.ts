/**
 * Human Time Service
 *
 * Public pipeline: normalize the input, match it against the grammar, build
 * the AST and resolve it against the caller's "now". Every failure is
 * returned as a `ParseError`; nothing is thrown except for invalid options.
 */

import type { DateTime } from 'luxon';
import { buildAst } from './ast/astBuilder';
import { InternalConsistencyError, InvalidFormatError, ProcessingFailedError, type ParseError } from './errors';
import { matchHumanTime } from './grammar/humanTimeGrammar';
import { resolveHumanTime } from './resolver/resolver';
import { fail, ok, type HumanTime, type HumanTimeOptions, type ParseResult, type Result } from './types';
import { resolveOptions } from '../../schemas/humanTimeOptions.schema';
import { serializeError } from '../../utils/errorHandler';
import logger from '../../utils/logger';
import { normalizeHumanInput } from '../../utils/textSanitizer';

function parseNormalized(input: string, maxInputLength: number): Result<HumanTime, ParseError> {
  if (input.length > maxInputLength) {
    logger.debug('⏱️ [HumanTime] Input rejected: too long', { length: input.length, maxInputLength });
    return fail(new InvalidFormatError());
  }

  const tree = matchHumanTime(input);
  if (tree === null) {
    logger.debug('⏱️ [HumanTime] No rule matched the whole input', { input });
    return fail(new InvalidFormatError());
  }

  try {
    return ok(buildAst(tree));
  } catch (error) {
    if (error instanceof InternalConsistencyError) {
      logger.warn('⚠️ [HumanTime] Parse tree could not be mapped to an expression', {
        input,
        error: serializeError(error)
      });
      return fail(error);
    }
    throw error;
  }
}

/**
 * Recognize `text` and build its AST, without resolving it.
 * @throws ZodError when `options` are invalid
 */
export function parseHumanTime(text: string, options: HumanTimeOptions = {}): Result<HumanTime, ParseError> {
  const { maxInputLength } = resolveOptions(options);
  return parseNormalized(normalizeHumanInput(text), maxInputLength);
}

/**
 * Parse a human time expression and resolve it relative to `now`.
 * Date-times are returned in `now`'s zone.
 *
 * @example
 * fromHumanTime('last friday at 19:45', DateTime.now())
 * @throws ZodError when `options` are invalid
 */
export function fromHumanTime(
  text: string,
  now: DateTime,
  options: HumanTimeOptions = {}
): Result<ParseResult, ParseError> {
  const resolvedOptions = resolveOptions(options);
  const input = normalizeHumanInput(text);
  logger.debug('⏱️ [HumanTime] Parsing', { input, now: now.toISO() });

  const parsed = parseNormalized(input, resolvedOptions.maxInputLength);
  if (!parsed.success) {
    return parsed;
  }

  const resolved = resolveHumanTime(parsed.value, now, resolvedOptions);
  if (!resolved.success) {
    logger.debug('⏱️ [HumanTime] Resolution failed', { input, errors: resolved.error });
    return fail(new ProcessingFailedError(resolved.error));
  }

  logger.debug('✅ [HumanTime] Resolved', { input, kind: resolved.value.kind });
  return resolved;
}

export { resolveHumanTime } from './resolver/resolver';
export { describeParseError, formatParseResult } from './format';
export * from './errors';
export * from './types';
