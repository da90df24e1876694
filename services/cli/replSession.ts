/**
 * REPL Session
 *
 * Line handler behind the interactive CLI. Reads the clock once per line so
 * the printed "now" is exactly the instant the expression was resolved against.
 */

import { DateTime } from 'luxon';
import { describeParseError, formatParseResult, fromHumanTime } from '../humanTime';
import type { HumanTimeOptions } from '../humanTime';
import logger from '../../utils/logger';

export type Clock = () => DateTime;

export interface ReplSessionOptions {
  /** IANA zone name; the system zone when omitted */
  zone?: string;
  clock?: Clock;
  parserOptions?: HumanTimeOptions;
}

export class ReplSession {
  private readonly clock: Clock;
  private readonly parserOptions: HumanTimeOptions;

  constructor(options: ReplSessionOptions = {}) {
    const { zone } = options;
    this.clock = options.clock ?? (() => (zone === undefined ? DateTime.now() : DateTime.now().setZone(zone)));
    this.parserOptions = options.parserOptions ?? {};
  }

  /**
   * Output lines for one input line; blank input produces none
   */
  handleLine(line: string): string[] {
    if (line.trim() === '') {
      return [];
    }

    const now = this.clock();
    const result = fromHumanTime(line, now, this.parserOptions);
    const nowLine = `Time now: ${formatParseResult({ kind: 'dateTime', value: now })}`;

    if (!result.success) {
      logger.debug('❌ [CLI] Expression rejected', { line, code: result.error.code });
      return [nowLine, describeParseError(result.error)];
    }
    return [nowLine, `Calculated: ${formatParseResult(result.value)}`];
  }
}
