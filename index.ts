/**
 * human-time-parser
 *
 * Turns phrases such as "last friday at 19:45", "in 3 days" or
 * "2 hours, 32 minutes and 7 seconds ago" into dates and times relative to a
 * caller-supplied "now".
 */

export {
  fromHumanTime,
  parseHumanTime,
  resolveHumanTime,
  formatParseResult,
  describeParseError,
  HumanTimeError,
  InvalidFormatError,
  ProcessingFailedError,
  InternalConsistencyError
} from './services/humanTime';

export type {
  ParseError,
  ParseErrorCode,
  ParseResult,
  HumanTime,
  DateNode,
  TimeNode,
  Duration,
  Quantifier,
  ProcessingError,
  ProcessingResult,
  CalendarDate,
  TimeOfDay,
  HumanTimeOptions,
  Result,
  Weekday,
  Month,
  TimeUnit,
  DateUnit,
  RelativeSpecifier,
  Direction
} from './services/humanTime';

export { HumanTimeOptionsSchema } from './schemas/humanTimeOptions.schema';
export { humanTimeDefaults } from './config';
