import { describeProcessingError } from '../../../config/messages';
import { describeParseError, formatParseResult } from '../../../services/humanTime/format';
import {
  InternalConsistencyError,
  InvalidFormatError,
  ProcessingFailedError
} from '../../../services/humanTime/errors';
import { NEW_YEAR_2010, at } from '../../utils/testHelpers';

describe('formatParseResult', () => {
    it('should render date-times with their zone', () => {
        expect(formatParseResult({ kind: 'dateTime', value: NEW_YEAR_2010 })).toBe('2010-01-01 00:00:00 UTC');
        expect(formatParseResult({ kind: 'dateTime', value: at('2010-06-01T12:30:05', 'Europe/Berlin') }))
            .toBe('2010-06-01 12:30:05 Europe/Berlin');
    });

    it('should pad dates and times', () => {
        expect(formatParseResult({ kind: 'date', value: { year: 987, month: 3, day: 4 } })).toBe('0987-03-04');
        expect(formatParseResult({ kind: 'time', value: { hour: 7, minute: 5, second: 0 } })).toBe('07:05:00');
    });
});

describe('describeParseError', () => {
    it('should prefix single-message errors with their code', () => {
        expect(describeParseError(new InvalidFormatError()))
            .toBe('[INVALID_FORMAT] Input does not match any supported time expression');
        expect(describeParseError(new InternalConsistencyError('unexpected Date shape ""')))
            .toBe('[INTERNAL_ERROR] Internal error: the parse tree had an unexpected shape (unexpected Date shape "")');
    });

    it('should list every processing error on its own line', () => {
        const error = new ProcessingFailedError([
            { kind: 'invalidDate', year: 2023, month: 11, day: 31 },
            { kind: 'invalidTime', hour: 25, minute: 0 }
        ]);
        expect(describeParseError(error)).toBe([
            '[PROCESSING_FAILED] Could not resolve the expression (2 errors)',
            '  - Invalid date: year 2023, month 11, day 31',
            '  - Invalid time: hour 25, minute 0'
        ].join('\n'));
    });
});

describe('describeProcessingError', () => {
    it('should describe calendar overflow in both directions', () => {
        expect(describeProcessingError({ kind: 'calendarOverflow', direction: 'forward', unit: 'month', count: 1, date: '2010-01-31' }))
            .toBe('Adding 1 month to 2010-01-31 lands on a day that does not exist');
        expect(describeProcessingError({ kind: 'calendarOverflow', direction: 'backward', unit: 'year', count: 3, date: '2012-02-29' }))
            .toBe('Subtracting 3 years from 2012-02-29 lands on a day that does not exist');
    });

    it('should describe the remaining kinds', () => {
        expect(describeProcessingError({ kind: 'invalidTime', hour: 1, minute: 2, second: 60 }))
            .toBe('Invalid time: hour 1, minute 2, second 60');
        expect(describeProcessingError({
            kind: 'nonexistentLocalTime',
            date: { year: 2021, month: 3, day: 14 },
            time: { hour: 2, minute: 30, second: 0 },
            zone: 'America/New_York'
        })).toBe('2021-03-14 02:30:00 does not exist in America/New_York');
        expect(describeProcessingError({ kind: 'outOfRange', direction: 'forward', unit: 'year', count: 300000 }))
            .toBe('Adding 300000 years leaves the supported calendar range');
        expect(describeProcessingError({ kind: 'nestingTooDeep', limit: 16 }))
            .toBe('Expressions nest deeper than 16 levels');
        expect(describeProcessingError({ kind: 'anchor', errors: [{ kind: 'nestingTooDeep', limit: 1 }] }))
            .toBe('Could not resolve the expression after "at": Expressions nest deeper than 1 levels');
    });
});
