import { applyDuration, applyQuantifier } from '../../../services/humanTime/resolver/duration';
import type { Duration } from '../../../services/humanTime/types';
import { NEW_YEAR_2010, at } from '../../utils/testHelpers';

describe('duration arithmetic', () => {
    describe('applyQuantifier', () => {
        it('should move forward and backward by each unit', () => {
            const step = (count: number, unit: Duration[number]['unit'], direction: 'forward' | 'backward') => {
                const result = applyQuantifier(NEW_YEAR_2010, { count, unit }, direction);
                return result.success ? result.value.toISO() : null;
            };

            expect(step(2, 'year', 'forward')).toBe('2012-01-01T00:00:00.000Z');
            expect(step(1, 'month', 'backward')).toBe('2009-12-01T00:00:00.000Z');
            expect(step(3, 'week', 'forward')).toBe('2010-01-22T00:00:00.000Z');
            expect(step(1, 'day', 'backward')).toBe('2009-12-31T00:00:00.000Z');
            expect(step(36, 'hour', 'forward')).toBe('2010-01-02T12:00:00.000Z');
            expect(step(90, 'minute', 'backward')).toBe('2009-12-31T22:30:00.000Z');
            expect(step(61, 'second', 'forward')).toBe('2010-01-01T00:01:01.000Z');
        });

        it('should fail instead of clamping a month step onto a missing day', () => {
            expect(applyQuantifier(at('2010-03-31T10:00:00'), { count: 1, unit: 'month' }, 'forward')).toEqual({
                success: false,
                error: [{ kind: 'calendarOverflow', direction: 'forward', unit: 'month', count: 1, date: '2010-03-31' }]
            });
        });

        it('should fail a year step from a leap day into a common year', () => {
            expect(applyQuantifier(at('2012-02-29T00:00:00'), { count: 1, unit: 'year' }, 'backward')).toEqual({
                success: false,
                error: [{ kind: 'calendarOverflow', direction: 'backward', unit: 'year', count: 1, date: '2012-02-29' }]
            });
        });

        it('should allow a year step from a leap day into another leap year', () => {
            const result = applyQuantifier(at('2012-02-29T00:00:00'), { count: 4, unit: 'year' }, 'forward');
            expect(result.success && result.value.toISODate()).toBe('2016-02-29');
        });

        it('should report steps beyond the representable range', () => {
            expect(applyQuantifier(NEW_YEAR_2010, { count: 300000, unit: 'year' }, 'forward')).toEqual({
                success: false,
                error: [{ kind: 'outOfRange', direction: 'forward', unit: 'year', count: 300000 }]
            });
        });

        it('should keep the wall-clock time across a daylight saving change for day steps', () => {
            const beforeChange = at('2021-03-13T09:00:00', 'America/New_York');
            const result = applyQuantifier(beforeChange, { count: 1, unit: 'day' }, 'forward');
            expect(result.success && result.value.toISO()).toBe('2021-03-14T09:00:00.000-04:00');
        });

        it('should move absolute time across a daylight saving change for hour steps', () => {
            const beforeChange = at('2021-03-13T09:00:00', 'America/New_York');
            const result = applyQuantifier(beforeChange, { count: 24, unit: 'hour' }, 'forward');
            expect(result.success && result.value.toISO()).toBe('2021-03-14T10:00:00.000-04:00');
        });
    });

    describe('applyDuration', () => {
        it('should apply the smallest unit first regardless of input order', () => {
            const forwards: Duration = [{ count: 1, unit: 'month' }, { count: 1, unit: 'day' }];
            const backwards: Duration = [{ count: 1, unit: 'day' }, { count: 1, unit: 'month' }];
            const from = at('2010-01-30T00:00:00');

            // 2010-01-30 + 1 day = 01-31, then + 1 month overflows February
            const expected = {
                success: false,
                error: [{ kind: 'calendarOverflow', direction: 'forward', unit: 'month', count: 1, date: '2010-01-31' }]
            };
            expect(applyDuration(from, forwards, 'forward')).toEqual(expected);
            expect(applyDuration(from, backwards, 'forward')).toEqual(expected);
        });

        it('should accumulate repeated units', () => {
            const result = applyDuration(NEW_YEAR_2010, [{ count: 2, unit: 'hour' }, { count: 3, unit: 'hour' }], 'backward');
            expect(result.success && result.value.toISO()).toBe('2009-12-31T19:00:00.000Z');
        });

        it('should stop at the first failing step', () => {
            const result = applyDuration(
                at('2010-03-31T00:00:00'),
                [{ count: 1, unit: 'year' }, { count: 1, unit: 'month' }, { count: 2, unit: 'day' }],
                'backward'
            );
            // 03-31 - 2 days = 03-29, - 1 month = 02-29 does not exist in 2010
            expect(result).toEqual({
                success: false,
                error: [{ kind: 'calendarOverflow', direction: 'backward', unit: 'month', count: 1, date: '2010-03-29' }]
            });
        });
    });
});
