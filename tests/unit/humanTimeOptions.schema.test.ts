import { ZodError } from 'zod';
import { HumanTimeOptionsSchema, resolveOptions } from '../../schemas/humanTimeOptions.schema';

describe('HumanTimeOptionsSchema', () => {
    it('should fill in the library defaults', () => {
        expect(resolveOptions()).toEqual({ maxInputLength: 256, maxNestingDepth: 16 });
        expect(resolveOptions({ maxNestingDepth: 0 })).toEqual({ maxInputLength: 256, maxNestingDepth: 0 });
    });

    it('should reject out-of-range and unknown options', () => {
        expect(HumanTimeOptionsSchema.safeParse({ maxInputLength: 0 }).success).toBe(false);
        expect(HumanTimeOptionsSchema.safeParse({ maxNestingDepth: -1 }).success).toBe(false);
        expect(HumanTimeOptionsSchema.safeParse({ timezone: 'UTC' }).success).toBe(false);
        expect(() => resolveOptions({ maxInputLength: '10' })).toThrow(ZodError);
    });

    it('should explain what is wrong', () => {
        const result = HumanTimeOptionsSchema.safeParse({ maxInputLength: -5 });
        expect(!result.success && result.error.issues[0].message).toBe('maxInputLength must be a positive integer');
    });
});
