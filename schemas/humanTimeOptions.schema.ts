import { z } from 'zod';
import { humanTimeDefaults } from '../config';

/**
 * Schema for the per-call options of the human time parser
 */
export const HumanTimeOptionsSchema = z.object({
  maxInputLength: z.number().int().positive("maxInputLength must be a positive integer").default(humanTimeDefaults.maxInputLength),
  maxNestingDepth: z.number().int().nonnegative("maxNestingDepth must not be negative").default(humanTimeDefaults.maxNestingDepth)
}).strict();

export type ResolvedHumanTimeOptions = z.infer<typeof HumanTimeOptionsSchema>;

/**
 * Apply defaults and validate
 * @throws ZodError when an option has the wrong type or range
 */
export function resolveOptions(options: unknown = {}): ResolvedHumanTimeOptions {
  return HumanTimeOptionsSchema.parse(options);
}
