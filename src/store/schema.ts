import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const IdSchema = z.number().int().positive();

export const FeedUrlSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => URL.canParse(value), { message: 'Invalid URL' });

/**
 * Publish timestamps are kept as text: either a gemlog date (YYYY-MM-DD) or an
 * ISO-8601 date-time. Date-times are rewritten in UTC (`toISOString` form) so
 * stored values and cursors sort lexically in publish order whatever offset
 * they were written with.
 */
export const PublishedAtSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (ISO_DATE.test(value)) return value;
    const time = Date.parse(value);
    if (!z.string().datetime({ offset: true }).safeParse(value).success || Number.isNaN(time)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected YYYY-MM-DD or an ISO-8601 date-time' });
      return z.NEVER;
    }
    return new Date(time).toISOString();
  });

export const CreateFeedSchema = z.object({
  url: FeedUrlSchema,
  name: z.string().trim().min(1).nullish(),
});

export type CreateFeedInput = z.input<typeof CreateFeedSchema>;

export const UsernameSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^\S+$/, 'Username must not contain whitespace');

export const RecordEntrySchema = z.object({
  feedId: IdSchema,
  title: z.string().trim().min(1),
  publishedAt: PublishedAtSchema,
  url: FeedUrlSchema,
});

export type RecordEntryInput = z.input<typeof RecordEntrySchema>;

export const ListEntriesSchema = z.object({
  since: PublishedAtSchema.optional(),
});

export const UnviewedQuerySchema = z.object({
  feedId: IdSchema.optional(),
  limit: z.number().int().positive().optional(),
});

export type UnviewedQuery = z.input<typeof UnviewedQuerySchema>;

/**
 * Parse store input, raising ValidationError with the flattened zod issues.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, {
      errors: result.error.flatten().fieldErrors,
      formErrors: result.error.flatten().formErrors,
    });
  }
  return result.data;
}
