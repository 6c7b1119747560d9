import { z } from 'zod';
import type { FrontMatterIssue } from './errors';
import { slugify } from './taxonomy';
import type { FrontMatter } from '../types/post';

/**
 * Accepts what YAML hands us for a date key: a `Date` (unquoted
 * `2024-03-01` or a timestamp) or a string `Date` understands.
 */
export function parseFrontMatterDate(raw: unknown): Date | undefined {
  if (raw instanceof Date) return Number.isNaN(raw.getTime()) ? undefined : raw;
  if (typeof raw === 'string' && raw.trim() !== '') {
    const d = new Date(raw.trim());
    if (!Number.isNaN(d.getTime())) return d;
  }
  return undefined;
}

function dateField(field: string) {
  return z.unknown().transform((value, ctx): string => {
    if (value === undefined || value === null || value === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} is required` });
      return z.NEVER;
    }
    const parsed = parseFrontMatterDate(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} must be a valid date` });
      return z.NEVER;
    }
    return parsed.toISOString();
  });
}

function requiredText(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} must not be empty`);
}

// A bare string is read as a one-element list: `tags: docker` is common enough.
function termList(field: string, min: number) {
  const entry = z
    .string({ invalid_type_error: `${field} entries must be strings` })
    .trim()
    .min(1, `${field} entries must not be empty`)
    .refine((value) => value === '' || slugify(value) !== '', `${field} entries need at least one letter or digit`);
  return z.preprocess(
    (value) => (typeof value === 'string' ? [value] : value),
    z
      .array(entry, { required_error: `${field} is required`, invalid_type_error: `${field} must be a list` })
      .min(min, `${field} must list at least ${min} entry`),
  );
}

export const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const FrontMatterSchema: z.ZodType<FrontMatter, z.ZodTypeDef, unknown> = z.object({
  title: requiredText('title'),
  date: dateField('date'),
  categories: termList('categories', 0),
  authors: termList('authors', 1),
  tags: termList('tags', 0),
  description: requiredText('description'),
  slug: z
    .string({ invalid_type_error: 'slug must be a string' })
    .regex(SLUG_PATTERN, 'slug must be lower-case words joined by hyphens')
    .optional(),
  draft: z.boolean({ invalid_type_error: 'draft must be true or false' }).default(false),
  updated: dateField('updated').optional(),
});

export type FrontMatterResult = { ok: true; value: FrontMatter } | { ok: false; issues: FrontMatterIssue[] };

export function validateFrontMatter(data: unknown): FrontMatterResult {
  const parsed = FrontMatterSchema.safeParse(data);
  if (parsed.success) return { ok: true, value: parsed.data };
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join('.') : '(front matter)',
      message: issue.message,
    })),
  };
}
