/**
 * Project definition schemas
 *
 * Everything that enters the registry (API bodies, seed files) is parsed
 * through these.
 */

import cron from 'node-cron';
import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

export const PROJECT_ID_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

const regexString = z.string().refine(
  (value) => {
    try {
      new RegExp(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

export const fieldRuleSchema = z
  .object({
    selector: z.string().min(1).optional(),
    label: z.string().min(1).optional(),
    attribute: z.string().min(1).optional(),
    stripPrefix: z.string().min(1).optional(),
    pattern: regexString.optional(),
    required: z.boolean().optional(),
    default: z.string().optional(),
  })
  .strict()
  .refine((rule) => !(rule.selector && rule.label), {
    message: 'A field rule takes either a selector or a label, not both',
  });

const fieldMapSchema = z.record(z.string().min(1), fieldRuleSchema);

export const detailRulesSchema = z
  .object({
    linkSelector: z.string().min(1),
    fields: fieldMapSchema.default({}),
    keyValueSelector: z.string().min(1).optional(),
    keyValuePrefix: z.string().default(''),
    /** Clicked before collecting, e.g. a tab that reveals the blocks */
    tabSelector: z.string().min(1).optional(),
    /** Keeps each block's text as `<blockField>_<n>`, counting from 1 */
    blockField: z.string().min(1).optional(),
  })
  .strict();

export const paginationRuleSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('click'), selector: z.string().min(1) }).strict(),
  z
    .object({
      mode: z.literal('query'),
      param: z.string().min(1),
      start: z.number().int().nonnegative().default(1),
    })
    .strict(),
]);

export const summaryRulesSchema = z
  .object({
    groups: z
      .array(
        z.object({ name: z.string().min(1), field: z.string().min(1), split: z.string().min(1).optional() }).strict()
      )
      .default([]),
    distinct: z
      .array(
        z
          .object({
            name: z.string().min(1),
            field: z.string().min(1),
            limit: z.number().int().positive().default(10),
          })
          .strict()
      )
      .default([]),
  })
  .strict();

export const extractionRulesSchema = z
  .object({
    itemSelector: z.string().min(1),
    waitForSelector: z.string().min(1).optional(),
    labelSelector: z.string().min(1).default('label'),
    fields: fieldMapSchema.refine((fields) => Object.keys(fields).length > 0, {
      message: 'At least one field rule is required',
    }),
    detail: detailRulesSchema.optional(),
    pagination: paginationRuleSchema.optional(),
    keyFields: z.array(z.string().min(1)).min(1).optional(),
    summary: summaryRulesSchema.optional(),
  })
  .strict();

const targetUrl = z
  .string()
  .url()
  .refine(
    (value) => {
      try {
        return /^https?:$/.test(new URL(value).protocol);
      } catch {
        return false;
      }
    },
    { message: 'Targets must be http or https URLs' }
  );

const cronExpression = z.string().refine((value) => cron.validate(value), {
  message: 'Invalid cron expression',
});

const projectFieldsSchema = z.object({
  name: z.string().trim().min(1),
  targets: z.array(targetUrl).min(1),
  rules: extractionRulesSchema,
  schedule: cronExpression.nullable().optional(),
  status: z.enum(['active', 'paused']).optional(),
  maxPages: z.number().int().positive().max(1000).optional(),
  rateLimitMs: z.number().int().nonnegative().optional(),
});

export const projectInputSchema = projectFieldsSchema
  .extend({
    id: z.string().max(64).regex(PROJECT_ID_PATTERN, 'Project ids are lowercase slugs').optional(),
  })
  .strict();

// The id is not part of a patch: it cannot change
export const projectPatchSchema = projectFieldsSchema.partial().strict();

export type FieldRule = z.infer<typeof fieldRuleSchema>;
export type DetailRules = z.infer<typeof detailRulesSchema>;
export type PaginationRule = z.infer<typeof paginationRuleSchema>;
export type SummaryRules = z.infer<typeof summaryRulesSchema>;
export type ExtractionRules = z.infer<typeof extractionRulesSchema>;
export type ProjectInput = z.input<typeof projectInputSchema>;
export type ProjectPatch = z.input<typeof projectPatchSchema>;
export type ParsedProjectInput = z.output<typeof projectInputSchema>;
export type ParsedProjectPatch = z.output<typeof projectPatchSchema>;

/**
 * Parse a value or throw a ValidationError listing every issue
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return result.data;
}

/**
 * Turn a display name into a project id
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 64)
    .replace(/-+$/, '');
}
