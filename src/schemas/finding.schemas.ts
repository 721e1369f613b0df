import { z } from 'zod';

export const findingPrioritySchema = z.enum(['High', 'Medium', 'Low']);

export const findingSchema = z.object({
  id: z.number().int('Finding id must be an integer'),
  priority: findingPrioritySchema,
  section: z.string(),
  issue: z.string(),
  problem: z.string(),
  citation: z.string({ required_error: 'Citation is required' }),
  suggestedReplacement: z.string({ required_error: 'Suggested replacement is required' }),
});

export const findingListSchema = z.array(findingSchema).superRefine((findings, ctx) => {
  const seen = new Set<number>();
  findings.forEach((finding, index) => {
    if (seen.has(finding.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate finding id ${finding.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(finding.id);
  });
});

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

export const reviewerItemSchema = z.object({
  section: optionalText,
  issue: optionalText,
  problem: optionalText,
  citation: optionalText,
  suggested_replacement: optionalText,
});

export const reviewerReportSchema = z.object({
  'High Priority': z.array(reviewerItemSchema).optional().default([]),
  'Medium Priority': z.array(reviewerItemSchema).optional().default([]),
  'Low Priority': z.array(reviewerItemSchema).optional().default([]),
});

export const cleanedFindingSchema = z
  .object({
    id: z.coerce.number().int(),
    citation_clean: optionalText,
    suggested_replacement_clean: optionalText,
  })
  .transform((value) => ({
    id: value.id,
    citationClean: value.citation_clean,
    suggestedReplacementClean: value.suggested_replacement_clean.trim(),
  }));

export const editSpecSchema = z.object({
  acceptAllByDefault: z.boolean().optional().default(false),
  accept: z.array(z.number().int()).optional().default([]),
  discard: z.array(z.number().int()).optional().default([]),
  overrides: z
    .record(
      z.string().regex(/^\d+$/, 'Override keys must be finding ids'),
      z.object({ suggestedReplacement: z.string().optional(), citationHint: z.string().optional() })
    )
    .optional()
    .default({}),
});

export const redlinePolicySchema = z.object({
  ignoreCase: z.boolean().optional(),
  skipIfSame: z.boolean().optional(),
  author: z.string().trim().min(1, 'Author is required').optional(),
  fuzzyThreshold: z.number().gt(0).lte(1, 'Fuzzy threshold must be at most 1').optional(),
  onAmbiguous: z.enum(['first', 'skip']).optional(),
  trackedGranularity: z.enum(['span', 'word']).optional(),
});

export type ReviewerReport = z.input<typeof reviewerReportSchema>;
export type CleanedFinding = z.output<typeof cleanedFindingSchema>;
export type EditSpec = z.input<typeof editSpecSchema>;
export type RedlinePolicyInput = z.infer<typeof redlinePolicySchema>;
