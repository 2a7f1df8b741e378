import { z } from 'zod';

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const rowsSchema = z.array(z.array(cellSchema));

const sheetSchema = z.object({
  name: z.string().min(1),
  rows: rowsSchema,
});

export const analysisRequestSchema = z.object({
  /** Member list rows, header row first */
  members: rowsSchema.min(1),
  files: z.array(sheetSchema).min(1),
  withinOrganizationRule: z.enum(['empty-detail', 'always', 'never']).optional(),
});

export const comparisonRequestSchema = z.object({
  newGrid: rowsSchema.min(1),
  oldGrid: rowsSchema.min(1),
  topN: z.number().int().positive().optional(),
});

export const thankYouRequestSchema = analysisRequestSchema.extend({
  runId: z.string().min(1).max(64).optional(),
});

export type AnalysisRequest = z.infer<typeof analysisRequestSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
