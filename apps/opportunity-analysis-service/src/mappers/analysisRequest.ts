import { z } from "zod";
import { BatchRequest } from "../types/opportunity";

/**
 * POST /analyze-opportunities body
 */
export const opportunityRecordSchema = z.object({
  id: z.string().refine(id => id.trim().length > 0, "id must be a non-empty string"),
  opportunityName: z.string(),
  description: z.string(),
  onHoldReason: z.string().nullish(),
});

export const analysisRequestSchema = z.object({
  opportunities: z.array(opportunityRecordSchema),
});

export interface ValidationIssue {
  /** Dotted path into the body, e.g. "opportunities.1.description" */
  path: string;
  message: string;
}

export type MapResult =
  | { ok: true; batch: BatchRequest }
  | { ok: false; error: string; details: ValidationIssue[] };

/**
 * Validate a raw request body and map it to a BatchRequest
 */
export function mapAnalysisRequest(payload: unknown, maxBatchSize: number): MapResult {
  const parsed = analysisRequestSchema.safeParse(payload);

  if (!parsed.success) {
    return {
      ok: false,
      error: "Invalid request body",
      details: parsed.error.issues.map(issue => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    };
  }

  const { opportunities } = parsed.data;

  if (opportunities.length === 0) {
    return {
      ok: false,
      error: "No opportunities provided for analysis",
      details: [{ path: "opportunities", message: "Array must contain at least 1 element(s)" }],
    };
  }

  if (opportunities.length > maxBatchSize) {
    return {
      ok: false,
      error: `Too many opportunities: ${opportunities.length} (max ${maxBatchSize})`,
      details: [{ path: "opportunities", message: `Array must contain at most ${maxBatchSize} element(s)` }],
    };
  }

  return {
    ok: true,
    batch: opportunities.map(o => ({
      id: o.id,
      opportunityName: o.opportunityName,
      description: o.description,
      onHoldReason: o.onHoldReason ?? null,
    })),
  };
}
