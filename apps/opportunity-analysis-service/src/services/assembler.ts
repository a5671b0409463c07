import { BatchResponse, ClassificationResult, RecordOutcome } from "../types/opportunity";

/**
 * Fold per-record outcomes (batch order) into the response body.
 * For a repeated id the later record decides: its result replaces the
 * earlier one, or its failure removes it.
 */
export function assembleBatchResponse(
  outcomes: readonly RecordOutcome[],
  attempted: number,
  now: Date = new Date()
): BatchResponse {
  const results = new Map<string, ClassificationResult>();

  for (const outcome of outcomes) {
    if (outcome.ok) {
      results.set(outcome.id, outcome.result);
    } else {
      results.delete(outcome.id);
    }
  }

  return {
    results: Object.fromEntries(results),
    processed_count: attempted,
    timestamp: now.toISOString(),
  };
}
