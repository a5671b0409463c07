import { BatchRequest, BatchResponse, OpportunityRecord, RecordOutcome } from "../types/opportunity";
import {
  AppError,
  BatchCancelledError,
  GatewayError,
  InvalidRecordError,
  errorMessage,
} from "../lib/errors";
import { createLogger } from "../lib/logger";
import { buildClassificationPrompt } from "./prompt";
import { ModelGateway } from "./gateway";
import { parseClassification } from "./parser";
import { categorizeByKeywords } from "./fallback";
import { assembleBatchResponse } from "./assembler";
import { DEFAULT_RETRY_POLICY, RetryPolicy, Sleep, withRetry } from "./retry";

const log = createLogger("analysis");

export const DEFAULT_MAX_CONCURRENCY = 5;

export interface AnalysisDeps {
  gateway: ModelGateway;
  /** Overridable for tests */
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

export interface AnalysisOptions {
  /** Cap on simultaneous gateway calls */
  maxConcurrency?: number;
  retry?: RetryPolicy;
  /** Rescue gateway/parse failures with the keyword rules instead of dropping the record */
  keywordFallback?: boolean;
  /** Aborting cancels the batch; in-flight calls are abandoned */
  signal?: AbortSignal;
}

interface RecordContext {
  deps: AnalysisDeps;
  retry: RetryPolicy;
  keywordFallback: boolean;
  signal: AbortSignal;
}

/**
 * Classify every record of the batch.
 *
 * Records run through a worker pool of `maxConcurrency`. A per-record failure
 * only drops that record from `results`; AuthFailure, cancellation or an
 * unexpected exception stops dispatch and rejects the whole call.
 */
export async function analyzeOpportunities(
  batch: BatchRequest,
  deps: AnalysisDeps,
  options: AnalysisOptions = {}
): Promise<BatchResponse> {
  const startTime = Date.now();
  const maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
  const parentSignal = options.signal;

  if (parentSignal?.aborted) {
    throw new BatchCancelledError();
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  const ctx: RecordContext = {
    deps,
    retry: options.retry ?? DEFAULT_RETRY_POLICY,
    keywordFallback: options.keywordFallback ?? false,
    signal: controller.signal,
  };

  log.info(`Analyzing ${batch.length} opportunities`, { maxConcurrency, keywordFallback: ctx.keywordFallback });

  const outcomes: RecordOutcome[] = new Array(batch.length);
  let fatal: unknown = null;
  let next = 0;

  const worker = async (): Promise<void> => {
    while (!controller.signal.aborted && next < batch.length) {
      const index = next++;
      try {
        outcomes[index] = await classifyRecord(batch[index], ctx);
      } catch (error) {
        fatal ??= error;
        controller.abort();
      }
    }
  };

  const workers = Array.from({ length: Math.min(maxConcurrency, batch.length) }, () => worker());

  try {
    await Promise.race([Promise.all(workers), whenAborted(controller.signal)]);
  } finally {
    parentSignal?.removeEventListener("abort", onParentAbort);
  }

  if (parentSignal?.aborted) {
    log.warn(`Batch cancelled after ${Date.now() - startTime}ms`);
    throw new BatchCancelledError();
  }
  if (fatal !== null) {
    log.error(`Batch aborted: ${errorMessage(fatal)}`);
    throw fatal;
  }

  const response = assembleBatchResponse(outcomes, batch.length, (deps.now ?? (() => new Date()))());

  log.info(`Batch complete`, {
    processed_count: response.processed_count,
    classified: Object.keys(response.results).length,
    fallback: outcomes.filter(o => o.ok && o.source === "keyword_fallback").length,
    failed: outcomes.filter(o => !o.ok).length,
    duration_ms: Date.now() - startTime,
  });

  return response;
}

/**
 * prompt → gateway (with retry) → parse, for one record.
 * Resolves with a failed outcome for per-record errors; rejects only on fatal ones.
 */
async function classifyRecord(record: OpportunityRecord, ctx: RecordContext): Promise<RecordOutcome> {
  const id = typeof record.id === "string" ? record.id : "";

  try {
    const messages = buildClassificationPrompt(record);
    const raw = await withRetry(
      () => ctx.deps.gateway.classify(messages, { signal: ctx.signal }),
      ctx.retry,
      {
        sleep: ctx.deps.sleep,
        random: ctx.deps.random,
        signal: ctx.signal,
        onRetry: (error, attempt, delayMs) =>
          log.info(`Retrying ${id} (attempt ${attempt}) after ${error.code}, waiting ${delayMs}ms`),
      }
    );
    const result = parseClassification(raw);
    return { id, ok: true, result, source: "model" };
  } catch (error) {
    if (isFatal(error)) {
      throw error;
    }

    const code = error instanceof AppError ? error.code : "UNKNOWN";
    log.warn(`Error analyzing opportunity ${id} (${code}): ${errorMessage(error)}`);

    if (ctx.keywordFallback && !(error instanceof InvalidRecordError)) {
      return { id, ok: true, result: categorizeByKeywords(record), source: "keyword_fallback" };
    }
    return { id, ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

function isFatal(error: unknown): boolean {
  if (!(error instanceof AppError)) return true;
  if (error instanceof BatchCancelledError) return true;
  return error instanceof GatewayError && error.isFatal;
}

function whenAborted(signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
