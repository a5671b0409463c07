import { Router, Request, Response } from "express";
import { ServiceConfig } from "../config";
import { mapAnalysisRequest } from "../mappers/analysisRequest";
import { analyzeOpportunities } from "../services/analysis";
import { ModelGateway } from "../services/gateway";
import { Sleep } from "../services/retry";
import {
  BatchCancelledError,
  BatchTimeoutError,
  ERROR_CODES,
  GatewayError,
  errorMessage,
} from "../lib/errors";
import { createLogger } from "../lib/logger";

const log = createLogger("analyze-opportunities");

export interface AnalyzeRouteDeps {
  gateway: ModelGateway;
  analysis: ServiceConfig["analysis"];
  /** Overridable for tests */
  sleep?: Sleep;
}

/**
 * POST /analyze-opportunities
 * Classify a batch of opportunities into security opportunity types
 *
 * Flow: Validate → Fan out (prompt → model → parse) → Assemble → Return
 */
export function createAnalyzeOpportunitiesRouter(deps: AnalyzeRouteDeps): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    const startTime = Date.now();
    const { analysis } = deps;

    const mapped = mapAnalysisRequest(req.body, analysis.maxBatchSize);
    if (!mapped.ok) {
      log.warn(`Rejected request ${req.requestId}: ${mapped.error}`, mapped.details);
      res.status(400).json({ error: mapped.error, details: mapped.details });
      return;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, analysis.timeoutMs);

    // Client went away before we answered
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.on("close", onClose);

    try {
      const response = await analyzeOpportunities(
        mapped.batch,
        { gateway: deps.gateway, sleep: deps.sleep },
        {
          maxConcurrency: analysis.maxConcurrency,
          retry: {
            maxRetries: analysis.maxRetries,
            baseDelayMs: analysis.retryBaseDelayMs,
            jitterRatio: 0.25,
            maxDelayMs: analysis.retryMaxDelayMs,
          },
          keywordFallback: analysis.keywordFallback,
          signal: controller.signal,
        }
      );

      log.info(`Request ${req.requestId} analyzed:`, {
        processed_count: response.processed_count,
        classified: Object.keys(response.results).length,
        duration_ms: Date.now() - startTime,
      });

      res.status(200).json(response);
    } catch (error) {
      if (timedOut) {
        const timeout = new BatchTimeoutError(analysis.timeoutMs);
        log.error(`Request ${req.requestId}: ${timeout.message}`);
        res.status(504).json({ error: timeout.message, code: timeout.code });
        return;
      }

      if (error instanceof BatchCancelledError) {
        log.warn(`Request ${req.requestId} cancelled by client after ${Date.now() - startTime}ms`);
        return;
      }

      if (error instanceof GatewayError && error.isFatal) {
        log.error(`Request ${req.requestId} aborted, model service rejected credentials:`, error.message);
        res.status(502).json({
          error: "Model service authentication failed",
          code: ERROR_CODES.AUTH_FAILURE,
        });
        return;
      }

      const message = errorMessage(error);
      log.error(`Request ${req.requestId} failed:`, message);
      res.status(500).json({ error: message });
    } finally {
      clearTimeout(timer);
      res.off("close", onClose);
    }
  });

  return router;
}
