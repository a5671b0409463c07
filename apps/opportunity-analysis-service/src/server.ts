import "dotenv/config";
import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { config, isAzureOpenAIConfigured, ServiceConfig } from "./config";
import { createLogger, setLogLevel } from "./lib/logger";
import { requestContext } from "./middleware/requestContext";
import { createAnalyzeOpportunitiesRouter } from "./routes/analyzeOpportunities";
import opportunityTypesRouter from "./routes/opportunityTypes";
import { createAzureOpenAIGateway, ModelGateway, UnconfiguredGateway } from "./services/gateway";
import { Sleep } from "./services/retry";

const log = createLogger("server");

export const SERVICE_NAME = "Opportunity Analysis API";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps {
  config: Readonly<ServiceConfig>;
  gateway: ModelGateway;
  /** Overridable for tests */
  sleep?: Sleep;
}

export function createApp(deps: AppDeps) {
  const app = express();

  // Middleware
  app.use(requestContext);
  app.use(
    cors({
      origin: deps.config.allowedOrigins.includes("*") ? true : deps.config.allowedOrigins,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "1mb" }));

  // API metadata
  app.get("/", (_req, res) => {
    res.json({ message: SERVICE_NAME, version: SERVICE_VERSION, status: "running" });
  });

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  // Mount routes
  app.use("/opportunity-types", opportunityTypesRouter);
  app.use(
    "/analyze-opportunities",
    createAnalyzeOpportunitiesRouter({
      gateway: deps.gateway,
      analysis: deps.config.analysis,
      sleep: deps.sleep,
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON and oversized bodies surface here from express.json()
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(err)) {
      log.warn(`Request ${req.requestId} rejected: ${err.message}`);
      res.status(err.status).json({
        error: err.type === "entity.parse.failed" ? "Malformed JSON body" : err.message,
      });
      return;
    }
    const message = err instanceof Error ? err.message : "Unknown error";
    log.error(`Request ${req.requestId} failed:`, message);
    res.status(500).json({ error: message });
  });

  return app;
}

interface BodyParserError {
  type: string;
  status: number;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

/**
 * Build the gateway from config and start listening
 */
export function startServer(cfg: Readonly<ServiceConfig> = config) {
  setLogLevel(cfg.logLevel);

  const gateway = isAzureOpenAIConfigured(cfg)
    ? createAzureOpenAIGateway(cfg.azureOpenAI)
    : new UnconfiguredGateway();

  const app = createApp({ config: cfg, gateway });

  return app.listen(cfg.port, cfg.host, () => {
    log.info(`${SERVICE_NAME} started`);
    log.info(`Listening: http://${cfg.host}:${cfg.port}`);
    log.info(`Environment: ${cfg.nodeEnv}`);
    log.info(`Allowed origins: ${cfg.allowedOrigins.join(", ")}`);
    log.info(`Azure OpenAI: ${isAzureOpenAIConfigured(cfg) ? `deployment ${cfg.azureOpenAI.deploymentId}` : "not configured"}`);
    log.info(`Analysis: concurrency ${cfg.analysis.maxConcurrency}, retries ${cfg.analysis.maxRetries}, keyword fallback ${cfg.analysis.keywordFallback ? "on" : "off"}`);
  });
}

if (require.main === module) {
  startServer();
}
