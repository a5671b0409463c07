import type { LogLevel } from "../lib/logger";

/**
 * Environment configuration
 */
export interface ServiceConfig {
  host: string;
  port: number;
  allowedOrigins: string[];

  // Azure OpenAI (APIM-fronted deployment)
  azureOpenAI: {
    endpoint: string;
    subscriptionKey: string;
    apiVersion: string;
    deploymentId: string;
    requestTimeoutMs: number;
  };

  // Batch analysis
  analysis: {
    maxConcurrency: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    timeoutMs: number;
    maxBatchSize: number;
    keywordFallback: boolean;
  };

  logLevel: LogLevel;
  nodeEnv: string;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Build config from an environment map. Pure, so tests can pass their own env.
 */
export function loadConfig(env: Env): ServiceConfig {
  return {
    host: env.HOST || "0.0.0.0",
    port: positiveInt(env.PORT, 8000),
    allowedOrigins: parseList(env.ALLOWED_ORIGINS, ["http://localhost:5173"]),

    azureOpenAI: {
      endpoint: (env.AZURE_OPENAI_ENDPOINT || "").replace(/\/+$/, ""),
      subscriptionKey: env.AZURE_OPENAI_SUBSCRIPTION_KEY || "",
      apiVersion: env.AZURE_OPENAI_API_VERSION || "2024-02-01",
      deploymentId: env.AZURE_OPENAI_DEPLOYMENT_ID || "",
      requestTimeoutMs: positiveInt(env.OPENAI_REQUEST_TIMEOUT_MS, 30_000),
    },

    analysis: {
      maxConcurrency: positiveInt(env.ANALYSIS_MAX_CONCURRENCY, 5),
      maxRetries: nonNegativeInt(env.ANALYSIS_MAX_RETRIES, 1),
      retryBaseDelayMs: nonNegativeInt(env.ANALYSIS_RETRY_BASE_DELAY_MS, 1000),
      retryMaxDelayMs: nonNegativeInt(env.ANALYSIS_RETRY_MAX_DELAY_MS, 10_000),
      timeoutMs: positiveInt(env.ANALYSIS_TIMEOUT_MS, 120_000),
      maxBatchSize: positiveInt(env.ANALYSIS_MAX_BATCH_SIZE, 100),
      keywordFallback: parseBool(env.ANALYSIS_KEYWORD_FALLBACK, false),
    },

    logLevel: parseLogLevel(env.LOG_LEVEL),
    nodeEnv: env.NODE_ENV || "development",
  };
}

/**
 * True when every Azure OpenAI setting needed for a call is present
 */
export function isAzureOpenAIConfigured(cfg: ServiceConfig): boolean {
  const { endpoint, subscriptionKey, deploymentId } = cfg.azureOpenAI;
  return !!(endpoint && subscriptionKey && deploymentId);
}

export const config: Readonly<ServiceConfig> = freezeConfig(loadConfig(process.env));

// ============================================================================
// HELPERS
// ============================================================================

function freezeConfig(cfg: ServiceConfig): Readonly<ServiceConfig> {
  Object.freeze(cfg.azureOpenAI);
  Object.freeze(cfg.analysis);
  Object.freeze(cfg.allowedOrigins);
  return Object.freeze(cfg);
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? "", 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegativeInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? "", 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return fallback;
  const items = raw.split(",").map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = (raw || "").trim().toLowerCase();
  return LOG_LEVELS.find(l => l === level) ?? "info";
}
