import OpenAI, {
  AzureOpenAI,
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
} from "openai";
import { ServiceConfig } from "../config";
import { BatchCancelledError, GatewayError } from "../lib/errors";
import { ChatMessage } from "./prompt";

export interface ClassifyOptions {
  signal?: AbortSignal;
}

/**
 * Boundary to the external classification model
 */
export interface ModelGateway {
  /** Raw text of the model's answer ("" when it returned no content) */
  classify(messages: ChatMessage[], options?: ClassifyOptions): Promise<string>;
}

export type CompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

export type CreateCompletion = (
  body: CompletionRequest,
  options: ClassifyOptions
) => Promise<OpenAI.Chat.ChatCompletion>;

export const COMPLETION_PARAMS = {
  max_tokens: 300,
  temperature: 0.1,
  top_p: 0.9,
} as const;

/**
 * Azure OpenAI chat-completions gateway.
 * SDK retries are disabled; retrying is the orchestrator's decision.
 */
export class AzureOpenAIGateway implements ModelGateway {
  constructor(
    private readonly createCompletion: CreateCompletion,
    private readonly deploymentId: string
  ) {}

  async classify(messages: ChatMessage[], options: ClassifyOptions = {}): Promise<string> {
    try {
      const completion = await this.createCompletion(
        {
          model: this.deploymentId,
          messages,
          ...COMPLETION_PARAMS,
        },
        { signal: options.signal }
      );
      return completion.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw toGatewayError(error, options.signal);
    }
  }
}

/**
 * Build the gateway from config. One client per process, so connections are reused.
 */
export function createAzureOpenAIGateway(cfg: ServiceConfig["azureOpenAI"]): AzureOpenAIGateway {
  const client = new AzureOpenAI({
    endpoint: cfg.endpoint,
    apiKey: cfg.subscriptionKey,
    apiVersion: cfg.apiVersion,
    deployment: cfg.deploymentId,
    timeout: cfg.requestTimeoutMs,
    maxRetries: 0,
    // APIM front door authenticates on its own subscription header
    defaultHeaders: { "Ocp-Apim-Subscription-Key": cfg.subscriptionKey },
  });

  return new AzureOpenAIGateway(
    (body, options) => client.chat.completions.create(body, { signal: options.signal }),
    cfg.deploymentId
  );
}

/**
 * Stands in when endpoint, key or deployment is missing: every call is an AuthFailure
 */
export class UnconfiguredGateway implements ModelGateway {
  async classify(): Promise<string> {
    throw new GatewayError(
      "AuthFailure",
      "Azure OpenAI is not configured (AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_SUBSCRIPTION_KEY, AZURE_OPENAI_DEPLOYMENT_ID)"
    );
  }
}

// ============================================================================
// ERROR MAPPING
// ============================================================================

/**
 * Translate SDK failures into the gateway error taxonomy.
 * Errors that did not come from the SDK pass through unchanged.
 */
export function toGatewayError(error: unknown, signal?: AbortSignal): unknown {
  if (error instanceof GatewayError || error instanceof BatchCancelledError) {
    return error;
  }

  if (error instanceof APIUserAbortError || signal?.aborted) {
    return new BatchCancelledError("Model request aborted");
  }

  if (error instanceof APIConnectionTimeoutError) {
    return new GatewayError("Timeout", "Model request timed out", { cause: error });
  }

  if (error instanceof APIConnectionError) {
    return new GatewayError("TransientError", `Connection to model service failed: ${error.message}`, {
      cause: error,
    });
  }

  if (error instanceof APIError) {
    const status = error.status ?? null;
    const message = `Model service responded ${status ?? "without status"}: ${truncate(error.message, 200)}`;

    if (status === 401 || status === 403 || status === 404) {
      return new GatewayError("AuthFailure", message, { status, cause: error });
    }
    if (status === 429) {
      return new GatewayError("RateLimited", message, {
        status,
        retryAfterMs: parseRetryAfter(error.headers),
        cause: error,
      });
    }
    if (status === null || status === 408 || status === 409 || status >= 500) {
      return new GatewayError("TransientError", message, { status, cause: error });
    }
    return new GatewayError("Rejected", message, { status, cause: error });
  }

  return error;
}

type ResponseHeaders = Record<string, string | null | undefined> | undefined;

export function parseRetryAfter(headers: ResponseHeaders, now: number = Date.now()): number | null {
  if (!headers) return null;

  const ms = Number(headers["retry-after-ms"]);
  if (headers["retry-after-ms"] && Number.isFinite(ms) && ms >= 0) {
    return Math.round(ms);
  }

  const retryAfter = headers["retry-after"];
  if (!retryAfter) return null;

  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(retryAfter);
  if (Number.isFinite(date)) {
    return Math.max(0, date - now);
  }
  return null;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
