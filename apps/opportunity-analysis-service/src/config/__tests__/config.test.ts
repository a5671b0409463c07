import { loadConfig, isAzureOpenAIConfigured } from "../index";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const cfg = loadConfig({});

    expect(cfg).toEqual({
      host: "0.0.0.0",
      port: 8000,
      allowedOrigins: ["http://localhost:5173"],
      azureOpenAI: {
        endpoint: "",
        subscriptionKey: "",
        apiVersion: "2024-02-01",
        deploymentId: "",
        requestTimeoutMs: 30000,
      },
      analysis: {
        maxConcurrency: 5,
        maxRetries: 1,
        retryBaseDelayMs: 1000,
        retryMaxDelayMs: 10000,
        timeoutMs: 120000,
        maxBatchSize: 100,
        keywordFallback: false,
      },
      logLevel: "info",
      nodeEnv: "development",
    });
  });

  it("should read every setting from the environment", () => {
    const cfg = loadConfig({
      HOST: "127.0.0.1",
      PORT: "9000",
      ALLOWED_ORIGINS: "https://crm.example.com, https://admin.example.com,",
      AZURE_OPENAI_ENDPOINT: "https://gateway.example.com/",
      AZURE_OPENAI_SUBSCRIPTION_KEY: "test-secret",
      AZURE_OPENAI_API_VERSION: "2024-06-01",
      AZURE_OPENAI_DEPLOYMENT_ID: "gpt-4o-mini",
      OPENAI_REQUEST_TIMEOUT_MS: "15000",
      ANALYSIS_MAX_CONCURRENCY: "8",
      ANALYSIS_MAX_RETRIES: "0",
      ANALYSIS_RETRY_BASE_DELAY_MS: "250",
      ANALYSIS_RETRY_MAX_DELAY_MS: "5000",
      ANALYSIS_TIMEOUT_MS: "60000",
      ANALYSIS_MAX_BATCH_SIZE: "25",
      ANALYSIS_KEYWORD_FALLBACK: "true",
      LOG_LEVEL: "DEBUG",
      NODE_ENV: "production",
    });

    expect(cfg.host).toBe("127.0.0.1");
    expect(cfg.port).toBe(9000);
    expect(cfg.allowedOrigins).toEqual(["https://crm.example.com", "https://admin.example.com"]);
    expect(cfg.azureOpenAI).toEqual({
      endpoint: "https://gateway.example.com",
      subscriptionKey: "test-secret",
      apiVersion: "2024-06-01",
      deploymentId: "gpt-4o-mini",
      requestTimeoutMs: 15000,
    });
    expect(cfg.analysis).toEqual({
      maxConcurrency: 8,
      maxRetries: 0,
      retryBaseDelayMs: 250,
      retryMaxDelayMs: 5000,
      timeoutMs: 60000,
      maxBatchSize: 25,
      keywordFallback: true,
    });
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.nodeEnv).toBe("production");
  });

  it("should fall back to defaults for invalid numbers and levels", () => {
    const cfg = loadConfig({
      PORT: "not-a-port",
      ANALYSIS_MAX_CONCURRENCY: "0",
      ANALYSIS_MAX_RETRIES: "-1",
      LOG_LEVEL: "verbose",
      ANALYSIS_KEYWORD_FALLBACK: "nope",
    });

    expect(cfg.port).toBe(8000);
    expect(cfg.analysis.maxConcurrency).toBe(5);
    expect(cfg.analysis.maxRetries).toBe(1);
    expect(cfg.logLevel).toBe("info");
    expect(cfg.analysis.keywordFallback).toBe(false);
  });

  it("should require endpoint, key and deployment for Azure OpenAI", () => {
    const complete = {
      AZURE_OPENAI_ENDPOINT: "https://gateway.example.com",
      AZURE_OPENAI_SUBSCRIPTION_KEY: "test-secret",
      AZURE_OPENAI_DEPLOYMENT_ID: "gpt-4o-mini",
    };

    expect(isAzureOpenAIConfigured(loadConfig(complete))).toBe(true);
    expect(isAzureOpenAIConfigured(loadConfig({ ...complete, AZURE_OPENAI_SUBSCRIPTION_KEY: "" }))).toBe(false);
    expect(isAzureOpenAIConfigured(loadConfig({}))).toBe(false);
  });
});
