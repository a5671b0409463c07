import { withRetry, computeDelay, abortableSleep, RetryPolicy } from "../retry";
import { BatchCancelledError, GatewayError, ParseError } from "../../lib/errors";

describe("Retry policy", () => {
  const policy: RetryPolicy = { maxRetries: 1, baseDelayMs: 100, jitterRatio: 0.25 };

  const transient = () => new GatewayError("TransientError", "503 upstream", { status: 503 });

  function noopSleep() {
    return jest.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
  }

  describe("withRetry", () => {
    it("should return the first successful result without sleeping", async () => {
      const sleep = noopSleep();
      const operation = jest.fn(async () => "ok");

      await expect(withRetry(operation, policy, { sleep })).resolves.toBe("ok");
      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should retry a transient failure once with backoff plus jitter", async () => {
      const sleep = noopSleep();
      const operation = jest.fn(async (attempt: number) => {
        if (attempt === 0) throw transient();
        return "recovered";
      });

      await expect(withRetry(operation, policy, { sleep, random: () => 0.5 })).resolves.toBe("recovered");
      expect(operation).toHaveBeenCalledTimes(2);
      // 100 * 2^0 + 100 * 0.25 * 0.5 = 112.5
      expect(sleep).toHaveBeenCalledWith(113, undefined);
    });

    it("should give up after maxRetries and rethrow the last error", async () => {
      const sleep = noopSleep();
      const last = transient();
      const operation = jest
        .fn<Promise<string>, [number]>()
        .mockRejectedValueOnce(transient())
        .mockRejectedValueOnce(last);

      await expect(withRetry(operation, policy, { sleep })).rejects.toBe(last);
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it("should not retry AuthFailure", async () => {
      const operation = jest.fn(async (): Promise<string> => {
        throw new GatewayError("AuthFailure", "401", { status: 401 });
      });

      await expect(withRetry(operation, policy, { sleep: noopSleep() })).rejects.toMatchObject({
        kind: "AuthFailure",
      });
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it("should not retry non-retryable or foreign errors", async () => {
      const parseFailure = jest.fn(async (): Promise<string> => {
        throw new ParseError("payload", "x");
      });
      const foreign = jest.fn(async (): Promise<string> => {
        throw new TypeError("boom");
      });

      await expect(withRetry(parseFailure, policy, { sleep: noopSleep() })).rejects.toBeInstanceOf(ParseError);
      await expect(withRetry(foreign, policy, { sleep: noopSleep() })).rejects.toBeInstanceOf(TypeError);
      expect(parseFailure).toHaveBeenCalledTimes(1);
      expect(foreign).toHaveBeenCalledTimes(1);
    });

    it("should honour the server's retry-after when it is longer than the backoff", async () => {
      const sleep = noopSleep();
      const operation = jest
        .fn<Promise<string>, [number]>()
        .mockRejectedValueOnce(new GatewayError("RateLimited", "429", { status: 429, retryAfterMs: 5000 }))
        .mockResolvedValueOnce("ok");

      await expect(withRetry(operation, policy, { sleep, random: () => 0 })).resolves.toBe("ok");
      expect(sleep).toHaveBeenCalledWith(5000, undefined);
    });

    it("should back off exponentially across several retries", async () => {
      const sleep = noopSleep();
      const operation = jest.fn(async (): Promise<string> => {
        throw transient();
      });

      await expect(
        withRetry(operation, { maxRetries: 3, baseDelayMs: 100 }, { sleep, random: () => 0.9 })
      ).rejects.toBeInstanceOf(GatewayError);

      expect(operation).toHaveBeenCalledTimes(4);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);
    });

    it("should fail at once when the server asks to wait longer than maxDelayMs", async () => {
      const sleep = noopSleep();
      const limited = new GatewayError("RateLimited", "429", { status: 429, retryAfterMs: 60_000 });
      const operation = jest.fn(async (): Promise<string> => {
        throw limited;
      });

      await expect(withRetry(operation, { ...policy, maxDelayMs: 10_000 }, { sleep })).rejects.toBe(limited);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should still honour a retry-after within maxDelayMs", async () => {
      const sleep = noopSleep();
      const operation = jest
        .fn<Promise<string>, [number]>()
        .mockRejectedValueOnce(new GatewayError("RateLimited", "429", { status: 429, retryAfterMs: 4000 }))
        .mockResolvedValueOnce("ok");

      await expect(
        withRetry(operation, { ...policy, maxDelayMs: 10_000 }, { sleep, random: () => 0 })
      ).resolves.toBe("ok");
      expect(sleep).toHaveBeenCalledWith(4000, undefined);
    });

    it("should report each retry", async () => {
      const onRetry = jest.fn();
      const operation = jest
        .fn<Promise<string>, [number]>()
        .mockRejectedValueOnce(transient())
        .mockResolvedValueOnce("ok");

      await withRetry(operation, policy, { sleep: noopSleep(), random: () => 0, onRetry });

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(expect.any(GatewayError), 1, 100);
    });

    it("should not start when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = jest.fn(async () => "never");

      await expect(withRetry(operation, policy, { signal: controller.signal })).rejects.toBeInstanceOf(
        BatchCancelledError
      );
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe("computeDelay", () => {
    it("should ignore retry-after on non-gateway errors", () => {
      expect(computeDelay(new ParseError("payload", ""), 1, { maxRetries: 1, baseDelayMs: 50 })).toBe(100);
    });

    it("should keep the backoff when retry-after is shorter", () => {
      const error = new GatewayError("RateLimited", "429", { retryAfterMs: 10 });

      expect(computeDelay(error, 0, { maxRetries: 1, baseDelayMs: 250 }, () => 0)).toBe(250);
    });
  });

  describe("computeDelay cap", () => {
    it("should cap exponential backoff at maxDelayMs", () => {
      expect(computeDelay(transient(), 5, { maxRetries: 6, baseDelayMs: 1000, maxDelayMs: 3000 }, () => 0)).toBe(3000);
    });
  });

  describe("abortableSleep", () => {
    it("should resolve after the delay", async () => {
      await expect(abortableSleep(1)).resolves.toBeUndefined();
    });

    it("should reject when aborted mid-sleep", async () => {
      const controller = new AbortController();
      const pending = abortableSleep(10_000, controller.signal);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(BatchCancelledError);
    });
  });
});
