import { jest } from "@jest/globals";
import { CapabilityUnavailableError, OperationTimeoutError } from "../errors.js";
import { computeBackoffDelay, withRetry, withTimeout } from "../core/helpers/async.js";
import { callCapability } from "../core/services/capabilities.js";

describe("withTimeout", () => {
  it("resolves with the operation result", async () => {
    await expect(withTimeout(async () => 42, 50, "answer")).resolves.toBe(42);
  });

  it("rejects with OperationTimeoutError when the deadline passes", async () => {
    const pending = withTimeout(() => new Promise<never>(() => undefined), 20, "Store load");
    await expect(pending).rejects.toBeInstanceOf(OperationTimeoutError);
    await expect(pending).rejects.toThrow("Store load timed out after 20ms.");
  });
});

describe("withRetry", () => {
  it("retries with exponential backoff and returns the first success", async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const onRetry = jest.fn();
    const operation = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("one"))
      .mockRejectedValueOnce(new Error("two"))
      .mockResolvedValue("ok");

    await expect(withRetry(operation, { attempts: 3, baseDelayMs: 100, sleep, onRetry })).resolves.toBe("ok");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it("rethrows the last error once attempts run out", async () => {
    const operation = jest.fn<() => Promise<string>>().mockRejectedValue(new Error("still down"));
    await expect(withRetry(operation, { attempts: 2, baseDelayMs: 1, sleep: async () => undefined })).rejects.toThrow(
      "still down"
    );
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("caps the backoff delay", () => {
    expect(computeBackoffDelay(1, 100)).toBe(100);
    expect(computeBackoffDelay(4, 100, 500)).toBe(500);
  });
});

describe("callCapability", () => {
  it("turns failures and timeouts into CapabilityUnavailableError", async () => {
    await expect(
      callCapability("judge", async () => {
        throw new Error("429");
      }, 50)
    ).rejects.toThrow('Capability "judge" unavailable: 429');
    await expect(callCapability("search", () => new Promise<never>(() => undefined), 20)).rejects.toBeInstanceOf(
      CapabilityUnavailableError
    );
  });
});
