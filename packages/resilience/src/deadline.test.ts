import { describe, it, expect, vi, afterEach } from "vitest";
import { withDeadline } from "./deadline.js";
import { CancelledError, TransientError } from "@speech-relay/shared-types";

describe("withDeadline", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the callee's value", async () => {
    await expect(withDeadline(async () => "ok", { timeoutMs: 1000 })).resolves.toBe("ok");
  });

  it("rejects with PROVIDER_TIMEOUT and aborts the callee when the deadline passes", async () => {
    vi.useFakeTimers();
    let calleeSignal: AbortSignal | undefined;
    const pending = withDeadline(
      (signal) => {
        calleeSignal = signal;
        return new Promise<string>(() => {});
      },
      { timeoutMs: 250, provider: "vendor-a" },
    );
    const assertion = expect(pending).rejects.toMatchObject({
      code: "PROVIDER_TIMEOUT",
      provider: "vendor-a",
      message: "Provider call timed out after 250ms",
    });

    await vi.advanceTimersByTimeAsync(250);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(TransientError);
    expect(calleeSignal?.aborted).toBe(true);
  });

  it("rejects with CancelledError when the parent aborts", async () => {
    const parent = new AbortController();
    const pending = withDeadline(() => new Promise<string>(() => {}), {
      timeoutMs: 10_000,
      signal: parent.signal,
    });
    parent.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it("rejects immediately when the parent is already aborted", async () => {
    const parent = new AbortController();
    parent.abort();
    const fn = vi.fn();
    await expect(
      withDeadline(fn, { timeoutMs: 100, signal: parent.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it("passes callee errors through", async () => {
    await expect(
      withDeadline(async () => {
        throw new Error("bad");
      }, { timeoutMs: 0 }),
    ).rejects.toThrow("bad");
  });

  it("turns a synchronous throw into a rejection", async () => {
    await expect(
      withDeadline(() => {
        throw new Error("sync");
      }, { timeoutMs: 100 }),
    ).rejects.toThrow("sync");
  });
});
