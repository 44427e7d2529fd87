import { describe, it, expect } from "vitest";
import { errAsync, okAsync } from "neverthrow";
import { ReliabilityMonitor, type SaveVerifier } from "./monitor";
import { SerialQueue } from "./serial-queue";
import { backoffDelayMs } from "./retry";
import { Errors } from "../core/errors";
import { createLogger } from "../core/logger";
import type { Exchange, SyncIssue } from "../store/store";
import { ScriptedCaptureAdapter } from "../testing/scripted-capture";

const logger = createLogger("silent");

const options = {
  operationTimeoutMs: 50,
  captureTimeoutMs: 20,
  captureRetries: 2,
  captureBackoffMs: 1,
};

function exchange(exchangeId: string): Exchange {
  return {
    exchangeId,
    sessionId: "sess-1",
    projectName: "demo",
    responseText: "text",
    userNote: "",
    captureMethod: "manual",
    recordingEnabled: true,
    createdAt: new Date(0),
    linkedIds: [],
    linkState: "linked",
  };
}

function verifier(last: Exchange | null, issues: SyncIssue[] = []): SaveVerifier {
  return {
    getLastExchange: async () => last,
    verifySync: async () => issues,
  };
}

describe("ReliabilityMonitor", () => {
  const monitor = new ReliabilityMonitor(options, logger);

  describe("run", () => {
    it("passes through ok and err results", async () => {
      const ok = await monitor.run("status", () => okAsync(42));
      const failed = await monitor.run("replay", () =>
        errAsync(Errors.notFound("No exchanges recorded yet.")),
      );

      expect(ok._unsafeUnwrap()).toBe(42);
      expect(failed._unsafeUnwrapErr().type).toBe("not_found");
    });

    it("turns a hang into a timeout error and aborts the task signal", async () => {
      let aborted = false;
      const result = await monitor.run("save_this", (signal) => {
        signal.addEventListener("abort", () => {
          aborted = true;
        });
        return new Promise<never>(() => undefined);
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "timeout",
        message: "save_this timed out after 50ms",
        timeoutMs: 50,
      });
      expect(aborted).toBe(true);
    });

    it("reports thrown exceptions as internal errors", async () => {
      const result = await monitor.run("status", async () => {
        throw new Error("boom");
      });
      expect(result._unsafeUnwrapErr()).toEqual({ type: "internal", message: "boom" });
    });
  });

  describe("capture", () => {
    it("retries until the adapter produces text", async () => {
      const adapter = new ScriptedCaptureAdapter([new Error("clipboard busy"), "", "the answer"]);
      const result = await monitor.capture(adapter);

      expect(result._unsafeUnwrap()).toBe("the answer");
      expect(adapter.calls).toBe(3);
    });

    it("gives up after the retry bound with a timeout reason", async () => {
      const adapter = new ScriptedCaptureAdapter(["hang"]);
      const result = await monitor.capture(adapter);

      expect(adapter.calls).toBe(3);
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "capture_failed",
        reason: "timeout",
        attempts: 3,
        message: "scripted capture timed out after 20ms",
      });
    });

    it("never synthesizes content for blank captures", async () => {
      const adapter = new ScriptedCaptureAdapter(["  \n"]);
      const result = await monitor.capture(adapter);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "capture_failed",
        reason: "empty",
        attempts: 3,
        message: "scripted returned no text",
      });
    });

    it("never calls the adapter once the caller's signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort(new Error("operation cancelled"));
      const adapter = new ScriptedCaptureAdapter(["hang"]);

      const result = await monitor.capture(adapter, controller.signal);

      expect(adapter.calls).toBe(0);
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "capture_failed",
        reason: "adapter",
        attempts: 1,
        message: "operation cancelled",
      });
    });
  });

  describe("validateSave", () => {
    it("accepts a save that reads back and leaves the index in sync", async () => {
      const result = await monitor.validateSave(verifier(exchange("exch-a")), "sess-1", "exch-a");
      expect(result.isOk()).toBe(true);
    });

    it("rejects a save that does not read back as newest", async () => {
      const result = await monitor.validateSave(verifier(exchange("exch-b")), "sess-1", "exch-a");
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "sync_validation",
        exchangeId: "exch-a",
        written: "unverified",
        message: "newest exchange reads back as exch-b",
      });
    });

    it("rejects a save while the index has issues", async () => {
      const result = await monitor.validateSave(
        verifier(exchange("exch-a"), [
          { id: "exch-z", table: "exchanges", problem: "missing-index" },
        ]),
        "sess-1",
        "exch-a",
      );
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "sync_validation",
        message: "1 index issue(s): exch-z (missing-index)",
      });
    });
  });
});

describe("SerialQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string, delayMs: number) => async () => {
      events.push(`start ${name}`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.enqueue(task("a", 15)),
      queue.enqueue(task("b", 1)),
    ]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["start a", "end a", "start b", "end b"]);
    expect(queue.size).toBe(0);
  });

  it("keeps going after a failed task", async () => {
    const queue = new SerialQueue();
    const failed = queue.enqueue(async () => {
      throw new Error("first failed");
    });
    const next = queue.enqueue(async () => "second");

    await expect(failed).rejects.toThrow("first failed");
    await expect(next).resolves.toBe("second");
  });
});

describe("backoffDelayMs", () => {
  it("doubles per attempt", () => {
    expect([0, 1, 2].map((attempt) => backoffDelayMs(250, attempt))).toEqual([250, 500, 1000]);
  });
});
