import { describe, expect, it } from "vitest";
import { ConnectivityUnverified } from "../../src/common/errors.js";
import { fixedRetry } from "../../src/common/retry.js";
import type { NetworkAddress } from "../../src/common/types.js";
import type { ProbeResult, ReachabilityProbe } from "../../src/connectivity/probes.js";
import { ConnectivityVerifier } from "../../src/connectivity/verifier.js";

const target: NetworkAddress = { host: "172.30.0.11", port: 9090 };

class ScriptedProbe implements ReachabilityProbe {
  httpCalls = 0;
  pingCalls = 0;

  constructor(
    private readonly httpAnswers: boolean[],
    private readonly pingAnswer: boolean
  ) {}

  async http(): Promise<ProbeResult> {
    const ok = this.httpAnswers[this.httpCalls] ?? false;
    this.httpCalls++;
    return { ok, detail: ok ? "GET ok" : `GET failed ${this.httpCalls}` };
  }

  async ping(): Promise<ProbeResult> {
    this.pingCalls++;
    return { ok: this.pingAnswer, detail: this.pingAnswer ? "answers ping" : "172.30.0.11 unreachable" };
  }
}

describe("ConnectivityVerifier", () => {
  it("returns once the health path answers", async () => {
    const probe = new ScriptedProbe([false, true], false);
    const report = await new ConnectivityVerifier(probe, fixedRetry(3, 0)).verify(target, "/health");
    expect(report).toEqual({ target, method: "http", attempts: 2, degraded: false });
    expect(probe.pingCalls).toBe(0);
  });

  it("accepts a host that only answers ping as degraded", async () => {
    const probe = new ScriptedProbe([], true);
    const report = await new ConnectivityVerifier(probe, fixedRetry(3, 0)).verify(target, "/health");
    expect(report).toEqual({ target, method: "ping", attempts: 3, degraded: true });
    expect(probe.httpCalls).toBe(3);
  });

  it("fails with every probe reason when nothing answers", async () => {
    const probe = new ScriptedProbe([], false);
    const failure = await new ConnectivityVerifier(probe, fixedRetry(2, 0)).verify(target, "/health").catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(ConnectivityUnverified);
    expect(failure instanceof ConnectivityUnverified ? [failure.message, failure.details] : []).toEqual([
      "172.30.0.11:9090 not reachable from the edge after 2 attempts",
      ["GET failed 1", "GET failed 2", "172.30.0.11 unreachable"]
    ]);
  });

  it("stops probing once cancelled", async () => {
    const probe = new ScriptedProbe([], true);
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    await expect(
      new ConnectivityVerifier(probe, fixedRetry(3, 0)).verify(target, "/health", controller.signal)
    ).rejects.toThrow("cancelled");
    expect(probe.httpCalls).toBe(0);
  });
});
