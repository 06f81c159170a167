// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { ConnectivityUnverified } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { retry, type AttemptResult, type RetryPolicy } from "../common/retry.js";
import type { NetworkAddress } from "../common/types.js";
import type { ReachabilityProbe } from "./probes.js";

const log = createLogger("connectivity");

export type VerificationMethod = "http" | "ping";

export interface ConnectivityReport {
  target: NetworkAddress;
  method: VerificationMethod;
  attempts: number;
  /** Reachable host whose application did not answer yet. */
  degraded: boolean;
}

export class ConnectivityVerifier {
  constructor(
    private readonly probe: ReachabilityProbe,
    private readonly policy: RetryPolicy
  ) {}

  /**
   * Poll the health path from the edge until it answers or the policy runs
   * out, then fall back to a ping so a slow-starting application delays
   * rather than aborts. Throws `ConnectivityUnverified` if both fail.
   */
  async verify(target: NetworkAddress, healthPath: string, signal?: AbortSignal): Promise<ConnectivityReport> {
    const outcome = await retry(
      this.policy,
      async (): Promise<AttemptResult<true>> => {
        const result = await this.probe.http(target, healthPath);
        return result.ok ? { ok: true, value: true } : { ok: false, reason: result.detail };
      },
      {
        signal,
        onRetry: (attempt, reason, delayMs) =>
          log.info("waiting for tenant to become reachable", { attempt, max: this.policy.maxAttempts, reason, delayMs })
      }
    );
    if (outcome.ok) {
      return { target, method: "http", attempts: outcome.attempts, degraded: false };
    }

    signal?.throwIfAborted();
    const ping = await this.probe.ping(target);
    if (ping.ok) {
      log.warn("tenant reachable but health check never passed", { target, reasons: outcome.reasons.slice(-1) });
      return { target, method: "ping", attempts: outcome.attempts, degraded: true };
    }

    throw new ConnectivityUnverified(
      `${target.host}:${target.port} not reachable from the edge after ${outcome.attempts} attempts`,
      [...outcome.reasons, ping.detail]
    );
  }
}
