// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { setTimeout as sleep } from "node:timers/promises";

export interface RetryPolicy {
  maxAttempts: number;
  intervalMs: number;
  backoff: "fixed" | "exponential";
  maxIntervalMs?: number;
}

export type AttemptResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; reasons: string[] };

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (attempt: number, reason: string, delayMs: number) => void;
}

const DEFAULT_MAX_INTERVAL_MS = 30_000;

export function fixedRetry(maxAttempts: number, intervalMs: number): RetryPolicy {
  return { maxAttempts, intervalMs, backoff: "fixed" };
}

export function exponentialRetry(maxAttempts: number, baseMs: number, maxIntervalMs = DEFAULT_MAX_INTERVAL_MS): RetryPolicy {
  return { maxAttempts, intervalMs: baseMs, backoff: "exponential", maxIntervalMs };
}

/** Delay after the given zero-based attempt. */
export function delayAfter(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === "fixed") return policy.intervalMs;
  const raw = policy.intervalMs * Math.pow(2, attempt);
  return Math.min(raw, policy.maxIntervalMs ?? DEFAULT_MAX_INTERVAL_MS);
}

/**
 * Runs `attempt` until it reports success or the policy is exhausted.
 * A thrown error is fatal and propagates immediately; only `{ ok: false }`
 * results are retried. Aborting the signal rejects with its reason.
 */
export async function retry<T>(
  policy: RetryPolicy,
  attempt: (attemptIndex: number) => Promise<AttemptResult<T>>,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const reasons: string[] = [];
  for (let i = 0; i < policy.maxAttempts; i++) {
    options.signal?.throwIfAborted();
    const result = await attempt(i);
    if (result.ok) {
      return { ok: true, value: result.value, attempts: i + 1 };
    }
    reasons.push(result.reason);
    if (i === policy.maxAttempts - 1) break;
    const delayMs = delayAfter(policy, i);
    options.onRetry?.(i + 1, result.reason, delayMs);
    if (delayMs > 0) {
      await sleep(delayMs, undefined, { signal: options.signal });
    }
  }
  return { ok: false, attempts: reasons.length, reasons };
}
