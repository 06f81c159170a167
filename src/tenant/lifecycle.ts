// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { LifecycleState, TenantPhase, TenantRecord } from "../common/types.js";

export const PHASE_ORDER: readonly TenantPhase[] = [
  "requested",
  "runtime_starting",
  "runtime_verified",
  "cert_ready",
  "route_validated",
  "published",
  "verified"
];

export function successor(phase: TenantPhase): TenantPhase | null {
  const index = PHASE_ORDER.indexOf(phase);
  return index >= 0 && index < PHASE_ORDER.length - 1 ? PHASE_ORDER[index + 1] : null;
}

export function isTerminal(state: LifecycleState): boolean {
  return state === "verified" || state === "failed";
}

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  if (isTerminal(from)) return false;
  if (to === "failed") return true;
  return from !== "failed" && successor(from) === to;
}

export class IllegalTransition extends Error {
  constructor(readonly from: LifecycleState, readonly to: LifecycleState) {
    super(`illegal tenant transition ${from} -> ${to}`);
    this.name = "IllegalTransition";
  }
}

/**
 * Drives one tenant record through its phases. Every change is handed to
 * `persist` before the caller continues.
 */
export class TenantLifecycle {
  constructor(
    private record: TenantRecord,
    private readonly persist: (record: TenantRecord) => Promise<void>,
    private readonly now: () => number = Date.now
  ) {}

  get current(): TenantRecord {
    return this.record;
  }

  /** Phase reached so far; a failed record reports the phase it was attempting. */
  get phase(): TenantPhase {
    const state = this.record.lifecycleState;
    return state === "failed" ? this.record.failedPhase ?? "requested" : state;
  }

  async advance(to: TenantPhase, patch: Partial<TenantRecord> = {}): Promise<void> {
    if (!canTransition(this.record.lifecycleState, to)) {
      throw new IllegalTransition(this.record.lifecycleState, to);
    }
    this.record = { ...this.record, ...patch, lifecycleState: to, updatedAt: this.now() };
    await this.persist(this.record);
  }

  /** Mark failed while attempting the phase after the current one. */
  async fail(error: string, attempted?: TenantPhase): Promise<TenantPhase> {
    const from = this.record.lifecycleState;
    if (!canTransition(from, "failed")) {
      throw new IllegalTransition(from, "failed");
    }
    const failedPhase = attempted ?? (from === "failed" ? "requested" : successor(from) ?? from);
    this.record = { ...this.record, lifecycleState: "failed", failedPhase, lastError: error, updatedAt: this.now() };
    await this.persist(this.record);
    return failedPhase;
  }
}
