// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { TenantPhase } from "./types.js";

export type DeploymentErrorCode =
  | "environment_unavailable"
  | "validation_failed"
  | "connectivity_unverified"
  | "reload_failed"
  | "partial_build_failure"
  | "runtime_failure"
  | "lock_unavailable"
  | "post_verification_failed";

export const EXIT_CODES: Record<DeploymentErrorCode, number> = {
  environment_unavailable: 2,
  validation_failed: 3,
  connectivity_unverified: 4,
  reload_failed: 5,
  partial_build_failure: 6,
  runtime_failure: 7,
  lock_unavailable: 8,
  post_verification_failed: 9
};

/**
 * Base for every failure the orchestrator surfaces. Lower components throw
 * these; only the coordinator decides abort, rollback or report.
 */
export class DeploymentError extends Error {
  readonly exitCode: number;
  readonly retryable = false;

  constructor(
    readonly code: DeploymentErrorCode,
    message: string,
    readonly details: string[] = [],
    public phase?: TenantPhase
  ) {
    super(message);
    this.name = new.target.name;
    this.exitCode = EXIT_CODES[code];
  }

  atPhase(phase: TenantPhase): this {
    this.phase ??= phase;
    return this;
  }
}

export class EnvironmentUnavailable extends DeploymentError {
  constructor(message: string, details: string[] = []) {
    super("environment_unavailable", message, details);
  }
}

export class ValidationFailed extends DeploymentError {
  constructor(message: string, details: string[] = []) {
    super("validation_failed", message, details);
  }
}

export class ConnectivityUnverified extends DeploymentError {
  constructor(message: string, details: string[] = []) {
    super("connectivity_unverified", message, details);
  }
}

export class ReloadFailed extends DeploymentError {
  constructor(message: string, details: string[] = [], readonly rolledBack = false) {
    super("reload_failed", message, details);
  }
}

export class PartialBuildFailure extends DeploymentError {
  constructor(message: string, details: string[] = []) {
    super("partial_build_failure", message, details);
  }
}

export class RuntimeFailure extends DeploymentError {
  constructor(message: string, details: string[] = []) {
    super("runtime_failure", message, details);
  }
}

export class LockUnavailable extends DeploymentError {
  constructor(message: string, details: string[] = []) {
    super("lock_unavailable", message, details);
  }
}

export class PostVerificationFailed extends DeploymentError {
  constructor(message: string, details: string[] = []) {
    super("post_verification_failed", message, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}
