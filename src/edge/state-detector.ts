// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { EdgeStateReport } from "../common/types.js";
import type { EdgeProxy } from "../proxy/edge-proxy.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";

export const LIVE_CONFIG = "nginx.conf";

/**
 * Classifies the edge from live state on every call. Read-only; a failing
 * runtime query surfaces as `EnvironmentUnavailable` from the runtime.
 */
export class EdgeStateDetector {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly proxy: EdgeProxy,
    private readonly edgeName: string
  ) {}

  async detect(): Promise<EdgeStateReport> {
    const info = await this.runtime.inspect(this.edgeName);
    if (!info) {
      return { state: "absent", diagnostics: [`no instance named ${this.edgeName}`] };
    }
    if (!info.running) {
      return { state: "stopped", diagnostics: [`${this.edgeName} is ${info.status}`] };
    }

    const validation = await this.proxy.validate(LIVE_CONFIG);
    if (!validation.ok) {
      return { state: "running_corrupted", reason: "config_invalid", diagnostics: validation.diagnostics };
    }

    const workers = await this.proxy.workers();
    if (!workers.running || workers.workers === 0) {
      return {
        state: "running_corrupted",
        reason: "workers_missing",
        diagnostics: [`master running: ${workers.running}, workers: ${workers.workers}`]
      };
    }

    return { state: "running_healthy", diagnostics: [] };
  }
}
