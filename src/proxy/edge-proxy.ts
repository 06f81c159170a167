// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { EDGE_MOUNT } from "../common/config.js";
import type { CommandResult } from "../common/types.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";

export interface ValidationReport {
  ok: boolean;
  diagnostics: string[];
}

export interface WorkerReport {
  running: boolean;
  workers: number;
}

/**
 * The reverse proxy living inside the edge instance. Paths are relative to
 * the fleet root, which the edge mounts read-only.
 */
export interface EdgeProxy {
  validate(configPath: string): Promise<ValidationReport>;
  reload(): Promise<CommandResult>;
  workers(): Promise<WorkerReport>;
}

function diagnosticsOf(result: CommandResult): string[] {
  return `${result.stderr}\n${result.stdout}`
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** nginx driven through `exec` into the edge container. */
export class NginxEdgeProxy implements EdgeProxy {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly instance: string
  ) {}

  async validate(configPath: string): Promise<ValidationReport> {
    const result = await this.runtime.exec(this.instance, ["nginx", "-t", "-c", `${EDGE_MOUNT}/${configPath}`]);
    return { ok: result.exitCode === 0, diagnostics: diagnosticsOf(result) };
  }

  reload(): Promise<CommandResult> {
    return this.runtime.exec(this.instance, ["nginx", "-c", `${EDGE_MOUNT}/nginx.conf`, "-s", "reload"]);
  }

  async workers(): Promise<WorkerReport> {
    const result = await this.runtime.exec(this.instance, ["ps", "-o", "args"]);
    if (result.exitCode !== 0) return { running: false, workers: 0 };
    const lines = result.stdout.split("\n");
    const master = lines.some((line) => line.includes("nginx: master process"));
    const workers = lines.filter((line) => line.includes("nginx: worker process")).length;
    return { running: master, workers };
  }
}
