// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { mkdir, rename, writeFile } from "node:fs/promises";
import { EDGE_MOUNT, type FleetConfig, type FleetPaths } from "../common/config.js";
import { DeploymentError, PartialBuildFailure, ValidationFailed, errorMessage } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { retry, type AttemptResult, type RetryPolicy } from "../common/retry.js";
import type { EdgeStateReport } from "../common/types.js";
import { FALLBACK_DOMAIN, type CertificateManager } from "../certs/certificate-manager.js";
import { fragmentTenant, renderMainConfig } from "../routing/fragment.js";
import type { RouteStore } from "../routing/route-store.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";
import type { EdgeStateDetector } from "./state-detector.js";

const log = createLogger("edge-builder");

export type RepairAction = "none" | "bootstrap" | "start" | "restart";

export interface RepairOutcome {
  action: RepairAction;
  before: EdgeStateReport;
  after: EdgeStateReport;
  prunedRoutes: string[];
}

/** The one repair transition out of each edge state. */
export function repairFor(report: EdgeStateReport): RepairAction | "refuse" {
  switch (report.state) {
    case "running_healthy":
      return "none";
    case "absent":
      return "bootstrap";
    case "stopped":
      return "start";
    case "running_corrupted":
      return report.reason === "workers_missing" ? "restart" : "refuse";
  }
}

export class EdgeInfrastructureBuilder {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly detector: EdgeStateDetector,
    private readonly certs: CertificateManager,
    private readonly routes: RouteStore,
    private readonly config: FleetConfig,
    private readonly paths: FleetPaths,
    private readonly readiness: RetryPolicy
  ) {}

  mainConfigText(routesGlob: string): string {
    const fallback = this.certs.tlsRef(FALLBACK_DOMAIN);
    return renderMainConfig({
      routesGlob,
      fallbackCertPath: fallback.certPath,
      fallbackKeyPath: fallback.keyPath
    });
  }

  async writeMainConfig(): Promise<void> {
    await mkdir(this.paths.root, { recursive: true });
    const temp = `${this.paths.mainConfig}.${process.pid}.tmp`;
    await writeFile(temp, this.mainConfigText(this.routes.liveGlob()), "utf8");
    await rename(temp, this.paths.mainConfig);
  }

  /**
   * Bring the edge to `running_healthy` from whatever `before` says, or throw.
   * Bootstrap is not idempotent, so nothing here is retried on failure.
   */
  async ensure(before: EdgeStateReport): Promise<RepairOutcome> {
    const action = repairFor(before);
    if (action === "none") {
      return { action, before, after: before, prunedRoutes: [] };
    }
    if (action === "refuse") {
      throw new ValidationFailed("edge is running with an invalid configuration; refusing to publish", before.diagnostics);
    }

    log.info("repairing edge", { from: before.state, action });
    let prunedRoutes: string[] = [];
    try {
      switch (action) {
        case "bootstrap":
          prunedRoutes = await this.bootstrap();
          break;
        case "start":
          prunedRoutes = await this.startOrRebuild();
          break;
        case "restart":
          await this.runtime.stop(this.config.edge.name);
          await this.runtime.start(this.config.edge.name);
          break;
      }
    } catch (err) {
      if (err instanceof DeploymentError && err.code === "environment_unavailable") throw err;
      throw new PartialBuildFailure(`edge ${action} failed`, [errorMessage(err)]);
    }

    const after = await this.awaitHealthy();
    log.info("edge repaired", { action, state: after.state });
    return { action, before, after, prunedRoutes };
  }

  private async startOrRebuild(): Promise<string[]> {
    try {
      await this.runtime.start(this.config.edge.name);
      return [];
    } catch (err) {
      log.warn("edge failed to start; recreating", { error: errorMessage(err) });
      await this.runtime.remove(this.config.edge.name);
      return this.bootstrap();
    }
  }

  /** Shared network, fallback TLS, main config, then the edge itself. */
  private async bootstrap(): Promise<string[]> {
    const { edge } = this.config;
    await this.routes.ensure();

    if (!(await this.runtime.networkExists(edge.network))) {
      await this.runtime.createNetwork(edge.network, { labels: { "edgefleet.role": "edge" } });
    }

    await this.certs.acquire(FALLBACK_DOMAIN);
    await this.writeMainConfig();
    const pruned = await this.pruneDeadRoutes();

    await this.runtime.create({
      name: edge.name,
      image: edge.image,
      network: edge.network,
      ports: [
        { host: edge.httpPort, container: 80 },
        { host: edge.httpsPort, container: 443 }
      ],
      volumes: [{ hostPath: this.paths.root, containerPath: EDGE_MOUNT, readOnly: true }],
      labels: { "edgefleet.role": "edge" },
      command: ["nginx", "-c", `${EDGE_MOUNT}/nginx.conf`, "-g", "daemon off;"]
    });
    return pruned;
  }

  /** A fragment whose tenant instance is not running would stop the edge from starting. */
  private async pruneDeadRoutes(): Promise<string[]> {
    const pruned: string[] = [];
    for (const domain of await this.routes.domains()) {
      const text = await this.routes.read(domain);
      const tenant = text ? fragmentTenant(text) : null;
      const info = tenant ? await this.runtime.inspect(tenant) : null;
      if (!info?.running) {
        await this.routes.retire(domain, "stale");
        pruned.push(domain);
      }
    }
    if (pruned.length > 0) log.warn("pruned routes to dead tenants", { domains: pruned });
    return pruned;
  }

  private async awaitHealthy(): Promise<EdgeStateReport> {
    const seen: EdgeStateReport[] = [];
    const outcome = await retry(this.readiness, async (): Promise<AttemptResult<EdgeStateReport>> => {
      const report = await this.detector.detect();
      seen.push(report);
      return report.state === "running_healthy" ? { ok: true, value: report } : { ok: false, reason: report.state };
    });
    if (outcome.ok) return outcome.value;
    const last = seen[seen.length - 1];
    throw new PartialBuildFailure("edge did not become healthy", [
      `last state: ${last?.state ?? "unknown"}`,
      ...(last?.diagnostics ?? [])
    ]);
  }
}
