// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import type { FleetConfig } from "../common/config.js";
import {
  DeploymentError,
  PostVerificationFailed,
  ReloadFailed,
  ValidationFailed,
  errorMessage,
  type DeploymentErrorCode
} from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import type {
  DeploymentAttempt,
  EdgeStateReport,
  NetworkAddress,
  TenantEnvironment,
  TenantPhase,
  TenantRecord
} from "../common/types.js";
import type { CertificateManager, CertProblem, RotationResult } from "../certs/certificate-manager.js";
import type { ConnectivityReport, ConnectivityVerifier } from "../connectivity/verifier.js";
import type { EdgeInfrastructureBuilder, RepairOutcome } from "../edge/infrastructure-builder.js";
import type { EdgeStateDetector } from "../edge/state-detector.js";
import type { FleetLock } from "../routing/fleet-lock.js";
import { domainSchema, fragmentTarget, fragmentTenant, tenantNameSchema } from "../routing/fragment.js";
import type { ReloadCheck, RoutePublisher } from "../routing/publisher.js";
import type { RouteStore } from "../routing/route-store.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";
import { privateNetworkFor, type TenantDeployer } from "../tenant/deployer.js";
import { TenantLifecycle } from "../tenant/lifecycle.js";
import type { HostsEntry, LocalHostsFile } from "../tenant/local-hosts.js";
import type { TenantRegistry } from "../tenant/registry.js";

const log = createLogger("coordinator");

export const deployRequestSchema = z.object({
  name: tenantNameSchema,
  domain: domainSchema,
  port: z.number().int().min(1).max(65535),
  environment: z.enum(["development", "production"]).default("production"),
  aliases: z.array(domainSchema).default([])
});

export type DeployRequest = z.input<typeof deployRequestSchema>;

export interface FailureSummary {
  code: DeploymentErrorCode;
  message: string;
  details: string[];
  exitCode: number;
}

export interface DeploymentResult {
  ok: boolean;
  tenant: TenantRecord;
  /** Last phase reached, or the phase being attempted when it failed. */
  phase: TenantPhase;
  edge: RepairOutcome;
  attempt: DeploymentAttempt;
  connectivity?: ConnectivityReport;
  error?: FailureSummary;
}

export interface RemovalResult {
  name: string;
  domain: string;
  routeRemoved: boolean;
  reloaded: boolean;
}

export interface RotationSummary {
  domain: string;
  ok: boolean;
  release?: string;
  resumed?: boolean;
  notAfter?: string;
  error?: FailureSummary;
}

export interface FleetStatus {
  edge: EdgeStateReport;
  tenants: Array<{
    name: string;
    domain: string;
    state: TenantRecord["lifecycleState"];
    failedPhase?: TenantPhase;
    target?: NetworkAddress;
    lastError?: string;
  }>;
  routes: Array<{ domain: string; file: string; tenant: string | null; target: string | null }>;
  certificates: Array<{ domain: string; notAfter: string | null; ok: boolean; problems: CertProblem[] }>;
  localResolution: HostsEntry[];
}

export interface CoordinatorDeps {
  config: FleetConfig;
  runtime: ContainerRuntime;
  detector: EdgeStateDetector;
  builder: EdgeInfrastructureBuilder;
  deployer: TenantDeployer;
  verifier: ConnectivityVerifier;
  certs: CertificateManager;
  routes: RouteStore;
  publisher: RoutePublisher;
  registry: TenantRegistry;
  lock: FleetLock;
  hosts: LocalHostsFile;
  now?: () => number;
}

export function summarize(err: DeploymentError): FailureSummary {
  return { code: err.code, message: err.message, details: err.details, exitCode: err.exitCode };
}

/**
 * Runs every fleet operation end to end. Components below this only throw
 * typed errors; deciding between abort, compensation and rollback, and
 * recording the phase reached, happens here.
 */
export class IntegrationCoordinator {
  private readonly now: () => number;

  constructor(private readonly deps: CoordinatorDeps) {
    this.now = deps.now ?? Date.now;
  }

  private parseRequest(request: DeployRequest) {
    const parsed = deployRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationFailed(
        "invalid deployment request",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  private async assertAvailable(name: string, domain: string): Promise<void> {
    const { registry, routes, config } = this.deps;
    const reserved = [config.edge.name, config.edge.network];
    if (reserved.includes(name) || reserved.includes(privateNetworkFor(name))) {
      throw new ValidationFailed(`tenant name ${name} collides with the edge's runtime names`, [
        `edge instance: ${config.edge.name}`,
        `edge network: ${config.edge.network}`
      ]);
    }
    const existing = await registry.get(name);
    if (existing && existing.lifecycleState !== "failed") {
      throw new ValidationFailed(`tenant ${name} already exists (${existing.lifecycleState}); remove it first`);
    }
    const owner = await registry.findByDomain(domain);
    if (owner && owner.name !== name && owner.lifecycleState !== "failed") {
      throw new ValidationFailed(`domain ${domain} already belongs to tenant ${owner.name}`);
    }
    const live = await routes.read(domain);
    if (live !== null) {
      const liveOwner = fragmentTenant(live);
      throw new ValidationFailed(`domain ${domain} is already routed`, [`tenant: ${liveOwner ?? "unknown"}`]);
    }
  }

  /**
   * Bring one tenant online. Input, lock and edge problems throw; anything
   * that goes wrong once the tenant record exists comes back as a failed
   * result with the instance torn down and the live routes untouched.
   */
  async deploy(request: DeployRequest, signal?: AbortSignal): Promise<DeploymentResult> {
    const input = this.parseRequest(request);
    const { runtime, lock, detector, builder, registry } = this.deps;
    await runtime.ping();

    return lock.withLock(`deploy ${input.name}`, async () => {
      await this.assertAvailable(input.name, input.domain);
      const edge = await builder.ensure(await detector.detect());
      await this.failPruned(edge.prunedRoutes);

      const createdAt = this.now();
      const lifecycle = new TenantLifecycle(
        {
          name: input.name,
          domain: input.domain,
          listenPort: input.port,
          networkName: privateNetworkFor(input.name),
          runtimeHandle: input.name,
          environment: input.environment,
          lifecycleState: "requested",
          createdAt,
          updatedAt: createdAt
        },
        (record) => registry.put(record),
        this.now
      );
      await registry.put(lifecycle.current);
      log.info("deploying tenant", { tenant: input.name, domain: input.domain, edge: edge.action });

      return this.runPipeline(lifecycle, input.aliases, input.environment, edge, signal);
    });
  }

  /** Tenants whose routes the edge repair retired no longer serve; record that. */
  private async failPruned(domains: string[]): Promise<void> {
    const { registry, hosts } = this.deps;
    for (const domain of domains) {
      const record = await registry.findByDomain(domain);
      if (!record || record.lifecycleState === "failed") continue;
      await registry.put({
        ...record,
        lifecycleState: "failed",
        failedPhase: "published",
        lastError: "route pruned: instance not running",
        updatedAt: this.now()
      });
      await hosts.remove(record.name);
      log.warn("tenant route pruned during edge repair", { tenant: record.name, domain });
    }
  }

  private async runPipeline(
    lifecycle: TenantLifecycle,
    aliases: string[],
    environment: TenantEnvironment,
    edge: RepairOutcome,
    signal: AbortSignal | undefined
  ): Promise<DeploymentResult> {
    const { config, deployer, verifier, certs, publisher, hosts } = this.deps;
    const tenant = lifecycle.current;
    let connectivity: ConnectivityReport | undefined;
    let instanceStarted = false;
    let published = false;

    const attemptOf = (error?: string): DeploymentAttempt => ({
      tenant: tenant.name,
      phase: lifecycle.phase,
      retryCount: connectivity ? connectivity.attempts - 1 : 0,
      lastError: error
    });

    try {
      await lifecycle.advance("runtime_starting");
      instanceStarted = true;
      let target: NetworkAddress;
      try {
        target = await deployer.deploy(tenant, signal);
      } catch (err) {
        throw err instanceof DeploymentError ? err.atPhase("runtime_starting") : err;
      }

      connectivity = await verifier.verify(target, config.healthPath, signal);
      await lifecycle.advance("runtime_verified", { target });

      await certs.acquire(tenant.domain);
      await lifecycle.advance("cert_ready");

      const outcome = await publisher.publish(
        {
          tenant: tenant.name,
          domain: tenant.domain,
          aliases,
          target,
          tls: certs.tlsRef(tenant.domain),
          healthPath: config.healthPath
        },
        { signal, onValidated: () => lifecycle.advance("route_validated") }
      );
      published = true;
      await lifecycle.advance("published");

      if (!outcome.serving) {
        const failure = new PostVerificationFailed(
          `${tenant.domain} published but not serving through the edge`,
          outcome.diagnostics
        ).atPhase("published");
        await lifecycle.fail(failure.message, "published");
        return {
          ok: false,
          tenant: lifecycle.current,
          phase: lifecycle.phase,
          edge,
          attempt: attemptOf(failure.message),
          connectivity,
          error: summarize(failure)
        };
      }

      if (environment === "development") {
        await hosts.add({
          tenant: tenant.name,
          address: config.edge.publicHost,
          names: [...new Set([tenant.domain, `www.${tenant.domain}`, ...aliases])]
        });
      }
      await lifecycle.advance("verified");
      log.info("tenant verified", { tenant: tenant.name, domain: tenant.domain, environment, degraded: connectivity.degraded });
      return { ok: true, tenant: lifecycle.current, phase: lifecycle.phase, edge, attempt: attemptOf(), connectivity };
    } catch (err) {
      const failure = await this.compensate(lifecycle, err, { instanceStarted, published });
      if (!(err instanceof DeploymentError)) throw err;
      return {
        ok: false,
        tenant: lifecycle.current,
        phase: lifecycle.phase,
        edge,
        attempt: attemptOf(err.message),
        connectivity,
        error: { ...summarize(err), details: [...err.details, ...failure] }
      };
    }
  }

  /** Tear the tenant down and record the failure; returns notes from the cleanup. */
  private async compensate(
    lifecycle: TenantLifecycle,
    err: unknown,
    progress: { instanceStarted: boolean; published: boolean }
  ): Promise<string[]> {
    const notes: string[] = [];
    const tenant = lifecycle.current;
    const attempted = err instanceof DeploymentError ? err.phase : undefined;

    if (progress.published) {
      notes.push("route left published; remove the tenant to withdraw it");
    } else if (progress.instanceStarted) {
      try {
        await this.deps.deployer.teardown(tenant);
      } catch (cleanup) {
        log.error("tenant teardown failed", { tenant: tenant.name, error: errorMessage(cleanup) });
        notes.push(`teardown failed: ${errorMessage(cleanup)}`);
      }
    }

    const failedPhase = await lifecycle.fail(errorMessage(err), attempted);
    if (err instanceof DeploymentError) err.atPhase(failedPhase);
    log.error("tenant deployment failed", { tenant: tenant.name, phase: failedPhase, error: errorMessage(err) });
    return notes;
  }

  /** Withdraw a tenant's route, then its instance and record. */
  async remove(name: string): Promise<RemovalResult> {
    const { lock, registry, detector, publisher, routes, deployer, hosts } = this.deps;
    return lock.withLock(`remove ${name}`, async () => {
      const record = await registry.get(name);
      if (!record) throw new ValidationFailed(`unknown tenant ${name}`);

      const live = await routes.read(record.domain);
      const owned = live !== null && fragmentTenant(live) === name;
      let routeRemoved = false;
      let reloaded = false;
      if (owned) {
        const edge = await detector.detect();
        if (edge.state === "running_healthy") {
          routeRemoved = await publisher.unpublish(record.domain);
          reloaded = routeRemoved;
        } else {
          log.warn("edge not healthy; withdrawing route without reload", { domain: record.domain, state: edge.state });
          routeRemoved = await routes.retire(record.domain, "removed");
        }
      }

      await deployer.teardown(record);
      await hosts.remove(name);
      await registry.delete(name);
      log.info("tenant removed", { tenant: name, domain: record.domain, routeRemoved });
      return { name, domain: record.domain, routeRemoved, reloaded };
    });
  }

  private async knownCertDomains(): Promise<string[]> {
    const domains = new Set(await this.deps.certs.domains());
    for (const tenant of await this.deps.registry.list()) domains.add(tenant.domain);
    return [...domains].sort();
  }

  /**
   * Rotate one domain's material and reload the edge so it is served. A
   * reload that fails puts the previous release back before reporting.
   */
  private async rotateLocked(domain: string): Promise<RotationResult> {
    const { certs, detector, publisher } = this.deps;
    const rotation = await certs.rotate(domain);
    const edge = await detector.detect();
    if (edge.state !== "running_healthy") {
      log.warn("edge not running; new certificate takes effect on next start", { domain, state: edge.state });
      return rotation;
    }

    const reload = async (): Promise<ReloadCheck> => {
      try {
        return await publisher.signalReload();
      } catch (err) {
        return { ok: false, diagnostics: [errorMessage(err)] };
      }
    };
    const check = await reload();
    if (check.ok) return rotation;

    await certs.revert(domain, rotation);
    const again = await reload();
    throw new ReloadFailed(`edge reload failed after rotating ${domain}`, [...check.diagnostics, ...again.diagnostics], again.ok);
  }

  async rotateCert(domain: string): Promise<RotationResult> {
    const parsed = domainSchema.safeParse(domain);
    if (!parsed.success) throw new ValidationFailed(`invalid domain ${domain}`);
    return this.deps.lock.withLock(`rotate-cert ${domain}`, async () => {
      if (!(await this.knownCertDomains()).includes(domain)) {
        throw new ValidationFailed(`no certificate or tenant for ${domain}`);
      }
      return this.rotateLocked(domain);
    });
  }

  /** Rotate every domain `scanExpiring` reports, continuing past failures. */
  async rotateDue(): Promise<RotationSummary[]> {
    return this.deps.lock.withLock("rotate-cert --all", async () => {
      const results: RotationSummary[] = [];
      for (const check of await this.deps.certs.scanExpiring()) {
        try {
          const rotation = await this.rotateLocked(check.domain);
          results.push({
            domain: check.domain,
            ok: true,
            release: rotation.release,
            resumed: rotation.resumed,
            notAfter: rotation.certificate.notAfter.toISOString()
          });
        } catch (err) {
          if (!(err instanceof DeploymentError)) throw err;
          results.push({ domain: check.domain, ok: false, error: summarize(err) });
        }
      }
      return results;
    });
  }

  /** Read-only view of the fleet; takes no lock. */
  async status(): Promise<FleetStatus> {
    const { runtime, detector, registry, routes, certs, hosts } = this.deps;
    await runtime.ping();
    const edge = await detector.detect();

    const tenants = (await registry.list()).map((record) => ({
      name: record.name,
      domain: record.domain,
      state: record.lifecycleState,
      failedPhase: record.failedPhase,
      target: record.target,
      lastError: record.lastError
    }));

    const routeList: FleetStatus["routes"] = [];
    for (const file of await routes.listFiles()) {
      const domain = file.slice(0, -".conf".length);
      const text = (await routes.read(domain)) ?? "";
      routeList.push({ domain, file, tenant: fragmentTenant(text), target: fragmentTarget(text) });
    }

    const certificates: FleetStatus["certificates"] = [];
    for (const domain of await certs.domains()) {
      const check = await certs.validate(domain);
      certificates.push({
        domain,
        notAfter: check.certificate ? check.certificate.notAfter.toISOString() : null,
        ok: check.ok,
        problems: check.problems
      });
    }

    return { edge, tenants, routes: routeList, certificates, localResolution: await hosts.list() };
  }
}
