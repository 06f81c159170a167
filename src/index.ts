// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { fleetPaths, loadConfig, type FleetConfig, type FleetPaths } from "./common/config.js";
import { exponentialRetry, fixedRetry, type RetryPolicy } from "./common/retry.js";
import { CertificateManager } from "./certs/certificate-manager.js";
import { OpensslIssuer, type CertificateIssuer } from "./certs/issuer.js";
import { EdgeHttpDomainProbe, EdgeVantageProbe, type DomainProbe, type ReachabilityProbe } from "./connectivity/probes.js";
import { ConnectivityVerifier } from "./connectivity/verifier.js";
import { IntegrationCoordinator } from "./coordinator/integration-coordinator.js";
import { EdgeInfrastructureBuilder } from "./edge/infrastructure-builder.js";
import { EdgeStateDetector } from "./edge/state-detector.js";
import { NginxEdgeProxy, type EdgeProxy } from "./proxy/edge-proxy.js";
import { FleetLock } from "./routing/fleet-lock.js";
import { RoutePublisher } from "./routing/publisher.js";
import { RouteStore } from "./routing/route-store.js";
import { CliContainerRuntime } from "./runtime/cli-runtime.js";
import type { ContainerRuntime } from "./runtime/container-runtime.js";
import { TenantDeployer } from "./tenant/deployer.js";
import { LocalHostsFile } from "./tenant/local-hosts.js";
import { TenantRegistry } from "./tenant/registry.js";

export interface FleetPolicies {
  /** Health probing of a new tenant from the edge. */
  probe: RetryPolicy;
  /** Waiting for a repaired edge to report healthy. */
  readiness: RetryPolicy;
  /** Waiting for a tenant's address on the edge network. */
  address: RetryPolicy;
  /** Checking a domain serves through the edge after reload. */
  domain: RetryPolicy;
  lock: RetryPolicy;
}

export interface FleetOverrides {
  runtime?: ContainerRuntime;
  proxy?: EdgeProxy;
  reachability?: ReachabilityProbe;
  domainProbe?: DomainProbe;
  issuer?: CertificateIssuer;
  policies?: Partial<FleetPolicies>;
  now?: () => number;
}

export interface Fleet {
  config: FleetConfig;
  paths: FleetPaths;
  runtime: ContainerRuntime;
  detector: EdgeStateDetector;
  builder: EdgeInfrastructureBuilder;
  deployer: TenantDeployer;
  certs: CertificateManager;
  routes: RouteStore;
  publisher: RoutePublisher;
  registry: TenantRegistry;
  lock: FleetLock;
  coordinator: IntegrationCoordinator;
}

export function defaultPolicies(config: FleetConfig): FleetPolicies {
  return {
    probe: fixedRetry(config.probe.attempts, config.probe.intervalMs),
    readiness: fixedRetry(10, 1_000),
    address: fixedRetry(10, 500),
    domain: fixedRetry(3, 1_000),
    lock: exponentialRetry(config.lock.waitAttempts, 250, 5_000)
  };
}

/** Wire every component for one fleet root. Overrides replace the outside-world adapters. */
export function createFleet(config: FleetConfig = loadConfig(), overrides: FleetOverrides = {}): Fleet {
  const paths = fleetPaths(config.root);
  const policies = { ...defaultPolicies(config), ...overrides.policies };

  const runtime = overrides.runtime ?? new CliContainerRuntime(config.engine);
  const proxy = overrides.proxy ?? new NginxEdgeProxy(runtime, config.edge.name);
  const reachability = overrides.reachability ?? new EdgeVantageProbe(runtime, config.edge.name);
  const domainProbe = overrides.domainProbe ?? new EdgeHttpDomainProbe(config.edge.publicHost, config.edge.httpPort);

  const detector = new EdgeStateDetector(runtime, proxy, config.edge.name);
  const certs = new CertificateManager(paths, overrides.issuer ?? new OpensslIssuer(), {
    days: config.certs.days,
    renewWithinDays: config.certs.renewWithinDays,
    now: overrides.now
  });
  const routes = new RouteStore(paths);
  const registry = new TenantRegistry(paths.tenantsFile);
  const builder = new EdgeInfrastructureBuilder(runtime, detector, certs, routes, config, paths, policies.readiness);
  const publisher = new RoutePublisher(
    routes,
    proxy,
    detector,
    domainProbe,
    (glob) => builder.mainConfigText(glob),
    policies.domain
  );
  const deployer = new TenantDeployer(runtime, {
    edgeNetwork: config.edge.network,
    image: config.tenantImage,
    addressPolicy: policies.address
  });
  const verifier = new ConnectivityVerifier(reachability, policies.probe);
  const lock = new FleetLock(paths.lockFile, { staleMs: config.lock.staleMs, wait: policies.lock });

  const coordinator = new IntegrationCoordinator({
    config,
    runtime,
    detector,
    builder,
    deployer,
    verifier,
    certs,
    routes,
    publisher,
    registry,
    lock,
    hosts: new LocalHostsFile(paths.hostsFile),
    now: overrides.now
  });

  return { config, paths, runtime, detector, builder, deployer, certs, routes, publisher, registry, lock, coordinator };
}

export { IntegrationCoordinator } from "./coordinator/integration-coordinator.js";
export type { DeploymentResult, DeployRequest, FleetStatus } from "./coordinator/integration-coordinator.js";
export { DeploymentError, EXIT_CODES } from "./common/errors.js";
export { loadConfig } from "./common/config.js";
