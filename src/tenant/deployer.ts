// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { RuntimeFailure, ValidationFailed } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { retry, type AttemptResult, type RetryPolicy } from "../common/retry.js";
import type { InstanceInfo, NetworkAddress, TenantRecord } from "../common/types.js";
import { addressOn, type ContainerRuntime } from "../runtime/container-runtime.js";

const log = createLogger("tenant-deployer");

export interface TenantDeployerOptions {
  edgeNetwork: string;
  image: string;
  /** Polling for the runtime to assign an address on the edge network. */
  addressPolicy: RetryPolicy;
}

export const TENANT_LABEL = "edgefleet.tenant";

export function privateNetworkFor(name: string): string {
  return `${name}-network`;
}

function ownedBy(info: InstanceInfo, tenant: string): boolean {
  return info.labels[TENANT_LABEL] === tenant;
}

/**
 * Starts one tenant instance. The instance lives on its own private network
 * and additionally joins the shared edge network, which is the only path the
 * edge has to it; tenants never share a network with each other.
 */
export class TenantDeployer {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: TenantDeployerOptions
  ) {}

  async deploy(tenant: TenantRecord, signal?: AbortSignal): Promise<NetworkAddress> {
    const { edgeNetwork, image } = this.options;

    const existing = await this.runtime.inspect(tenant.runtimeHandle);
    if (existing && !ownedBy(existing, tenant.name)) {
      throw new ValidationFailed(`instance name ${tenant.runtimeHandle} is taken by something other than tenant ${tenant.name}`, [
        `${TENANT_LABEL}: ${existing.labels[TENANT_LABEL] ?? "(none)"}`
      ]);
    }

    if (!(await this.runtime.networkExists(tenant.networkName))) {
      await this.runtime.createNetwork(tenant.networkName, { internal: true, labels: { [TENANT_LABEL]: tenant.name } });
    }

    if (existing) {
      log.warn("removing leftover tenant instance", { tenant: tenant.name, status: existing.status });
      await this.runtime.remove(tenant.runtimeHandle);
    }

    signal?.throwIfAborted();
    await this.runtime.create({
      name: tenant.runtimeHandle,
      image,
      network: tenant.networkName,
      env: {
        TENANT_NAME: tenant.name,
        TENANT_DOMAIN: tenant.domain,
        TENANT_ENV: tenant.environment,
        PORT: String(tenant.listenPort)
      },
      labels: { [TENANT_LABEL]: tenant.name, "edgefleet.domain": tenant.domain }
    });
    await this.runtime.connect(edgeNetwork, tenant.runtimeHandle);

    const outcome = await retry(
      this.options.addressPolicy,
      async (): Promise<AttemptResult<string>> => {
        const info = await this.runtime.inspect(tenant.runtimeHandle);
        if (!info) return { ok: false, reason: "instance disappeared" };
        if (!info.running) return { ok: false, reason: `instance ${info.status}` };
        const ip = addressOn(info, edgeNetwork);
        return ip ? { ok: true, value: ip } : { ok: false, reason: `no address on ${edgeNetwork} yet` };
      },
      { signal }
    );
    if (!outcome.ok) {
      throw new RuntimeFailure(`tenant ${tenant.name} has no address on ${edgeNetwork}`, outcome.reasons);
    }

    log.info("tenant instance running", { tenant: tenant.name, address: outcome.value, port: tenant.listenPort });
    return { host: outcome.value, port: tenant.listenPort };
  }

  /** Remove the instance and its private network; absent or foreign pieces are skipped. */
  async teardown(tenant: Pick<TenantRecord, "name" | "runtimeHandle" | "networkName">): Promise<void> {
    const info = await this.runtime.inspect(tenant.runtimeHandle);
    if (info && ownedBy(info, tenant.name)) {
      await this.runtime.remove(tenant.runtimeHandle);
    } else if (info) {
      log.warn("leaving instance owned by someone else", { tenant: tenant.name, instance: tenant.runtimeHandle });
      return;
    }
    if (await this.runtime.networkExists(tenant.networkName)) {
      await this.runtime.removeNetwork(tenant.networkName);
    }
    log.info("tenant instance removed", { tenant: tenant.name });
  }
}
