// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { CommandResult, InstanceInfo, InstanceSpec } from "../common/types.js";

export interface NetworkOptions {
  /** Block egress from the network entirely. */
  internal?: boolean;
  labels?: Record<string, string>;
}

/**
 * Container/process runtime that hosts the edge and tenant instances.
 *
 * Query methods throw `EnvironmentUnavailable` when the runtime itself cannot
 * be reached; mutating methods throw `RuntimeFailure` when the runtime
 * rejects the operation.
 */
export interface ContainerRuntime {
  readonly engine: string;
  ping(): Promise<void>;
  inspect(name: string): Promise<InstanceInfo | null>;
  create(spec: InstanceSpec): Promise<void>;
  start(name: string): Promise<void>;
  stop(name: string): Promise<void>;
  remove(name: string): Promise<void>;
  networkExists(name: string): Promise<boolean>;
  createNetwork(name: string, options?: NetworkOptions): Promise<void>;
  removeNetwork(name: string): Promise<void>;
  connect(network: string, instance: string): Promise<void>;
  exec(instance: string, argv: string[], timeoutMs?: number): Promise<CommandResult>;
}

/** Address of an instance on a given network, or null before assignment. */
export function addressOn(info: InstanceInfo, network: string): string | null {
  const ip = info.networks[network]?.ipAddress;
  return ip && ip.length > 0 ? ip : null;
}
