// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type EdgeState = "absent" | "stopped" | "running_healthy" | "running_corrupted";

export type CorruptionReason = "config_invalid" | "workers_missing";

export interface EdgeStateReport {
  state: EdgeState;
  reason?: CorruptionReason;
  diagnostics: string[];
}

export type TenantPhase =
  | "requested"
  | "runtime_starting"
  | "runtime_verified"
  | "cert_ready"
  | "route_validated"
  | "published"
  | "verified";

export type LifecycleState = TenantPhase | "failed";

export type TenantEnvironment = "development" | "production";

export interface NetworkAddress {
  host: string;
  port: number;
}

export interface TenantRecord {
  name: string;
  domain: string;
  listenPort: number;
  networkName: string;
  runtimeHandle: string;
  environment: TenantEnvironment;
  lifecycleState: LifecycleState;
  failedPhase?: TenantPhase;
  lastError?: string;
  target?: NetworkAddress;
  createdAt: number;
  updatedAt: number;
}

export interface TlsRef {
  certPath: string;
  keyPath: string;
}

export interface RouteFragment {
  tenant: string;
  domain: string;
  aliases: string[];
  target: NetworkAddress;
  tls: TlsRef;
  healthPath: string;
}

export interface Certificate {
  domain: string;
  certPath: string;
  keyPath: string;
  notAfter: Date;
  fingerprint: string;
}

export interface DeploymentAttempt {
  tenant: string;
  phase: TenantPhase;
  retryCount: number;
  lastError?: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface InstanceInfo {
  name: string;
  running: boolean;
  status: string;
  networks: Record<string, { ipAddress: string }>;
  labels: Record<string, string>;
}

export interface PortBinding {
  host: number;
  container: number;
}

export interface VolumeMount {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
}

export interface InstanceSpec {
  name: string;
  image: string;
  network: string;
  ports?: PortBinding[];
  volumes?: VolumeMount[];
  env?: Record<string, string>;
  labels?: Record<string, string>;
  command?: string[];
}
