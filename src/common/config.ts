// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { resolve } from "node:path";
import { z } from "zod";

const port = z.coerce.number().int().min(1).max(65535);

const envSchema = z.object({
  FLEET_ROOT: z.string().min(1).default("/opt/edgefleet"),
  CONTAINER_ENGINE: z.enum(["docker", "podman"]).default("docker"),
  EDGE_NAME: z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/).default("edge-proxy"),
  EDGE_NETWORK: z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/).default("edge-proxy-network"),
  EDGE_IMAGE: z.string().min(1).default("nginx:1.27-alpine"),
  EDGE_HTTP_PORT: port.default(8080),
  EDGE_HTTPS_PORT: port.default(8443),
  EDGE_PUBLIC_HOST: z.string().min(1).default("127.0.0.1"),
  TENANT_IMAGE: z.string().min(1).default("nginx:1.27-alpine"),
  HEALTH_PATH: z.string().regex(/^\/[A-Za-z0-9/_.-]*$/).default("/health"),
  PROBE_INTERVAL_MS: z.coerce.number().int().min(0).default(3_000),
  PROBE_ATTEMPTS: z.coerce.number().int().positive().max(100).default(5),
  CERT_DAYS: z.coerce.number().int().positive().max(3650).default(365),
  CERT_RENEW_DAYS: z.coerce.number().int().min(0).default(30),
  LOCK_STALE_MS: z.coerce.number().int().positive().default(10 * 60_000),
  LOCK_WAIT_ATTEMPTS: z.coerce.number().int().positive().default(20),
  EXPIRY_SCAN_INTERVAL_MS: z.coerce.number().int().positive().default(6 * 3_600_000),
  API_PORT: port.default(4310),
  API_TOKEN: z.string().default("")
});

export interface FleetConfig {
  root: string;
  engine: "docker" | "podman";
  edge: {
    name: string;
    network: string;
    image: string;
    httpPort: number;
    httpsPort: number;
    publicHost: string;
  };
  tenantImage: string;
  healthPath: string;
  probe: { intervalMs: number; attempts: number };
  certs: { days: number; renewWithinDays: number; scanIntervalMs: number };
  lock: { staleMs: number; waitAttempts: number };
  api: { port: number; token: string };
}

/** Directory layout under the fleet root. Mounted into the edge at EDGE_MOUNT. */
export interface FleetPaths {
  root: string;
  routesDir: string;
  stagingDir: string;
  certsDir: string;
  backupDir: string;
  stateDir: string;
  mainConfig: string;
  tenantsFile: string;
  lockFile: string;
  /** Local name resolution for development tenants. */
  hostsFile: string;
}

export const EDGE_MOUNT = "/etc/edgefleet";

export function fleetPaths(root: string): FleetPaths {
  const abs = resolve(root);
  return {
    root: abs,
    routesDir: `${abs}/routes`,
    stagingDir: `${abs}/staging`,
    certsDir: `${abs}/certs`,
    backupDir: `${abs}/backup`,
    stateDir: `${abs}/state`,
    mainConfig: `${abs}/nginx.conf`,
    tenantsFile: `${abs}/state/tenants.json`,
    lockFile: `${abs}/state/fleet.lock`,
    hostsFile: `${abs}/state/hosts`
  };
}

/** Parse process environment into a typed config; throws ZodError on bad input. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const parsed = envSchema.parse(env);
  return {
    root: resolve(parsed.FLEET_ROOT),
    engine: parsed.CONTAINER_ENGINE,
    edge: {
      name: parsed.EDGE_NAME,
      network: parsed.EDGE_NETWORK,
      image: parsed.EDGE_IMAGE,
      httpPort: parsed.EDGE_HTTP_PORT,
      httpsPort: parsed.EDGE_HTTPS_PORT,
      publicHost: parsed.EDGE_PUBLIC_HOST
    },
    tenantImage: parsed.TENANT_IMAGE,
    healthPath: parsed.HEALTH_PATH,
    probe: { intervalMs: parsed.PROBE_INTERVAL_MS, attempts: parsed.PROBE_ATTEMPTS },
    certs: {
      days: parsed.CERT_DAYS,
      renewWithinDays: parsed.CERT_RENEW_DAYS,
      scanIntervalMs: parsed.EXPIRY_SCAN_INTERVAL_MS
    },
    lock: { staleMs: parsed.LOCK_STALE_MS, waitAttempts: parsed.LOCK_WAIT_ATTEMPTS },
    api: { port: parsed.API_PORT, token: parsed.API_TOKEN }
  };
}
