// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { request } from "undici";
import type { NetworkAddress } from "../common/types.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";

export interface ProbeResult {
  ok: boolean;
  detail: string;
}

/** Probes run from the edge's own network position. */
export interface ReachabilityProbe {
  http(target: NetworkAddress, path: string): Promise<ProbeResult>;
  /** Lower-level check that the host answers at all. */
  ping(target: NetworkAddress): Promise<ProbeResult>;
}

/** `wget`/`ping` executed inside the edge instance. */
export class EdgeVantageProbe implements ReachabilityProbe {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly edgeInstance: string,
    private readonly timeoutSeconds = 5
  ) {}

  async http(target: NetworkAddress, path: string): Promise<ProbeResult> {
    const url = `http://${target.host}:${target.port}${path}`;
    const result = await this.runtime.exec(this.edgeInstance, [
      "wget", "-q", "-O", "/dev/null", "-T", String(this.timeoutSeconds), url
    ]);
    return { ok: result.exitCode === 0, detail: result.exitCode === 0 ? `GET ${url} ok` : `GET ${url}: ${result.stderr.trim() || `exit ${result.exitCode}`}` };
  }

  async ping(target: NetworkAddress): Promise<ProbeResult> {
    const result = await this.runtime.exec(this.edgeInstance, ["ping", "-c", "1", "-W", "2", target.host]);
    return { ok: result.exitCode === 0, detail: result.exitCode === 0 ? `${target.host} answers ping` : `${target.host} unreachable` };
  }
}

/** Checks a published domain through the edge's public listener. */
export interface DomainProbe {
  serves(domain: string): Promise<ProbeResult>;
}

export class EdgeHttpDomainProbe implements DomainProbe {
  constructor(
    private readonly edgeHost: string,
    private readonly edgeHttpPort: number,
    private readonly timeoutMs = 10_000
  ) {}

  /** 2xx or 3xx (the HTTP→HTTPS redirect) means the edge has a route for it. */
  async serves(domain: string): Promise<ProbeResult> {
    try {
      const res = await request(`http://${this.edgeHost}:${this.edgeHttpPort}/`, {
        method: "GET",
        headers: { host: domain },
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs
      });
      await res.body.dump();
      const ok = res.statusCode >= 200 && res.statusCode < 400;
      return { ok, detail: `${domain} -> ${res.statusCode}` };
    } catch (err) {
      return { ok: false, detail: `${domain}: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
}
