import { existsSync } from "node:fs";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { EDGE_MOUNT, loadConfig, type FleetConfig } from "../../src/common/config.js";
import { RuntimeFailure } from "../../src/common/errors.js";
import { fixedRetry } from "../../src/common/retry.js";
import type { CommandResult, InstanceInfo, InstanceSpec, NetworkAddress } from "../../src/common/types.js";
import type { CertificateIssuer, IssuedMaterial } from "../../src/certs/issuer.js";
import type { DomainProbe, ProbeResult, ReachabilityProbe } from "../../src/connectivity/probes.js";
import type { EdgeProxy, ValidationReport, WorkerReport } from "../../src/proxy/edge-proxy.js";
import { fragmentTarget, serverNames } from "../../src/routing/fragment.js";
import type { ContainerRuntime, NetworkOptions } from "../../src/runtime/container-runtime.js";
import { privateNetworkFor } from "../../src/tenant/deployer.js";
import { createFleet, type Fleet } from "../../src/index.js";

export const FIXTURE_CERTS = fileURLToPath(new URL("../fixtures/certs", import.meta.url));

/** Just after the fixture certificates' notBefore. */
export const NOW = Date.parse("2026-10-20T00:00:00Z");

export async function tempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), "edgefleet-test-"));
}

export async function removeRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

interface FakeInstance {
  spec: InstanceSpec;
  running: boolean;
  networks: Map<string, string>;
}

/** In-memory container engine. Addresses are handed out per network in creation order. */
export class FakeRuntime implements ContainerRuntime {
  readonly engine = "fake";
  readonly instances = new Map<string, FakeInstance>();
  readonly networks = new Map<string, NetworkOptions>();
  readonly calls: string[] = [];
  /** Instances whose `start`/`create` leaves them stopped. */
  readonly failToStart = new Set<string>();
  /** Instances that never get an address on the networks they join. */
  readonly noAddress = new Set<string>();
  private nextHost = 10;

  private assign(name: string): string {
    return this.noAddress.has(name) ? "" : `172.30.0.${this.nextHost++}`;
  }

  async ping(): Promise<void> {}

  async inspect(name: string): Promise<InstanceInfo | null> {
    const instance = this.instances.get(name);
    if (!instance) return null;
    const networks: InstanceInfo["networks"] = {};
    for (const [network, ipAddress] of instance.networks) networks[network] = { ipAddress };
    return {
      name,
      running: instance.running,
      status: instance.running ? "running" : "exited",
      networks,
      labels: { ...instance.spec.labels }
    };
  }

  async create(spec: InstanceSpec): Promise<void> {
    this.calls.push(`create ${spec.name}`);
    if (this.instances.has(spec.name)) throw new RuntimeFailure(`name ${spec.name} in use`);
    if (!this.networks.has(spec.network)) throw new RuntimeFailure(`network ${spec.network} not found`);
    const running = !this.failToStart.has(spec.name);
    this.instances.set(spec.name, {
      spec,
      running,
      networks: new Map([[spec.network, this.assign(spec.name)]])
    });
  }

  async start(name: string): Promise<void> {
    this.calls.push(`start ${name}`);
    const instance = this.instances.get(name);
    if (!instance) throw new RuntimeFailure(`no such instance ${name}`);
    if (this.failToStart.has(name)) throw new RuntimeFailure(`${name} failed to start`);
    instance.running = true;
  }

  async stop(name: string): Promise<void> {
    this.calls.push(`stop ${name}`);
    const instance = this.instances.get(name);
    if (instance) instance.running = false;
  }

  async remove(name: string): Promise<void> {
    this.calls.push(`remove ${name}`);
    this.instances.delete(name);
  }

  async networkExists(name: string): Promise<boolean> {
    return this.networks.has(name);
  }

  async createNetwork(name: string, options: NetworkOptions = {}): Promise<void> {
    this.calls.push(`network create ${name}`);
    this.networks.set(name, options);
  }

  async removeNetwork(name: string): Promise<void> {
    this.calls.push(`network rm ${name}`);
    this.networks.delete(name);
  }

  async connect(network: string, instance: string): Promise<void> {
    this.calls.push(`network connect ${network} ${instance}`);
    const target = this.instances.get(instance);
    if (!target) throw new RuntimeFailure(`no such instance ${instance}`);
    if (!this.networks.has(network)) throw new RuntimeFailure(`network ${network} not found`);
    target.networks.set(network, this.assign(instance));
  }

  async exec(instance: string, argv: string[]): Promise<CommandResult> {
    this.calls.push(`exec ${instance} ${argv.join(" ")}`);
    return { exitCode: 0, stdout: "", stderr: "" };
  }

  /** Running instance holding `host` on any network. */
  byAddress(host: string): string | null {
    for (const [name, instance] of this.instances) {
      if (!instance.running) continue;
      for (const ip of instance.networks.values()) {
        if (ip === host) return name;
      }
    }
    return null;
  }
}

/**
 * nginx stand-in reading the real files under the fleet root: validation
 * rejects duplicate server names, upstreams that no running instance holds
 * and missing certificates. A successful reload snapshots the served domains.
 */
export class FakeEdgeProxy implements EdgeProxy {
  failValidation = false;
  /** Reject candidate trees under staging/ only; the live config stays valid. */
  rejectStaged = false;
  failReload = 0;
  workersMissing = false;
  reloads = 0;
  validations: string[] = [];
  /** Domain -> upstream, as of the last successful reload. */
  loaded = new Map<string, string>();

  constructor(
    private readonly root: string,
    private readonly runtime: FakeRuntime,
    private readonly edgeName: string
  ) {}

  private hostPath(containerPath: string): string {
    return containerPath.replace(EDGE_MOUNT, this.root);
  }

  private edgeRunning(): boolean {
    return this.runtime.instances.get(this.edgeName)?.running ?? false;
  }

  private async fragments(configPath: string): Promise<Map<string, string> | string> {
    const mainPath = join(this.root, configPath);
    if (!existsSync(mainPath)) return `open() "${mainPath}" failed`;
    const main = await readFile(mainPath, "utf8");
    const include = main.match(/^\s*include (\S+\/)\*\.conf;$/m);
    if (!include) return "no routes include";
    const dir = this.hostPath(include[1]);
    const files = new Map<string, string>();
    if (!existsSync(dir)) return files;
    for (const file of (await readdir(dir)).sort()) {
      if (file.endsWith(".conf") && !file.startsWith(".")) {
        files.set(file, await readFile(join(dir, file), "utf8"));
      }
    }
    const certs = [...main.matchAll(/ssl_certificate(?:_key)? (\S+);/g)].map((m) => m[1]);
    for (const cert of certs) {
      if (!existsSync(this.hostPath(cert))) return `cannot load certificate "${cert}"`;
    }
    return files;
  }

  async validate(configPath: string): Promise<ValidationReport> {
    this.validations.push(configPath);
    if (!this.edgeRunning()) return { ok: false, diagnostics: ["edge not running"] };
    if (this.failValidation || (this.rejectStaged && configPath.startsWith("staging/"))) {
      return { ok: false, diagnostics: ["nginx: [emerg] forced failure"] };
    }
    const files = await this.fragments(configPath);
    if (typeof files === "string") return { ok: false, diagnostics: [`nginx: [emerg] ${files}`] };

    const seen = new Set<string>();
    for (const [file, text] of files) {
      for (const name of serverNames(text)) {
        if (seen.has(name)) return { ok: false, diagnostics: [`nginx: [emerg] duplicate server name "${name}" in ${file}`] };
      }
      for (const name of serverNames(text)) seen.add(name);
      const target = fragmentTarget(text);
      const host = target ? target.split(":")[0] : "";
      if (!this.runtime.byAddress(host)) {
        return { ok: false, diagnostics: [`nginx: [emerg] host not found in upstream "${target ?? ""}" in ${file}`] };
      }
      for (const m of text.matchAll(/ssl_certificate(?:_key)? (\S+);/g)) {
        if (!existsSync(this.hostPath(m[1]))) {
          return { ok: false, diagnostics: [`nginx: [emerg] cannot load certificate "${m[1]}"`] };
        }
      }
    }
    return { ok: true, diagnostics: [] };
  }

  async reload(): Promise<CommandResult> {
    this.reloads++;
    if (this.failReload > 0) {
      this.failReload--;
      return { exitCode: 1, stdout: "", stderr: "nginx: [emerg] reload refused" };
    }
    const files = await this.fragments("nginx.conf");
    this.loaded = new Map();
    if (typeof files !== "string") {
      for (const text of files.values()) {
        const target = fragmentTarget(text) ?? "";
        for (const name of serverNames(text)) this.loaded.set(name, target);
      }
    }
    return { exitCode: 0, stdout: "", stderr: "" };
  }

  async workers(): Promise<WorkerReport> {
    if (!this.edgeRunning()) return { running: false, workers: 0 };
    return { running: true, workers: this.workersMissing ? 0 : 2 };
  }
}

/** Answers for a domain the edge loaded whose upstream is still running. */
export class FakeDomainProbe implements DomainProbe {
  readonly broken = new Set<string>();
  readonly checked: string[] = [];

  constructor(
    private readonly proxy: FakeEdgeProxy,
    private readonly runtime: FakeRuntime
  ) {}

  async serves(domain: string): Promise<ProbeResult> {
    this.checked.push(domain);
    const target = this.proxy.loaded.get(domain);
    if (!target) return { ok: false, detail: `${domain} -> 444` };
    if (this.broken.has(domain) || !this.runtime.byAddress(target.split(":")[0])) {
      return { ok: false, detail: `${domain} -> 502` };
    }
    return { ok: true, detail: `${domain} -> 301` };
  }
}

/** Tenants listed in `unhealthy` answer ping only; those in `dead` answer nothing. */
export class FakeReachability implements ReachabilityProbe {
  readonly unhealthy = new Set<string>();
  readonly dead = new Set<string>();
  httpCalls = 0;

  constructor(private readonly runtime: FakeRuntime) {}

  async http(target: NetworkAddress, path: string): Promise<ProbeResult> {
    this.httpCalls++;
    const name = this.runtime.byAddress(target.host);
    if (!name || this.unhealthy.has(name) || this.dead.has(name)) {
      return { ok: false, detail: `GET http://${target.host}:${target.port}${path}: connection refused` };
    }
    return { ok: true, detail: "ok" };
  }

  async ping(target: NetworkAddress): Promise<ProbeResult> {
    const name = this.runtime.byAddress(target.host);
    if (!name || this.dead.has(name)) return { ok: false, detail: `${target.host} unreachable` };
    return { ok: true, detail: `${target.host} answers ping` };
  }
}

/** Hands out tests/fixtures/certs/<domain>/<n>.{crt,key} in order. */
export class FixtureIssuer implements CertificateIssuer {
  readonly issued = new Map<string, number>();

  async issue(domain: string): Promise<IssuedMaterial> {
    const n = (this.issued.get(domain) ?? 0) + 1;
    this.issued.set(domain, n);
    return {
      certPem: await readFile(join(FIXTURE_CERTS, domain, `${n}.crt`), "utf8"),
      keyPem: await readFile(join(FIXTURE_CERTS, domain, `${n}.key`), "utf8")
    };
  }

  count(domain: string): number {
    return this.issued.get(domain) ?? 0;
  }
}

export function testConfig(root: string, env: Record<string, string> = {}): FleetConfig {
  return loadConfig({ FLEET_ROOT: root, PROBE_INTERVAL_MS: "0", PROBE_ATTEMPTS: "3", ...env });
}

export interface TestFleet extends Fleet {
  fakeRuntime: FakeRuntime;
  proxy: FakeEdgeProxy;
  domainProbe: FakeDomainProbe;
  reachability: FakeReachability;
  issuer: FixtureIssuer;
}

/** A fleet over a temp root with every outside-world adapter faked and no retry delays. */
export function testFleet(root: string, env: Record<string, string> = {}): TestFleet {
  const config = testConfig(root, env);
  const runtime = new FakeRuntime();
  const proxy = new FakeEdgeProxy(root, runtime, config.edge.name);
  const domainProbe = new FakeDomainProbe(proxy, runtime);
  const reachability = new FakeReachability(runtime);
  const issuer = new FixtureIssuer();
  const fleet = createFleet(config, {
    runtime,
    proxy,
    reachability,
    domainProbe,
    issuer,
    now: () => NOW,
    policies: {
      readiness: fixedRetry(2, 0),
      address: fixedRetry(2, 0),
      domain: fixedRetry(2, 0),
      lock: fixedRetry(2, 0)
    }
  });
  return { ...fleet, fakeRuntime: runtime, proxy, domainProbe, reachability, issuer };
}

/** Bring the edge up from nothing. */
export async function bootEdge(fleet: Fleet): Promise<void> {
  await fleet.builder.ensure(await fleet.detector.detect());
}

/** Start a tenant instance directly, without the coordinator. */
export function startTenant(fleet: Fleet, name: string, port = 9090): Promise<NetworkAddress> {
  return fleet.deployer.deploy({
    name,
    domain: `${name}.example`,
    listenPort: port,
    networkName: privateNetworkFor(name),
    runtimeHandle: name,
    environment: "production",
    lifecycleState: "runtime_starting",
    createdAt: NOW,
    updatedAt: NOW
  });
}
