// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { ZodError } from "zod";
import { DeploymentError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { startExpiryScheduler } from "../certs/expiry-scheduler.js";
import { buildControlPlane } from "../control-plane/server.js";
import type { DeploymentResult, FleetStatus } from "../coordinator/integration-coordinator.js";
import { createFleet, type Fleet } from "../index.js";

const log = createLogger("cli");

export const USAGE = `edgefleet: multi-tenant edge orchestration

Commands:
  deploy <name> <domain> <port> [environment]   Bring a tenant online behind the edge
  remove <name>                                  Withdraw a tenant's route and instance
  rotate-cert <domain> | --all                   Rotate one certificate, or every one due
  status                                         Show edge, tenants, routes and certificates
  serve [--port <n>]                             Run the operator HTTP API and expiry scanner

Options:
  --json            Print results as JSON
`;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  fleet?: () => Fleet;
  io?: CliIo;
  /** Resolves when `serve` should shut down. */
  shutdown?: () => Promise<void>;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
}

function flagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index !== -1 ? args[index + 1] : undefined;
}

function positional(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--port") {
      i++;
      continue;
    }
    if (!args[i].startsWith("--")) out.push(args[i]);
  }
  return out;
}

function printDeployment(io: CliIo, result: DeploymentResult): void {
  const { tenant } = result;
  io.out(`${result.ok ? "deployed" : "failed"}: ${tenant.name} (${tenant.domain})`);
  io.out("─".repeat(50));
  io.out(`  Phase:   ${result.phase}`);
  io.out(`  Edge:    ${result.edge.before.state} -> ${result.edge.after.state} (${result.edge.action})`);
  if (tenant.target) io.out(`  Target:  ${tenant.target.host}:${tenant.target.port}`);
  if (result.connectivity?.degraded) io.out("  Warning: reachable by ping only; application health not confirmed");
  if (result.error) {
    io.err(`  Error:   [${result.error.code}] ${result.error.message}`);
    for (const detail of result.error.details) io.err(`           ${detail}`);
  }
}

function printStatus(io: CliIo, status: FleetStatus): void {
  const reason = status.edge.reason ? ` (${status.edge.reason})` : "";
  io.out(`Edge: ${status.edge.state}${reason}`);
  io.out("─".repeat(50));
  io.out("Tenants:");
  if (status.tenants.length === 0) io.out("  (none)");
  for (const tenant of status.tenants) {
    const failed = tenant.failedPhase ? ` at ${tenant.failedPhase}` : "";
    io.out(`  ${tenant.name}  ${tenant.domain}  ${tenant.state}${failed}`);
  }
  io.out("Routes:");
  if (status.routes.length === 0) io.out("  (none)");
  for (const route of status.routes) {
    io.out(`  ${route.domain} -> ${route.target ?? "?"} (${route.tenant ?? "unknown tenant"})`);
  }
  io.out("Certificates:");
  if (status.certificates.length === 0) io.out("  (none)");
  for (const cert of status.certificates) {
    const problems = cert.problems.length > 0 ? `  [${cert.problems.join(", ")}]` : "";
    io.out(`  ${cert.domain}  expires ${cert.notAfter ?? "-"}${problems}`);
  }
  if (status.localResolution.length > 0) {
    io.out("Local resolution:");
    for (const entry of status.localResolution) {
      io.out(`  ${entry.names.join(" ")} -> ${entry.address} (${entry.tenant})`);
    }
  }
}

function failure(io: CliIo, err: unknown): number {
  if (err instanceof DeploymentError) {
    const phase = err.phase ? ` at ${err.phase}` : "";
    io.err(`error [${err.code}]${phase}: ${err.message}`);
    for (const detail of err.details) io.err(`  ${detail}`);
    return err.exitCode;
  }
  if (err instanceof ZodError) {
    io.err("invalid configuration:");
    for (const issue of err.issues) io.err(`  ${issue.path.join(".")}: ${issue.message}`);
    return 1;
  }
  io.err(err instanceof Error ? err.message : String(err));
  return 1;
}

/** Run one command; resolves with the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;
  const [command, ...rest] = argv;
  const json = rest.includes("--json");
  const args = positional(rest);

  if (!command || command === "--help" || command === "-h") {
    io.out(USAGE);
    return command ? 0 : 1;
  }

  const usage = (line: string): number => {
    io.err(`usage: ${line}`);
    return 1;
  };

  try {
    switch (command) {
      case "deploy": {
        if (args.length < 3 || args.length > 4) return usage("deploy <name> <domain> <port> [environment]");
        const port = Number(args[2]);
        if (!Number.isInteger(port)) return usage("deploy <name> <domain> <port> [environment]");
        const environment = args[3] ?? "production";
        if (environment !== "production" && environment !== "development") {
          return usage("environment must be production or development");
        }
        const fleet = (deps.fleet ?? createFleet)();
        const result = await fleet.coordinator.deploy({ name: args[0], domain: args[1], port, environment });
        if (json) io.out(JSON.stringify(result, null, 2));
        else printDeployment(io, result);
        return result.error ? result.error.exitCode : 0;
      }
      case "remove": {
        if (args.length !== 1) return usage("remove <name>");
        const result = await (deps.fleet ?? createFleet)().coordinator.remove(args[0]);
        if (json) io.out(JSON.stringify(result, null, 2));
        else io.out(`removed: ${result.name} (${result.domain})${result.routeRemoved ? "" : ", no live route"}`);
        return 0;
      }
      case "rotate-cert": {
        const coordinator = (deps.fleet ?? createFleet)().coordinator;
        if (rest.includes("--all")) {
          const results = await coordinator.rotateDue();
          if (json) {
            io.out(JSON.stringify(results, null, 2));
          } else {
            if (results.length === 0) io.out("no certificates due");
            for (const result of results) {
              if (result.ok) io.out(`rotated: ${result.domain} (expires ${result.notAfter ?? "-"})`);
              else io.err(`failed: ${result.domain} [${result.error?.code ?? "unknown"}] ${result.error?.message ?? ""}`);
            }
          }
          const failed = results.find((result) => !result.ok);
          return failed?.error ? failed.error.exitCode : 0;
        }
        if (args.length !== 1) return usage("rotate-cert <domain> | --all");
        const rotation = await coordinator.rotateCert(args[0]);
        if (json) io.out(JSON.stringify(rotation, null, 2));
        else io.out(`rotated: ${args[0]} -> ${rotation.release}${rotation.resumed ? " (resumed)" : ""}`);
        return 0;
      }
      case "status": {
        const status = await (deps.fleet ?? createFleet)().coordinator.status();
        if (json) io.out(JSON.stringify(status, null, 2));
        else printStatus(io, status);
        return 0;
      }
      case "serve": {
        const fleet = (deps.fleet ?? createFleet)();
        const portFlag = flagValue(rest, "--port");
        const port = portFlag === undefined ? fleet.config.api.port : Number(portFlag);
        if (!Number.isInteger(port)) return usage("serve [--port <n>]");

        const app = buildControlPlane(fleet.coordinator, { token: fleet.config.api.token });
        const timer = startExpiryScheduler(fleet.certs, {
          intervalMs: fleet.config.certs.scanIntervalMs,
          onDue: async (check) => {
            await fleet.coordinator.rotateCert(check.domain);
          }
        });
        await app.listen({ port, host: "0.0.0.0" });
        log.info("operator api listening", { port, fleetRoot: fleet.paths.root });
        await (deps.shutdown ?? waitForSignal)();
        clearInterval(timer);
        await app.close();
        return 0;
      }
      default:
        io.err(`Unknown command: ${command}`);
        io.err(USAGE);
        return 1;
    }
  } catch (err) {
    return failure(io, err);
  }
}
