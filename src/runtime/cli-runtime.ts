// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import { EnvironmentUnavailable, RuntimeFailure, errorMessage } from "../common/errors.js";
import { runCommand, type CommandRunner } from "../common/exec.js";
import { createLogger } from "../common/logger.js";
import type { CommandResult, InstanceInfo, InstanceSpec } from "../common/types.js";
import type { ContainerRuntime, NetworkOptions } from "./container-runtime.js";

const log = createLogger("runtime");

const inspectSchema = z.array(
  z.object({
    Name: z.string(),
    State: z.object({
      Status: z.string(),
      Running: z.boolean()
    }),
    Config: z
      .object({ Labels: z.record(z.string()).nullable().default({}) })
      .default({ Labels: {} }),
    NetworkSettings: z
      .object({
        Networks: z.record(z.object({ IPAddress: z.string().default("") })).nullable().default({})
      })
      .default({ Networks: {} })
  })
);

const NOT_FOUND = /no such (object|container)|no container with name or id/i;

/** Build `run` flags for a detached instance. */
export function buildRunArgs(spec: InstanceSpec): string[] {
  const args: string[] = ["run", "-d", "--name", spec.name, "--network", spec.network, "--restart", "unless-stopped"];

  for (const port of spec.ports ?? []) {
    args.push("-p", `${port.host}:${port.container}`);
  }
  for (const volume of spec.volumes ?? []) {
    args.push("-v", `${volume.hostPath}:${volume.containerPath}${volume.readOnly ? ":ro" : ""}`);
  }
  for (const [key, value] of Object.entries(spec.env ?? {}).sort(([a], [b]) => a.localeCompare(b))) {
    args.push("-e", `${key}=${value}`);
  }
  for (const [key, value] of Object.entries(spec.labels ?? {}).sort(([a], [b]) => a.localeCompare(b))) {
    args.push("--label", `${key}=${value}`);
  }

  args.push(spec.image);
  args.push(...(spec.command ?? []));
  return args;
}

export function parseInspect(stdout: string): InstanceInfo | null {
  const parsed = inspectSchema.parse(JSON.parse(stdout));
  const first = parsed[0];
  if (!first) return null;
  const networks: InstanceInfo["networks"] = {};
  for (const [name, net] of Object.entries(first.NetworkSettings.Networks ?? {})) {
    networks[name] = { ipAddress: net.IPAddress };
  }
  return {
    name: first.Name.replace(/^\//, ""),
    running: first.State.Running,
    status: first.State.Status,
    networks,
    labels: first.Config.Labels ?? {}
  };
}

/** Runtime backed by the docker or podman command line. */
export class CliContainerRuntime implements ContainerRuntime {
  constructor(
    readonly engine: "docker" | "podman" = "docker",
    private readonly run: CommandRunner = runCommand
  ) {}

  private async query(args: string[]): Promise<CommandResult> {
    try {
      return await this.run(this.engine, args, { timeoutMs: 30_000 });
    } catch (err) {
      throw new EnvironmentUnavailable(`${this.engine} is not available`, [errorMessage(err)]);
    }
  }

  private async mutate(action: string, args: string[], timeoutMs = 120_000): Promise<CommandResult> {
    let result: CommandResult;
    try {
      result = await this.run(this.engine, args, { timeoutMs });
    } catch (err) {
      throw new EnvironmentUnavailable(`${this.engine} is not available`, [errorMessage(err)]);
    }
    if (result.exitCode !== 0) {
      log.warn("runtime command failed", { action, exitCode: result.exitCode, stderr: result.stderr.trim() });
      throw new RuntimeFailure(`${action} failed`, [result.stderr.trim()]);
    }
    return result;
  }

  async ping(): Promise<void> {
    const result = await this.query(["info", "--format", "{{json .}}"]);
    if (result.exitCode !== 0) {
      throw new EnvironmentUnavailable(`${this.engine} daemon is not reachable`, [result.stderr.trim()]);
    }
  }

  async inspect(name: string): Promise<InstanceInfo | null> {
    const result = await this.query(["inspect", "--type", "container", name]);
    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) return null;
      throw new EnvironmentUnavailable(`cannot inspect ${name}`, [result.stderr.trim()]);
    }
    try {
      return parseInspect(result.stdout);
    } catch (err) {
      throw new EnvironmentUnavailable(`unreadable inspect output for ${name}`, [errorMessage(err)]);
    }
  }

  async create(spec: InstanceSpec): Promise<void> {
    await this.mutate(`create ${spec.name}`, buildRunArgs(spec), 300_000);
    log.info("instance created", { name: spec.name, image: spec.image, network: spec.network });
  }

  async start(name: string): Promise<void> {
    await this.mutate(`start ${name}`, ["start", name]);
  }

  async stop(name: string): Promise<void> {
    await this.mutate(`stop ${name}`, ["stop", name]);
  }

  async remove(name: string): Promise<void> {
    await this.mutate(`remove ${name}`, ["rm", "-f", name]);
  }

  async networkExists(name: string): Promise<boolean> {
    const result = await this.query(["network", "ls", "--format", "{{.Name}}"]);
    if (result.exitCode !== 0) {
      throw new EnvironmentUnavailable("cannot list networks", [result.stderr.trim()]);
    }
    return result.stdout.split("\n").some((line) => line.trim() === name);
  }

  async createNetwork(name: string, options: NetworkOptions = {}): Promise<void> {
    const args = ["network", "create"];
    if (options.internal) args.push("--internal");
    for (const [key, value] of Object.entries(options.labels ?? {})) {
      args.push("--label", `${key}=${value}`);
    }
    args.push(name);
    await this.mutate(`create network ${name}`, args);
    log.info("network created", { name, internal: options.internal ?? false });
  }

  async removeNetwork(name: string): Promise<void> {
    await this.mutate(`remove network ${name}`, ["network", "rm", name]);
  }

  async connect(network: string, instance: string): Promise<void> {
    await this.mutate(`connect ${instance} to ${network}`, ["network", "connect", network, instance]);
  }

  async exec(instance: string, argv: string[], timeoutMs = 30_000): Promise<CommandResult> {
    try {
      return await this.run(this.engine, ["exec", instance, ...argv], { timeoutMs });
    } catch (err) {
      throw new EnvironmentUnavailable(`${this.engine} is not available`, [errorMessage(err)]);
    }
  }
}
