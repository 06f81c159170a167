// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { spawn } from "node:child_process";
import type { CommandResult } from "./types.js";

export interface RunOptions {
  timeoutMs?: number;
  input?: string;
  cwd?: string;
}

/** Executes a command line and collects its output. */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<CommandResult>;

/**
 * Spawn-based runner. Never rejects for non-zero exits; a spawn error
 * (binary missing) rejects so callers can tell "failed" from "absent".
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? 60_000;

  return new Promise<CommandResult>((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      proc.kill("SIGKILL");
      resolve({ exitCode: 124, stdout, stderr: `${stderr}\n${command} timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    proc.stdout?.on("data", (chunk: Buffer) => { stdout += chunk.toString(); });
    proc.stderr?.on("data", (chunk: Buffer) => { stderr += chunk.toString(); });

    if (options.input !== undefined) {
      proc.stdin?.end(options.input);
    }

    proc.on("close", (exitCode) => {
      if (settled) return;
      clearTimeout(timer);
      settled = true;
      resolve({ exitCode: exitCode ?? 1, stdout, stderr });
    });

    proc.on("error", (error) => {
      if (settled) return;
      clearTimeout(timer);
      settled = true;
      reject(error);
    });
  });
};
