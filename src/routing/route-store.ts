// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { isErrnoCode } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { EDGE_MOUNT, type FleetPaths } from "../common/config.js";

const log = createLogger("route-store");

/** Live fragment set captured before a publish: file name → exact bytes. */
export type RouteSnapshot = Map<string, string>;

export interface StagedTree {
  id: string;
  dir: string;
  /** Main config path relative to the fleet root, as the edge validator takes it. */
  configPath: string;
}

export function fragmentFile(domain: string): string {
  return `${domain}.conf`;
}

function isFragmentFile(name: string): boolean {
  return name.endsWith(".conf") && !name.startsWith(".");
}

/**
 * The routing directory the edge includes wholesale. Files only ever appear
 * or change through a single rename, so the edge never reads a partial one.
 */
export class RouteStore {
  constructor(private readonly paths: FleetPaths) {}

  get routesDir(): string {
    return this.paths.routesDir;
  }

  /** Include glob as seen from inside the edge. */
  liveGlob(): string {
    return `${EDGE_MOUNT}/routes/*.conf`;
  }

  async ensure(): Promise<void> {
    await mkdir(this.paths.routesDir, { recursive: true });
    await mkdir(this.paths.stagingDir, { recursive: true });
    await mkdir(this.paths.backupDir, { recursive: true });
  }

  async listFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.paths.routesDir);
      return entries.filter(isFragmentFile).sort();
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  async domains(): Promise<string[]> {
    return (await this.listFiles()).map((file) => file.slice(0, -".conf".length));
  }

  async read(domain: string): Promise<string | null> {
    try {
      return await readFile(`${this.paths.routesDir}/${fragmentFile(domain)}`, "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
  }

  async snapshot(): Promise<RouteSnapshot> {
    const snapshot: RouteSnapshot = new Map();
    for (const file of await this.listFiles()) {
      snapshot.set(file, await readFile(`${this.paths.routesDir}/${file}`, "utf8"));
    }
    return snapshot;
  }

  /** Write a candidate beside the live files under a name the include glob skips. */
  async writeTemp(domain: string, text: string): Promise<string> {
    await mkdir(this.paths.routesDir, { recursive: true });
    const tempPath = `${this.paths.routesDir}/.${fragmentFile(domain)}.${process.pid}.tmp`;
    await writeFile(tempPath, text, { encoding: "utf8", mode: 0o644 });
    return tempPath;
  }

  async commit(tempPath: string, domain: string): Promise<void> {
    await rename(tempPath, `${this.paths.routesDir}/${fragmentFile(domain)}`);
    log.info("fragment published", { domain });
  }

  async discard(path: string): Promise<void> {
    await rm(path, { force: true });
  }

  /** Move a live fragment out of the include set into a timestamped backup. */
  async retire(domain: string, reason: string): Promise<boolean> {
    const source = `${this.paths.routesDir}/${fragmentFile(domain)}`;
    const target = `${this.paths.backupDir}/routes/${fragmentFile(domain)}.${Date.now()}.${reason}`;
    await mkdir(`${this.paths.backupDir}/routes`, { recursive: true });
    try {
      await rename(source, target);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw err;
    }
    log.info("fragment retired", { domain, reason, backup: target });
    return true;
  }

  /** Bring the live set back to exactly `snapshot`, one atomic rename per file. */
  async restore(snapshot: RouteSnapshot): Promise<void> {
    for (const file of await this.listFiles()) {
      if (!snapshot.has(file)) {
        await rm(`${this.paths.routesDir}/${file}`, { force: true });
      }
    }
    for (const [file, text] of snapshot) {
      const current = await readFile(`${this.paths.routesDir}/${file}`, "utf8").catch((err: unknown) => {
        if (isErrnoCode(err, "ENOENT")) return null;
        throw err;
      });
      if (current === text) continue;
      const tempPath = `${this.paths.routesDir}/.${file}.restore.tmp`;
      await writeFile(tempPath, text, "utf8");
      await rename(tempPath, `${this.paths.routesDir}/${file}`);
    }
    log.warn("fragment set restored", { files: [...snapshot.keys()] });
  }

  /**
   * Assemble a full candidate tree (every live fragment, with `candidate`
   * added or replaced and `without` dropped) under staging/ so the edge can
   * check the merged configuration before anything live changes.
   */
  async stage(
    renderMain: (routesGlob: string) => string,
    candidate?: { domain: string; text: string },
    without?: string
  ): Promise<StagedTree> {
    const id = randomUUID();
    const dir = `${this.paths.stagingDir}/${id}`;
    await mkdir(`${dir}/routes`, { recursive: true });

    const snapshot = await this.snapshot();
    if (without) snapshot.delete(fragmentFile(without));
    if (candidate) snapshot.set(fragmentFile(candidate.domain), candidate.text);

    for (const [file, text] of snapshot) {
      await writeFile(`${dir}/routes/${file}`, text, "utf8");
    }
    await writeFile(`${dir}/nginx.conf`, renderMain(`${EDGE_MOUNT}/staging/${id}/routes/*.conf`), "utf8");
    return { id, dir, configPath: `staging/${id}/nginx.conf` };
  }

  async readStaged(tree: StagedTree): Promise<Map<string, string>> {
    const files = new Map<string, string>();
    for (const file of (await readdir(`${tree.dir}/routes`)).filter(isFragmentFile).sort()) {
      files.set(file, await readFile(`${tree.dir}/routes/${file}`, "utf8"));
    }
    return files;
  }

  async dropStage(tree: StagedTree): Promise<void> {
    await rm(tree.dir, { recursive: true, force: true });
  }
}
