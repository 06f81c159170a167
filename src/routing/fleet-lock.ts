// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import { link, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { hostname } from "node:os";
import { z } from "zod";
import { LockUnavailable, isErrnoCode } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { retry, type AttemptResult, type RetryPolicy } from "../common/retry.js";

const log = createLogger("fleet-lock");

const ownerSchema = z.object({
  token: z.string(),
  pid: z.number().int(),
  host: z.string(),
  operation: z.string(),
  acquiredAt: z.number()
});

export type LockOwner = z.infer<typeof ownerSchema>;

export interface FleetLockOptions {
  staleMs: number;
  wait: RetryPolicy;
  signal?: AbortSignal;
}

function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return !isErrnoCode(err, "ESRCH");
  }
}

/**
 * Exclusive lock file guarding read-state → decide → publish against every
 * other invocation on the same fleet root, published atomically with
 * link(2). An owner whose pid is gone, or that is older than `staleMs`, is
 * taken over.
 */
export class FleetLock {
  constructor(
    private readonly lockFile: string,
    private readonly options: FleetLockOptions
  ) {}

  async holder(): Promise<LockOwner | null> {
    try {
      const parsed = ownerSchema.safeParse(JSON.parse(await readFile(this.lockFile, "utf8")));
      return parsed.success ? parsed.data : null;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT") || err instanceof SyntaxError) return null;
      throw err;
    }
  }

  private isStale(owner: LockOwner | null): boolean {
    if (!owner) return true;
    if (Date.now() - owner.acquiredAt > this.options.staleMs) return true;
    return owner.host === hostname() && !pidAlive(owner.pid);
  }

  /** Publish a fully written owner file under the lock name; link(2) fails if it exists. */
  private async create(owner: LockOwner): Promise<boolean> {
    const draft = `${this.lockFile}.${owner.token}`;
    await writeFile(draft, JSON.stringify(owner), { encoding: "utf8", mode: 0o644 });
    try {
      await link(draft, this.lockFile);
      return true;
    } catch (err) {
      if (isErrnoCode(err, "EEXIST")) return false;
      throw err;
    } finally {
      await rm(draft, { force: true });
    }
  }

  private async tryAcquire(operation: string): Promise<LockOwner | null> {
    const owner: LockOwner = {
      token: randomUUID(),
      pid: process.pid,
      host: hostname(),
      operation,
      acquiredAt: Date.now()
    };
    if (await this.create(owner)) return owner;

    const current = await this.holder();
    if (!this.isStale(current)) return null;
    log.warn("taking over stale fleet lock", { previous: current });
    await rm(this.lockFile, { force: true });
    return (await this.create(owner)) ? owner : null;
  }

  async acquire(operation: string): Promise<LockOwner> {
    await mkdir(dirname(this.lockFile), { recursive: true });
    const outcome = await retry(
      this.options.wait,
      async (): Promise<AttemptResult<LockOwner>> => {
        const owner = await this.tryAcquire(operation);
        return owner ? { ok: true, value: owner } : { ok: false, reason: "held" };
      },
      { signal: this.options.signal }
    );
    if (!outcome.ok) {
      const current = await this.holder();
      throw new LockUnavailable("fleet is locked by another operation", [
        current ? `${current.operation} (pid ${current.pid} on ${current.host})` : "unknown holder"
      ]);
    }
    log.debug("fleet lock acquired", { operation });
    return outcome.value;
  }

  async release(owner: LockOwner): Promise<void> {
    const current = await this.holder();
    if (current?.token !== owner.token) {
      log.warn("fleet lock no longer ours; leaving it", { operation: owner.operation });
      return;
    }
    await rm(this.lockFile, { force: true });
  }

  async withLock<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const owner = await this.acquire(operation);
    try {
      return await fn();
    } finally {
      await this.release(owner);
    }
  }
}
