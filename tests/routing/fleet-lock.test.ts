import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readdir, readFile, writeFile, mkdir } from "node:fs/promises";
import { hostname } from "node:os";
import { LockUnavailable } from "../../src/common/errors.js";
import { fixedRetry } from "../../src/common/retry.js";
import { FleetLock } from "../../src/routing/fleet-lock.js";
import { removeRoot, tempRoot } from "../support/fakes.js";

let root: string;
let lockFile: string;

function lock(staleMs = 60_000): FleetLock {
  return new FleetLock(lockFile, { staleMs, wait: fixedRetry(2, 0) });
}

beforeEach(async () => {
  root = await tempRoot();
  lockFile = `${root}/state/fleet.lock`;
});

afterEach(async () => {
  await removeRoot(root);
});

describe("FleetLock", () => {
  it("records the owner and releases the file", async () => {
    const owner = await lock().acquire("deploy alpha");
    const onDisk = JSON.parse(await readFile(lockFile, "utf8"));
    expect(onDisk).toEqual({
      token: owner.token,
      pid: process.pid,
      host: hostname(),
      operation: "deploy alpha",
      acquiredAt: owner.acquiredAt
    });

    await lock().release(owner);
    expect(await readdir(`${root}/state`)).toEqual([]);
  });

  it("refuses a second holder while the first is live", async () => {
    const first = await lock().acquire("deploy alpha");
    await expect(lock().acquire("deploy beta")).rejects.toThrow(LockUnavailable);
    try {
      await lock().acquire("deploy beta");
    } catch (err) {
      expect(err instanceof LockUnavailable ? err.details : []).toEqual([
        `deploy alpha (pid ${process.pid} on ${hostname()})`
      ]);
    }
    await lock().release(first);
    const second = await lock().acquire("deploy beta");
    expect(second.operation).toBe("deploy beta");
  });

  it("takes over a lock older than the stale timeout", async () => {
    await mkdir(`${root}/state`, { recursive: true });
    await writeFile(
      lockFile,
      JSON.stringify({ token: "old", pid: process.pid, host: hostname(), operation: "deploy old", acquiredAt: 0 })
    );
    const owner = await lock().acquire("deploy alpha");
    expect(owner.operation).toBe("deploy alpha");
  });

  it("takes over a lock whose process is gone", async () => {
    await mkdir(`${root}/state`, { recursive: true });
    await writeFile(
      lockFile,
      JSON.stringify({ token: "old", pid: 2_147_483_000, host: hostname(), operation: "crashed", acquiredAt: Date.now() })
    );
    const owner = await lock().acquire("deploy alpha");
    expect((await lock().holder())?.token).toBe(owner.token);
  });

  it("treats an unreadable lock file as stale", async () => {
    await mkdir(`${root}/state`, { recursive: true });
    await writeFile(lockFile, "{not json");
    expect(await lock().holder()).toBeNull();
    await expect(lock().acquire("deploy alpha")).resolves.toMatchObject({ operation: "deploy alpha" });
  });

  it("leaves a lock another owner took over", async () => {
    const owner = await lock().acquire("deploy alpha");
    const thief = { ...owner, token: "someone-else" };
    await writeFile(lockFile, JSON.stringify(thief));
    await lock().release(owner);
    expect((await lock().holder())?.token).toBe("someone-else");
  });

  it("releases after the guarded function throws", async () => {
    await expect(
      lock().withLock("deploy alpha", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(await lock().holder()).toBeNull();
  });
});
