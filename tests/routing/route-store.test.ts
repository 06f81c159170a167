import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readdir, readFile, writeFile, mkdir } from "node:fs/promises";
import { fleetPaths, type FleetPaths } from "../../src/common/config.js";
import { RouteStore } from "../../src/routing/route-store.js";
import { removeRoot, tempRoot } from "../support/fakes.js";

let root: string;
let paths: FleetPaths;
let store: RouteStore;

beforeEach(async () => {
  root = await tempRoot();
  paths = fleetPaths(root);
  store = new RouteStore(paths);
  await store.ensure();
});

afterEach(async () => {
  await removeRoot(root);
});

describe("RouteStore", () => {
  it("keeps temp candidates out of the live set until commit", async () => {
    const temp = await store.writeTemp("alpha.example", "# alpha\n");
    expect(temp).toBe(`${paths.routesDir}/.alpha.example.conf.${process.pid}.tmp`);
    expect(await store.listFiles()).toEqual([]);

    await store.commit(temp, "alpha.example");
    expect(await store.listFiles()).toEqual(["alpha.example.conf"]);
    expect(await store.read("alpha.example")).toBe("# alpha\n");
    expect(await readdir(paths.routesDir)).toEqual(["alpha.example.conf"]);
  });

  it("returns null for a domain without a fragment", async () => {
    expect(await store.read("nobody.example")).toBeNull();
  });

  it("retires a fragment into the route backups", async () => {
    await writeFile(`${paths.routesDir}/alpha.example.conf`, "# alpha\n");
    expect(await store.retire("alpha.example", "removed")).toBe(true);
    expect(await store.domains()).toEqual([]);
    const backups = await readdir(`${paths.backupDir}/routes`);
    expect(backups).toHaveLength(1);
    expect(backups[0]).toMatch(/^alpha\.example\.conf\.\d+\.removed$/);
    expect(await store.retire("alpha.example", "removed")).toBe(false);
  });

  it("restores a snapshot byte for byte", async () => {
    await writeFile(`${paths.routesDir}/alpha.example.conf`, "# alpha v1\n");
    await writeFile(`${paths.routesDir}/beta.example.conf`, "# beta\n");
    const snapshot = await store.snapshot();

    await writeFile(`${paths.routesDir}/alpha.example.conf`, "# alpha v2\n");
    await writeFile(`${paths.routesDir}/gamma.example.conf`, "# gamma\n");
    await store.restore(snapshot);

    expect(await store.listFiles()).toEqual(["alpha.example.conf", "beta.example.conf"]);
    expect(await store.read("alpha.example")).toBe("# alpha v1\n");
    expect(await store.read("beta.example")).toBe("# beta\n");
    expect((await readdir(paths.routesDir)).filter((f) => f.startsWith("."))).toEqual([]);
  });

  it("stages the merged tree with the candidate added and one domain left out", async () => {
    await writeFile(`${paths.routesDir}/alpha.example.conf`, "# alpha\n");
    await writeFile(`${paths.routesDir}/beta.example.conf`, "# beta\n");

    const tree = await store.stage(
      (glob) => `include ${glob};\n`,
      { domain: "gamma.example", text: "# gamma\n" },
      "beta.example"
    );
    expect(tree.configPath).toBe(`staging/${tree.id}/nginx.conf`);
    expect(await readFile(`${tree.dir}/nginx.conf`, "utf8")).toBe(
      `include /etc/edgefleet/staging/${tree.id}/routes/*.conf;\n`
    );
    expect([...(await store.readStaged(tree)).entries()]).toEqual([
      ["alpha.example.conf", "# alpha\n"],
      ["gamma.example.conf", "# gamma\n"]
    ]);

    await store.dropStage(tree);
    expect(await readdir(paths.stagingDir)).toEqual([]);
    expect(await store.listFiles()).toEqual(["alpha.example.conf", "beta.example.conf"]);
  });

  it("ignores hidden and non-fragment files", async () => {
    await mkdir(paths.routesDir, { recursive: true });
    await writeFile(`${paths.routesDir}/.beta.example.conf.42.tmp`, "partial");
    await writeFile(`${paths.routesDir}/README`, "notes");
    await writeFile(`${paths.routesDir}/alpha.example.conf`, "# alpha\n");
    expect(await store.domains()).toEqual(["alpha.example"]);
  });
});
