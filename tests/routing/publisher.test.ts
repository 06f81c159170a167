import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { readdir } from "node:fs/promises";
import { PostVerificationFailed, ReloadFailed, ValidationFailed } from "../../src/common/errors.js";
import type { NetworkAddress, RouteFragment } from "../../src/common/types.js";
import { renderFragment } from "../../src/routing/fragment.js";
import { bootEdge, removeRoot, startTenant, tempRoot, testFleet, type TestFleet } from "../support/fakes.js";

let root: string;
let fleet: TestFleet;

async function fragmentFor(name: string, target: NetworkAddress, aliases: string[] = []): Promise<RouteFragment> {
  const domain = `${name}.example`;
  await fleet.certs.acquire(domain);
  return { tenant: name, domain, aliases, target, tls: fleet.certs.tlsRef(domain), healthPath: "/health" };
}

async function liveSet(): Promise<Map<string, string>> {
  return fleet.routes.snapshot();
}

beforeEach(async () => {
  root = await tempRoot();
  fleet = testFleet(root);
  await bootEdge(fleet);
});

afterEach(async () => {
  await removeRoot(root);
});

describe("RoutePublisher.publish", () => {
  it("renames the validated fragment into place and reloads", async () => {
    const fragment = await fragmentFor("alpha", await startTenant(fleet, "alpha"));
    const outcome = await fleet.publisher.publish(fragment);

    expect(outcome).toEqual({
      domain: "alpha.example",
      text: renderFragment(fragment),
      previouslyKnown: [],
      serving: true,
      diagnostics: []
    });
    expect(await fleet.routes.read("alpha.example")).toBe(renderFragment(fragment));
    expect(fleet.proxy.reloads).toBe(1);
    expect(fleet.proxy.validations.filter((p) => p.startsWith("staging/"))).toHaveLength(1);
    expect(await readdir(fleet.paths.stagingDir)).toEqual([]);
  });

  it("leaves earlier fragments byte-identical", async () => {
    await fleet.publisher.publish(await fragmentFor("alpha", await startTenant(fleet, "alpha")));
    const before = await fleet.routes.read("alpha.example");

    const outcome = await fleet.publisher.publish(await fragmentFor("beta", await startTenant(fleet, "beta", 9091)));
    expect(outcome.previouslyKnown).toEqual(["alpha.example"]);
    expect(await fleet.routes.read("alpha.example")).toBe(before);
    expect(fleet.domainProbe.checked).toEqual(["alpha.example", "alpha.example", "alpha.example", "beta.example"]);
  });

  it("leaves the live set untouched when the edge rejects the candidate", async () => {
    await fleet.publisher.publish(await fragmentFor("alpha", await startTenant(fleet, "alpha")));
    const before = await liveSet();
    const beta = await fragmentFor("beta", await startTenant(fleet, "beta", 9091));

    fleet.proxy.rejectStaged = true;
    await expect(fleet.publisher.publish(beta)).rejects.toThrow(ValidationFailed);

    expect(await liveSet()).toEqual(before);
    expect(await readdir(fleet.paths.routesDir)).toEqual(["alpha.example.conf"]);
    expect(fleet.proxy.reloads).toBe(1);
  });

  it("rejects a server name another fragment already declares", async () => {
    await fleet.publisher.publish(await fragmentFor("alpha", await startTenant(fleet, "alpha")));
    const beta = await fragmentFor("beta", await startTenant(fleet, "beta", 9091), ["alpha.example"]);

    const failure = await fleet.publisher.publish(beta).catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(ValidationFailed);
    expect(failure instanceof ValidationFailed ? failure.details : []).toEqual([
      "server_name alpha.example declared by both alpha.example.conf and beta.example.conf"
    ]);
    expect(await fleet.routes.read("beta.example")).toBeNull();
  });

  it("never writes the final fragment for an upstream nothing holds", async () => {
    const fragment = await fragmentFor("gamma", { host: "172.30.0.250", port: 9092 });
    await expect(fleet.publisher.publish(fragment)).rejects.toThrow(ValidationFailed);
    expect(await readdir(fleet.paths.routesDir)).toEqual([]);
  });

  it("restores the previous set when the reload fails", async () => {
    await fleet.publisher.publish(await fragmentFor("alpha", await startTenant(fleet, "alpha")));
    const before = await liveSet();
    const beta = await fragmentFor("beta", await startTenant(fleet, "beta", 9091));

    fleet.proxy.failReload = 1;
    const failure = await fleet.publisher.publish(beta).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ReloadFailed);
    expect(failure instanceof ReloadFailed && failure.rolledBack).toBe(true);
    expect(await liveSet()).toEqual(before);
    expect(fleet.proxy.reloads).toBe(3);
    expect([...fleet.proxy.loaded.keys()]).toEqual(["alpha.example"]);
  });

  it("rolls back when an existing domain stops serving", async () => {
    await fleet.publisher.publish(await fragmentFor("alpha", await startTenant(fleet, "alpha")));
    const before = await liveSet();
    const beta = await fragmentFor("beta", await startTenant(fleet, "beta", 9091));

    const reload = fleet.proxy.reload.bind(fleet.proxy);
    vi.spyOn(fleet.proxy, "reload").mockImplementation(async () => {
      fleet.domainProbe.broken.add("alpha.example");
      return reload();
    });

    const failure = await fleet.publisher.publish(beta).catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(PostVerificationFailed);
    expect(failure instanceof PostVerificationFailed ? failure.details : []).toEqual(["alpha.example -> 502"]);
    expect(await liveSet()).toEqual(before);
  });

  it("does not hold later changes hostage to a route that never served", async () => {
    fleet.domainProbe.broken.add("alpha.example");
    await fleet.publisher.publish(await fragmentFor("alpha", await startTenant(fleet, "alpha")));

    const outcome = await fleet.publisher.publish(await fragmentFor("beta", await startTenant(fleet, "beta", 9091)));
    expect(outcome.previouslyKnown).toEqual([]);
    expect(outcome.serving).toBe(true);
    expect(await fleet.routes.domains()).toEqual(["alpha.example", "beta.example"]);
  });

  it("keeps a new route that is published but not yet serving", async () => {
    const fragment = await fragmentFor("alpha", await startTenant(fleet, "alpha"));
    fleet.domainProbe.broken.add("alpha.example");

    const outcome = await fleet.publisher.publish(fragment);
    expect(outcome.serving).toBe(false);
    expect(outcome.diagnostics).toEqual(["alpha.example -> 502"]);
    expect(await fleet.routes.read("alpha.example")).toBe(renderFragment(fragment));
  });

  it("can be cancelled up to the rename", async () => {
    const fragment = await fragmentFor("alpha", await startTenant(fleet, "alpha"));
    const controller = new AbortController();
    controller.abort(new Error("operator cancelled"));

    await expect(fleet.publisher.publish(fragment, { signal: controller.signal })).rejects.toThrow("operator cancelled");
    expect(await readdir(fleet.paths.routesDir)).toEqual([]);
    expect(fleet.proxy.reloads).toBe(0);
  });
});

describe("RoutePublisher.unpublish", () => {
  it("retires the fragment and reloads", async () => {
    await fleet.publisher.publish(await fragmentFor("alpha", await startTenant(fleet, "alpha")));
    expect(await fleet.publisher.unpublish("alpha.example")).toBe(true);
    expect(await fleet.routes.domains()).toEqual([]);
    expect(fleet.proxy.loaded.size).toBe(0);
    expect(fleet.proxy.reloads).toBe(2);
  });

  it("reports a domain with no live fragment", async () => {
    expect(await fleet.publisher.unpublish("nobody.example")).toBe(false);
    expect(fleet.proxy.reloads).toBe(0);
  });
});
