// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { PostVerificationFailed, ReloadFailed, ValidationFailed, errorMessage } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { retry, type AttemptResult, type RetryPolicy } from "../common/retry.js";
import type { RouteFragment } from "../common/types.js";
import type { DomainProbe } from "../connectivity/probes.js";
import type { EdgeStateDetector } from "../edge/state-detector.js";
import type { EdgeProxy } from "../proxy/edge-proxy.js";
import { findNameConflicts, renderFragment } from "./fragment.js";
import type { RouteSnapshot, RouteStore } from "./route-store.js";

const log = createLogger("publisher");

export interface PublishOutcome {
  domain: string;
  text: string;
  /** Live domains that answered through the edge before the change; only these gate rollback. */
  previouslyKnown: string[];
  /** Whether the new domain itself answered through the edge after reload. */
  serving: boolean;
  diagnostics: string[];
}

export interface PublishOptions {
  signal?: AbortSignal;
  /** Runs after the merged tree validated and before the rename. */
  onValidated?: () => Promise<void>;
}

export interface ReloadCheck {
  ok: boolean;
  diagnostics: string[];
}

function domainsOf(snapshot: RouteSnapshot): string[] {
  return [...snapshot.keys()].map((file) => file.slice(0, -".conf".length));
}

/**
 * Publishes routing changes so the live routes directory only ever moves
 * between validated states: temp write, whole-tree validation, one rename,
 * graceful reload, and restoration of the previous set if the reload fails or
 * a domain that was serving before the change stops.
 */
export class RoutePublisher {
  constructor(
    private readonly store: RouteStore,
    private readonly proxy: EdgeProxy,
    private readonly detector: EdgeStateDetector,
    private readonly domainProbe: DomainProbe,
    private readonly renderMain: (routesGlob: string) => string,
    private readonly verifyPolicy: RetryPolicy
  ) {}

  /** Check the merged tree (live fragments ± the change) with the edge's own checker. */
  async validateCandidate(candidate?: { domain: string; text: string }, without?: string): Promise<void> {
    const tree = await this.store.stage(this.renderMain, candidate, without);
    try {
      const conflicts = findNameConflicts(await this.store.readStaged(tree));
      if (conflicts.length > 0) {
        throw new ValidationFailed("routing candidate declares conflicting server names", conflicts);
      }
      const report = await this.proxy.validate(tree.configPath);
      if (!report.ok) {
        throw new ValidationFailed("edge rejected the candidate configuration", report.diagnostics);
      }
    } finally {
      await this.store.dropStage(tree);
    }
  }

  async signalReload(): Promise<ReloadCheck> {
    const result = await this.proxy.reload();
    if (result.exitCode !== 0) {
      return { ok: false, diagnostics: [`reload exited ${result.exitCode}`, result.stderr.trim()].filter(Boolean) };
    }
    const state = await this.detector.detect();
    if (state.state !== "running_healthy") {
      return { ok: false, diagnostics: [`edge ${state.state} after reload`, ...state.diagnostics] };
    }
    return { ok: true, diagnostics: [] };
  }

  /** Put `snapshot` back and reload again; reports whether that reload held. */
  private async rollback(snapshot: RouteSnapshot, why: string): Promise<ReloadCheck> {
    log.error("rolling back routing change", { why, restoring: [...snapshot.keys()] });
    await this.store.restore(snapshot);
    const again = await this.signalReload();
    if (!again.ok) {
      log.error("reload after rollback failed; edge needs attention", { diagnostics: again.diagnostics });
    }
    return again;
  }

  private async reloadOrRollback(snapshot: RouteSnapshot, change: string): Promise<void> {
    let check: ReloadCheck;
    try {
      check = await this.signalReload();
    } catch (err) {
      check = { ok: false, diagnostics: [errorMessage(err)] };
    }
    if (check.ok) return;
    const after = await this.rollback(snapshot, `reload failed after ${change}`);
    throw new ReloadFailed(`edge reload failed after ${change}`, [...check.diagnostics, ...after.diagnostics], after.ok);
  }

  async serving(domain: string): Promise<{ ok: boolean; detail: string }> {
    const outcome = await retry(this.verifyPolicy, async (): Promise<AttemptResult<string>> => {
      const result = await this.domainProbe.serves(domain);
      return result.ok ? { ok: true, value: result.detail } : { ok: false, reason: result.detail };
    });
    return outcome.ok
      ? { ok: true, detail: outcome.value }
      : { ok: false, detail: outcome.reasons[outcome.reasons.length - 1] ?? `${domain} not serving` };
  }

  /** The subset of `domains` answering right now, one check each. */
  private async servingNow(domains: string[]): Promise<string[]> {
    const serving: string[] = [];
    for (const domain of domains) {
      const result = await this.domainProbe.serves(domain);
      if (result.ok) serving.push(domain);
      else log.debug("live route not serving before change", { domain, detail: result.detail });
    }
    return serving;
  }

  /**
   * Publish one tenant fragment. Cancellable until the rename; after it the
   * change is only undone by rollback here or by `unpublish`.
   */
  async publish(fragment: RouteFragment, options: PublishOptions = {}): Promise<PublishOutcome> {
    const text = renderFragment(fragment);
    const domain = fragment.domain;
    const snapshot = await this.store.snapshot();
    const previouslyKnown = await this.servingNow(domainsOf(snapshot).filter((known) => known !== domain));

    const temp = await this.store.writeTemp(domain, text);
    try {
      await this.validateCandidate({ domain, text });
      options.signal?.throwIfAborted();
      await options.onValidated?.();
    } catch (err) {
      await this.store.discard(temp);
      throw err;
    }

    await this.store.commit(temp, domain);
    await this.reloadOrRollback(snapshot, `publishing ${domain}`);

    const broken: string[] = [];
    for (const known of previouslyKnown) {
      const check = await this.serving(known);
      if (!check.ok) broken.push(check.detail);
    }
    if (broken.length > 0) {
      const after = await this.rollback(snapshot, `existing domains stopped serving after publishing ${domain}`);
      throw new PostVerificationFailed(`publishing ${domain} broke existing routes; rolled back`, [
        ...broken,
        ...after.diagnostics
      ]);
    }

    const own = await this.serving(domain);
    if (!own.ok) {
      log.warn("new route published but not serving yet", { domain, detail: own.detail });
    }
    return { domain, text, previouslyKnown, serving: own.ok, diagnostics: own.ok ? [] : [own.detail] };
  }

  /** Compensating removal of a published route. */
  async unpublish(domain: string): Promise<boolean> {
    const snapshot = await this.store.snapshot();
    if (!snapshot.has(`${domain}.conf`)) return false;
    await this.validateCandidate(undefined, domain);
    await this.store.retire(domain, "removed");
    await this.reloadOrRollback(snapshot, `removing ${domain}`);
    return true;
  }
}
