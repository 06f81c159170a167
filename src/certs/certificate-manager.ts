// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { X509Certificate, createPrivateKey } from "node:crypto";
import { mkdir, readFile, readdir, readlink, rename, rm, stat, symlink, writeFile } from "node:fs/promises";
import { EDGE_MOUNT, type FleetPaths } from "../common/config.js";
import { ValidationFailed, errorMessage, isErrnoCode } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import type { Certificate, TlsRef } from "../common/types.js";
import type { CertificateIssuer } from "./issuer.js";

const log = createLogger("certs");

const DAY_MS = 86_400_000;

/** Host name the edge's catch-all TLS listener presents before any tenant exists. */
export const FALLBACK_DOMAIN = "fallback.edge.invalid";

export type CertProblem =
  | "missing"
  | "unreadable"
  | "not_yet_valid"
  | "expired"
  | "expiring"
  | "subject_mismatch"
  | "key_unreadable"
  | "key_mismatch";

export interface CertificateValidation {
  domain: string;
  ok: boolean;
  problems: CertProblem[];
  certificate?: Certificate;
}

export interface RotationResult {
  certificate: Certificate;
  release: string;
  /** Release that was active before the swap, and where it was archived. */
  previous?: string;
  previousBackup?: string;
  resumed: boolean;
}

export interface CertificateManagerOptions {
  days: number;
  renewWithinDays: number;
  now?: () => number;
}

interface PendingRotation {
  release: string;
}

/**
 * TLS material per domain under certs/<domain>/:
 *
 *   releases/<stamp>/{cert,key}.pem   installed material
 *   current -> releases/<stamp>       the single swapped link
 *   current.crt -> current/cert.pem   fixed, so crt and key always pair
 *   current.key -> current/key.pem
 *   staging/, pending                 in-flight rotation, resumable
 */
export class CertificateManager {
  private readonly now: () => number;

  constructor(
    private readonly paths: FleetPaths,
    private readonly issuer: CertificateIssuer,
    private readonly options: CertificateManagerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  private dir(domain: string): string {
    return `${this.paths.certsDir}/${domain}`;
  }

  /** Paths of the active pair as the edge sees them. */
  tlsRef(domain: string): TlsRef {
    return {
      certPath: `${EDGE_MOUNT}/certs/${domain}/current.crt`,
      keyPath: `${EDGE_MOUNT}/certs/${domain}/current.key`
    };
  }

  async domains(): Promise<string[]> {
    try {
      const entries = await readdir(this.paths.certsDir, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  /** Check a cert/key pair against `domain` without touching disk. */
  inspectMaterial(domain: string, certPem: string, keyPem: string): CertificateValidation {
    let x509: X509Certificate;
    try {
      x509 = new X509Certificate(certPem);
    } catch {
      return { domain, ok: false, problems: ["unreadable"] };
    }

    const problems: CertProblem[] = [];
    const now = this.now();
    const notAfter = new Date(x509.validTo);
    if (new Date(x509.validFrom).getTime() > now) problems.push("not_yet_valid");
    if (notAfter.getTime() <= now) {
      problems.push("expired");
    } else if (notAfter.getTime() - now < this.options.renewWithinDays * DAY_MS) {
      problems.push("expiring");
    }
    if (x509.checkHost(domain) === undefined) problems.push("subject_mismatch");

    try {
      if (!x509.checkPrivateKey(createPrivateKey(keyPem))) problems.push("key_mismatch");
    } catch {
      problems.push("key_unreadable");
    }

    const dir = this.dir(domain);
    return {
      domain,
      ok: problems.length === 0,
      problems,
      certificate: {
        domain,
        certPath: `${dir}/current.crt`,
        keyPath: `${dir}/current.key`,
        notAfter,
        fingerprint: x509.fingerprint256
      }
    };
  }

  async validate(domain: string): Promise<CertificateValidation> {
    const dir = this.dir(domain);
    let certPem: string;
    let keyPem: string;
    try {
      certPem = await readFile(`${dir}/current.crt`, "utf8");
      keyPem = await readFile(`${dir}/current.key`, "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return { domain, ok: false, problems: ["missing"] };
      throw err;
    }
    return this.inspectMaterial(domain, certPem, keyPem);
  }

  /** Current material if it is valid, otherwise freshly installed material. */
  async acquire(domain: string): Promise<Certificate> {
    const current = await this.validate(domain);
    if (current.ok && current.certificate) return current.certificate;
    log.info("acquiring certificate", { domain, problems: current.problems });
    return (await this.rotate(domain)).certificate;
  }

  private async readStaged(domain: string): Promise<boolean> {
    const staging = `${this.dir(domain)}/staging`;
    try {
      const certPem = await readFile(`${staging}/cert.pem`, "utf8");
      const keyPem = await readFile(`${staging}/key.pem`, "utf8");
      return usable(this.inspectMaterial(domain, certPem, keyPem));
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw err;
    }
  }

  private async readPending(domain: string): Promise<PendingRotation | null> {
    try {
      const parsed: unknown = JSON.parse(await readFile(`${this.dir(domain)}/pending`, "utf8"));
      if (typeof parsed === "object" && parsed !== null && "release" in parsed && typeof parsed.release === "string") {
        return { release: parsed.release };
      }
      return null;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT") || err instanceof SyntaxError) return null;
      throw err;
    }
  }

  private async writePending(domain: string, pending: PendingRotation): Promise<void> {
    const path = `${this.dir(domain)}/pending`;
    await writeFile(`${path}.tmp`, JSON.stringify(pending), "utf8");
    await rename(`${path}.tmp`, path);
  }

  private async newRelease(domain: string): Promise<string> {
    const base = new Date(this.now()).toISOString().replace(/[-:.]/g, "");
    let release = base;
    for (let n = 1; await exists(`${this.dir(domain)}/releases/${release}`); n++) {
      release = `${base}-${n}`;
    }
    return release;
  }

  private async releaseUsable(domain: string, release: string): Promise<boolean> {
    const dir = `${this.dir(domain)}/releases/${release}`;
    try {
      const certPem = await readFile(`${dir}/cert.pem`, "utf8");
      const keyPem = await readFile(`${dir}/key.pem`, "utf8");
      return usable(this.inspectMaterial(domain, certPem, keyPem));
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw err;
    }
  }

  /**
   * Issue new material into staging/ and record it as pending. Material that
   * is already staged or pending is reused, so a crashed rotation never
   * issues twice.
   */
  async stage(domain: string): Promise<string> {
    const dir = this.dir(domain);
    await mkdir(`${dir}/releases`, { recursive: true });

    const pending = await this.readPending(domain);
    if (pending && (await this.releaseUsable(domain, pending.release) || await this.readStaged(domain))) {
      return pending.release;
    }
    if (await this.readStaged(domain)) {
      const release = await this.newRelease(domain);
      await this.writePending(domain, { release });
      log.info("adopting staged certificate", { domain, release });
      return release;
    }

    const staging = `${dir}/staging`;
    await rm(staging, { recursive: true, force: true });
    await mkdir(staging, { recursive: true });
    const material = await this.issuer.issue(domain, this.options.days);
    const check = this.inspectMaterial(domain, material.certPem, material.keyPem);
    if (!usable(check)) {
      await rm(staging, { recursive: true, force: true });
      throw new ValidationFailed(`issued certificate for ${domain} is not usable`, check.problems);
    }
    await writeFile(`${staging}/cert.pem`, material.certPem, { encoding: "utf8", mode: 0o644 });
    await writeFile(`${staging}/key.pem`, material.keyPem, { encoding: "utf8", mode: 0o600 });

    const release = await this.newRelease(domain);
    await this.writePending(domain, { release });
    log.info("certificate staged", { domain, release });
    return release;
  }

  /** Move staged material into releases/ if that has not happened yet. */
  private async promote(domain: string, release: string): Promise<void> {
    const dir = this.dir(domain);
    if (await exists(`${dir}/releases/${release}`)) return;
    await rename(`${dir}/staging`, `${dir}/releases/${release}`);
  }

  private async activeRelease(domain: string): Promise<string | null> {
    const target = await linkTarget(`${this.dir(domain)}/current`);
    return target ? target.replace(/^releases\//, "") : null;
  }

  private async replaceLink(path: string, target: string): Promise<void> {
    const temp = `${path}.${process.pid}.next`;
    await rm(temp, { force: true });
    await symlink(target, temp);
    await rename(temp, path);
  }

  /** Point `current` at `release` with a single rename; the pair links follow it. */
  private async swap(domain: string, release: string): Promise<void> {
    const dir = this.dir(domain);
    await this.replaceLink(`${dir}/current`, `releases/${release}`);
    if ((await linkTarget(`${dir}/current.crt`)) !== "current/cert.pem") {
      await this.replaceLink(`${dir}/current.crt`, "current/cert.pem");
    }
    if ((await linkTarget(`${dir}/current.key`)) !== "current/key.pem") {
      await this.replaceLink(`${dir}/current.key`, "current/key.pem");
    }
  }

  /** Move every release except the active one into a timestamped backup. */
  private async archiveInactive(domain: string, active: string): Promise<Map<string, string>> {
    const dir = this.dir(domain);
    const archived = new Map<string, string>();
    for (const release of await readdir(`${dir}/releases`)) {
      if (release === active) continue;
      const backup = `${this.paths.backupDir}/certs/${domain}-${release}-${this.now()}`;
      await mkdir(`${this.paths.backupDir}/certs`, { recursive: true });
      await rename(`${dir}/releases/${release}`, backup);
      archived.set(release, backup);
    }
    return archived;
  }

  /**
   * Stage (or resume) new material, swap it in atomically, then back up the
   * previous release. Safe to re-run after a crash at any step.
   */
  async rotate(domain: string): Promise<RotationResult> {
    const dir = this.dir(domain);
    const resumed = (await this.readPending(domain)) !== null || (await this.readStaged(domain));
    const release = await this.stage(domain);

    await this.promote(domain, release);
    const previous = await this.activeRelease(domain);
    await this.swap(domain, release);
    const archived = await this.archiveInactive(domain, release);
    let undo: Pick<RotationResult, "previous" | "previousBackup"> = {};
    if (previous && previous !== release && archived.has(previous)) {
      undo = { previous, previousBackup: archived.get(previous) };
    }
    await rm(`${dir}/pending`, { force: true });

    const check = await this.validate(domain);
    if (!check.certificate || !usable(check)) {
      throw new ValidationFailed(`certificate for ${domain} failed validation after swap`, check.problems);
    }
    log.info("certificate rotated", { domain, release, previous, resumed });
    return { certificate: check.certificate, release, ...undo, resumed };
  }

  /** Put the release archived by `rotation` back in place. */
  async revert(domain: string, rotation: RotationResult): Promise<void> {
    if (!rotation.previous || !rotation.previousBackup) return;
    const dir = this.dir(domain);
    try {
      await rename(rotation.previousBackup, `${dir}/releases/${rotation.previous}`);
    } catch (err) {
      throw new ValidationFailed(`cannot restore previous certificate for ${domain}`, [errorMessage(err)]);
    }
    await this.swap(domain, rotation.previous);
    await this.archiveInactive(domain, rotation.previous);
    log.warn("certificate reverted", { domain, release: rotation.previous });
  }

  /** Domains whose active material is missing, invalid, or inside the renewal window. */
  async scanExpiring(): Promise<CertificateValidation[]> {
    const due: CertificateValidation[] = [];
    for (const domain of await this.domains()) {
      const check = await this.validate(domain);
      if (!check.ok) due.push(check);
    }
    return due;
  }
}

/** Material good enough to install: only the renewal-window warning is tolerated. */
function usable(check: CertificateValidation): boolean {
  return check.problems.every((problem) => problem === "expiring");
}

async function linkTarget(path: string): Promise<string | null> {
  try {
    return await readlink(path);
  } catch (err) {
    if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "EINVAL")) return null;
    throw err;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return false;
    throw err;
  }
}
