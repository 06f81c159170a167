// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EnvironmentUnavailable, ValidationFailed, errorMessage } from "../common/errors.js";
import { runCommand, type CommandRunner } from "../common/exec.js";
import type { CommandResult } from "../common/types.js";

export interface IssuedMaterial {
  certPem: string;
  keyPem: string;
}

export interface CertificateIssuer {
  issue(domain: string, days: number): Promise<IssuedMaterial>;
}

/** Self-signed RSA material for `domain` and `www.domain` via the openssl CLI. */
export class OpensslIssuer implements CertificateIssuer {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async issue(domain: string, days: number): Promise<IssuedMaterial> {
    const workDir = await mkdtemp(join(tmpdir(), "edgefleet-cert-"));
    const keyPath = join(workDir, "key.pem");
    const certPath = join(workDir, "cert.pem");
    try {
      let result: CommandResult;
      try {
        result = await this.run("openssl", [
          "req", "-x509", "-nodes",
          "-newkey", "rsa:2048",
          "-sha256",
          "-days", String(days),
          "-subj", `/CN=${domain}`,
          "-addext", `subjectAltName=DNS:${domain},DNS:www.${domain}`,
          "-keyout", keyPath,
          "-out", certPath
        ]);
      } catch (err) {
        throw new EnvironmentUnavailable("openssl is not available", [errorMessage(err)]);
      }
      if (result.exitCode !== 0) {
        throw new ValidationFailed(`certificate issuance failed for ${domain}`, [result.stderr.trim()]);
      }
      return {
        certPem: await readFile(certPath, "utf8"),
        keyPem: await readFile(keyPath, "utf8")
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
