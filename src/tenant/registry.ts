// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { isErrnoCode } from "../common/errors.js";
import type { TenantRecord } from "../common/types.js";

const phaseSchema = z.enum([
  "requested",
  "runtime_starting",
  "runtime_verified",
  "cert_ready",
  "route_validated",
  "published",
  "verified"
]);

const recordSchema = z.object({
  name: z.string(),
  domain: z.string(),
  listenPort: z.number().int(),
  networkName: z.string(),
  runtimeHandle: z.string(),
  environment: z.enum(["development", "production"]),
  lifecycleState: z.union([phaseSchema, z.literal("failed")]),
  failedPhase: phaseSchema.optional(),
  lastError: z.string().optional(),
  target: z.object({ host: z.string(), port: z.number().int() }).optional(),
  createdAt: z.number(),
  updatedAt: z.number()
});

const fileSchema = z.object({ version: z.literal(1), tenants: z.array(recordSchema) });

/**
 * Tenant records for the fleet, one JSON document written via temp file +
 * rename. Writes are serialized per process; cross-process writers hold the
 * fleet lock.
 */
export class TenantRegistry {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly file: string) {}

  async list(): Promise<TenantRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.file, "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw err;
    }
    return fileSchema.parse(JSON.parse(raw)).tenants;
  }

  async get(name: string): Promise<TenantRecord | undefined> {
    return (await this.list()).find((tenant) => tenant.name === name);
  }

  async findByDomain(domain: string): Promise<TenantRecord | undefined> {
    return (await this.list()).find((tenant) => tenant.domain === domain);
  }

  private write(mutate: (tenants: TenantRecord[]) => TenantRecord[]): Promise<void> {
    const next = this.writeChain.then(async () => {
      const tenants = mutate(await this.list()).sort((a, b) => a.name.localeCompare(b.name));
      await mkdir(dirname(this.file), { recursive: true });
      const temp = `${this.file}.${process.pid}.tmp`;
      await writeFile(temp, `${JSON.stringify({ version: 1, tenants }, null, 2)}\n`, "utf8");
      await rename(temp, this.file);
    });
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  put(record: TenantRecord): Promise<void> {
    return this.write((tenants) => [...tenants.filter((t) => t.name !== record.name), record]);
  }

  delete(name: string): Promise<void> {
    return this.write((tenants) => tenants.filter((t) => t.name !== name));
  }
}
