// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { isErrnoCode } from "../common/errors.js";

const MARKER = "# edgefleet:";

export interface HostsEntry {
  tenant: string;
  address: string;
  names: string[];
}

function parseLine(line: string): HostsEntry | null {
  const at = line.indexOf(MARKER);
  if (at === -1) return null;
  const [address, ...names] = line.slice(0, at).trim().split(/\s+/);
  const tenant = line.slice(at + MARKER.length).trim();
  if (!address || names.length === 0 || !tenant) return null;
  return { tenant, address, names };
}

export function formatEntry(entry: HostsEntry): string {
  return `${entry.address}\t${entry.names.join(" ")} ${MARKER}${entry.tenant}`;
}

/**
 * hosts(5)-format file under the fleet root that resolves development
 * tenants' names to the edge. Point a local resolver at it (dnsmasq
 * `addn-hosts`, or append it to /etc/hosts). Lines without the marker are
 * left alone.
 */
export class LocalHostsFile {
  constructor(readonly file: string) {}

  private async lines(): Promise<string[]> {
    try {
      return (await readFile(this.file, "utf8")).split("\n").filter((line) => line.length > 0);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  private async save(lines: string[]): Promise<void> {
    await mkdir(dirname(this.file), { recursive: true });
    const temp = `${this.file}.${process.pid}.tmp`;
    await writeFile(temp, lines.length > 0 ? `${lines.join("\n")}\n` : "", "utf8");
    await rename(temp, this.file);
  }

  async list(): Promise<HostsEntry[]> {
    const entries: HostsEntry[] = [];
    for (const line of await this.lines()) {
      const entry = parseLine(line);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  /** Add or replace the tenant's line. */
  async add(entry: HostsEntry): Promise<void> {
    const kept = (await this.lines()).filter((line) => parseLine(line)?.tenant !== entry.tenant);
    await this.save([...kept, formatEntry(entry)]);
  }

  async remove(tenant: string): Promise<boolean> {
    const lines = await this.lines();
    const kept = lines.filter((line) => parseLine(line)?.tenant !== tenant);
    if (kept.length === lines.length) return false;
    await this.save(kept);
    return true;
  }
}
