import { createLogger } from "../common/logger.js";
import type { CertificateManager, CertificateValidation } from "./certificate-manager.js";

const log = createLogger("cert-expiry");

export interface ExpirySchedulerOptions {
  intervalMs?: number;
  /** Called once per scan for every domain that needs new material. */
  onDue: (check: CertificateValidation) => Promise<void>;
}

export async function runExpiryScan(
  manager: Pick<CertificateManager, "scanExpiring">,
  onDue: ExpirySchedulerOptions["onDue"]
): Promise<number> {
  const due = await manager.scanExpiring();
  for (const check of due) {
    try {
      await onDue(check);
    } catch (err) {
      log.error("renewal failed", { domain: check.domain, problems: check.problems, error: String(err) });
    }
  }
  if (due.length > 0) {
    log.info(`renewal scan found ${due.length} domain(s) due`, { domains: due.map((c) => c.domain) });
  }
  return due.length;
}

export function startExpiryScheduler(
  manager: Pick<CertificateManager, "scanExpiring">,
  options: ExpirySchedulerOptions
): NodeJS.Timeout {
  const timer = setInterval(() => {
    runExpiryScan(manager, options.onDue).catch((err: unknown) => {
      log.error("renewal scan failed", { error: String(err) });
    });
  }, options.intervalMs ?? 6 * 3_600_000);
  timer.unref();
  return timer;
}
