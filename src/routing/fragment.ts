// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import { ValidationFailed } from "../common/errors.js";
import type { RouteFragment } from "../common/types.js";

/**
 * nginx configuration as typed values. Everything rendered for the edge goes
 * through `renderDirectives`, so arguments are quoted in one place.
 */
export interface Directive {
  name: string;
  args: string[];
  block?: Directive[];
  comment?: string;
}

export const domainSchema = z
  .string()
  .max(253)
  .regex(/^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/, "must be a lower-case FQDN");

export const tenantNameSchema = z.string().regex(/^[a-z0-9][a-z0-9-]{0,62}$/, "must be a lower-case slug");

const hostSchema = z.union([z.string().ip({ version: "v4" }), domainSchema, tenantNameSchema]);

const containerPathSchema = z.string().regex(/^\/[A-Za-z0-9/_.-]+$/, "must be an absolute path");

const fragmentSchema = z.object({
  tenant: tenantNameSchema,
  domain: domainSchema,
  aliases: z.array(domainSchema),
  target: z.object({ host: hostSchema, port: z.number().int().min(1).max(65535) }),
  tls: z.object({ certPath: containerPathSchema, keyPath: containerPathSchema }),
  healthPath: z.string().regex(/^\/[A-Za-z0-9/_.-]*$/)
});

const SAFE_ARG = /^[A-Za-z0-9_.:/\-[\]$=@*~^]+$/;

function renderArg(arg: string): string {
  if (/[\u0000-\u001f\u007f]/.test(arg)) {
    throw new ValidationFailed("control characters are not allowed in configuration values", [JSON.stringify(arg)]);
  }
  if (SAFE_ARG.test(arg)) return arg;
  return `"${arg.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function renderDirectives(directives: Directive[], depth = 0): string {
  const pad = "    ".repeat(depth);
  const lines: string[] = [];
  for (const directive of directives) {
    if (directive.comment !== undefined) {
      lines.push(`${pad}# ${directive.comment.replace(/\n/g, " ")}`);
    }
    const head = [directive.name, ...directive.args.map(renderArg)].join(" ");
    if (directive.block) {
      lines.push(`${pad}${head} {`);
      const inner = renderDirectives(directive.block, depth + 1);
      if (inner.length > 0) lines.push(inner.replace(/\n$/, ""));
      lines.push(`${pad}}`);
    } else {
      lines.push(`${pad}${head};`);
    }
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

const d = (name: string, ...args: string[]): Directive => ({ name, args });
const block = (name: string, args: string[], inner: Directive[]): Directive => ({ name, args, block: inner });

function upstream(fragment: RouteFragment, path = ""): string {
  return `http://${fragment.target.host}:${fragment.target.port}${path}`;
}

export function parseFragment(input: RouteFragment): RouteFragment {
  const result = fragmentSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationFailed(
      `invalid route fragment for ${input.domain}`,
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

/** Render one tenant's routing fragment. Deterministic for equal input. */
export function renderFragment(input: RouteFragment): string {
  const fragment = parseFragment(input);
  const names = [fragment.domain, ...fragment.aliases];

  const https = block("server", [], [
    d("listen", "443", "ssl"),
    d("listen", "[::]:443", "ssl"),
    d("http2", "on"),
    d("server_name", ...names),
    d("ssl_certificate", fragment.tls.certPath),
    d("ssl_certificate_key", fragment.tls.keyPath),
    d("ssl_protocols", "TLSv1.2", "TLSv1.3"),
    block("location", ["/"], [
      d("proxy_pass", upstream(fragment)),
      d("proxy_set_header", "Host", "$host"),
      d("proxy_set_header", "X-Real-IP", "$remote_addr"),
      d("proxy_set_header", "X-Forwarded-For", "$proxy_add_x_forwarded_for"),
      d("proxy_set_header", "X-Forwarded-Proto", "$scheme"),
      d("proxy_set_header", "X-Forwarded-Host", "$host"),
      d("proxy_connect_timeout", "60s"),
      d("proxy_send_timeout", "60s"),
      d("proxy_read_timeout", "60s")
    ]),
    block("location", ["=", fragment.healthPath], [
      d("proxy_pass", upstream(fragment, fragment.healthPath)),
      d("access_log", "off")
    ])
  ]);

  const redirect = block("server", [], [
    d("listen", "80"),
    d("listen", "[::]:80"),
    d("server_name", ...names),
    d("return", "301", "https://$host$request_uri")
  ]);

  return [
    `# tenant: ${fragment.tenant}`,
    `# domain: ${fragment.domain}`,
    "",
    renderDirectives([https, redirect])
  ].join("\n");
}

export interface MainConfigOptions {
  routesGlob: string;
  fallbackCertPath: string;
  fallbackKeyPath: string;
}

/** The edge's top-level nginx.conf; includes every fragment under `routesGlob`. */
export function renderMainConfig(options: MainConfigOptions): string {
  const http = block("http", [], [
    d("include", "/etc/nginx/mime.types"),
    d("default_type", "application/octet-stream"),
    d("sendfile", "on"),
    d("keepalive_timeout", "65"),
    d("server_tokens", "off"),
    d("server_names_hash_bucket_size", "128"),
    block("server", [], [
      d("listen", "80", "default_server"),
      d("listen", "[::]:80", "default_server"),
      d("server_name", "_"),
      block("location", ["=", "/edge-health"], [d("access_log", "off"), d("return", "200", "ok")]),
      block("location", ["/"], [d("return", "444")])
    ]),
    block("server", [], [
      d("listen", "443", "ssl", "default_server"),
      d("listen", "[::]:443", "ssl", "default_server"),
      d("server_name", "_"),
      d("ssl_certificate", options.fallbackCertPath),
      d("ssl_certificate_key", options.fallbackKeyPath),
      d("return", "444")
    ]),
    d("include", options.routesGlob)
  ]);

  return renderDirectives([
    { ...d("worker_processes", "auto"), comment: "managed by edgefleet; edits are overwritten" },
    d("error_log", "/var/log/nginx/error.log", "warn"),
    block("events", [], [d("worker_connections", "1024")]),
    http
  ]);
}

/** `server_name` values declared in a rendered fragment. */
export function serverNames(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(/^\s*server_name\s+([^;]+);/gm)) {
    names.push(...match[1].trim().split(/\s+/));
  }
  return [...new Set(names)];
}

/** Tenant name recorded in a fragment header, if any. */
export function fragmentTenant(text: string): string | null {
  const match = text.match(/^# tenant: ([a-z0-9-]+)$/m);
  return match ? match[1] : null;
}

/** Upstream `host:port` a fragment routes to, if any. */
export function fragmentTarget(text: string): string | null {
  const match = text.match(/^\s*proxy_pass http:\/\/([^/;\s]+);/m);
  return match ? match[1] : null;
}

/**
 * Cross-fragment check run before the edge's own validator: every server name
 * may belong to at most one fragment.
 */
export function findNameConflicts(fragments: Map<string, string>): string[] {
  const owners = new Map<string, string>();
  const conflicts: string[] = [];
  for (const [file, text] of [...fragments.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    for (const name of serverNames(text)) {
      const owner = owners.get(name);
      if (owner && owner !== file) {
        conflicts.push(`server_name ${name} declared by both ${owner} and ${file}`);
      } else {
        owners.set(name, file);
      }
    }
  }
  return conflicts;
}
