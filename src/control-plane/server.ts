// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";
import { DeploymentError, type DeploymentErrorCode } from "../common/errors.js";
import { deployRequestSchema, summarize, type IntegrationCoordinator } from "../coordinator/integration-coordinator.js";

export type ControlPlaneCoordinator = Pick<
  IntegrationCoordinator,
  "deploy" | "remove" | "rotateCert" | "rotateDue" | "status"
>;

export interface ControlPlaneOptions {
  /** When set, every route except /health needs it as a bearer or x-admin-token. */
  token?: string;
  logger?: boolean;
}

const HTTP_STATUS: Record<DeploymentErrorCode, number> = {
  validation_failed: 422,
  lock_unavailable: 409,
  environment_unavailable: 503,
  connectivity_unverified: 502,
  reload_failed: 502,
  partial_build_failure: 502,
  runtime_failure: 502,
  post_verification_failed: 502
};

function extractAdminToken(headers: FastifyRequest["headers"]): string | undefined {
  const direct = headers["x-admin-token"];
  if (typeof direct === "string" && direct.length > 0) return direct;
  const auth = headers.authorization;
  if (typeof auth === "string" && auth.startsWith("Bearer ")) {
    return auth.slice("Bearer ".length).trim();
  }
  return undefined;
}

function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({
    error: "invalid_request",
    issues: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
  });
}

export function buildControlPlane(coordinator: ControlPlaneCoordinator, options: ControlPlaneOptions = {}): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? true });
  const token = options.token ?? "";

  app.addHook("onRequest", async (req, reply) => {
    if (!token || req.url === "/health") return;
    if (extractAdminToken(req.headers) !== token) {
      return reply.code(401).send({ error: "admin_token_required" });
    }
  });

  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof DeploymentError) {
      return reply.code(HTTP_STATUS[error.code]).send({ error: error.code, phase: error.phase ?? null, ...summarize(error) });
    }
    app.log.error(error);
    return reply.code(500).send({ error: "internal_error", message: error.message });
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/status", async () => coordinator.status());

  app.post("/tenants", async (req, reply) => {
    const body = deployRequestSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);
    const result = await coordinator.deploy(body.data);
    if (result.ok) return reply.code(201).send(result);
    const status = result.error ? HTTP_STATUS[result.error.code] : 502;
    return reply.code(status).send(result);
  });

  app.delete("/tenants/:name", async (req, reply) => {
    const params = z.object({ name: z.string().min(1) }).safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    return reply.send(await coordinator.remove(params.data.name));
  });

  app.post("/certs/:domain/rotate", async (req, reply) => {
    const params = z.object({ domain: z.string().min(1) }).safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const rotation = await coordinator.rotateCert(params.data.domain);
    return reply.send({
      domain: params.data.domain,
      release: rotation.release,
      resumed: rotation.resumed,
      notAfter: rotation.certificate.notAfter.toISOString(),
      fingerprint: rotation.certificate.fingerprint
    });
  });

  app.post("/certs/rotate-due", async () => ({ rotations: await coordinator.rotateDue() }));

  return app;
}
