import Fastify, { type FastifyInstance } from "fastify";
import { DocumentSubmissionRequestSchema } from "@docsubmit/submission-contracts";
import {
  FetchHttpTransport,
  InterruptedWaitError,
  SubmissionClient,
  TransportError,
  ValidationError,
  type HttpTransport,
} from "@docsubmit/submission-client";
import { assertControlAuth } from "./auth.js";
import type { AppConfig } from "./config.js";

interface ServerDeps {
  transport?: HttpTransport;
}

export async function buildServer(config: AppConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 1_000_000,
    logger: {
      level: config.logLevel,
      transport: config.prettyLogs ? { target: "pino-pretty" } : undefined,
    },
  });

  // One client per process: every route shares the same throttle budget.
  const client = new SubmissionClient({
    endpointUrl: config.submissionEndpointUrl,
    throttle: { period: config.throttlePeriod, limit: config.throttleLimit },
    transport: deps.transport ?? new FetchHttpTransport(config.transportTimeoutMs),
    logger: app.log,
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ValidationError) {
      reply.code(400).send({ error: "invalid_request", message: error.message, details: error.details });
      return;
    }
    if (error instanceof InterruptedWaitError) {
      request.log.warn("throttle wait deadline reached");
      reply.code(503).send({ error: "throttle_wait_aborted", requestId: request.id });
      return;
    }
    if (error instanceof TransportError) {
      request.log.error({ err: error }, "upstream submission failed");
      reply.code(502).send({ error: "upstream_failed", requestId: request.id });
      return;
    }
    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: "bad_request", message: error.message });
      return;
    }
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/ready", async () => ({
    ok: true,
    endpointUrl: client.endpointUrl,
    throttle: client.throttleSnapshot(),
  }));

  app.post("/documents", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const parsed = DocumentSubmissionRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const response = await client.createDocument(parsed.data.document, parsed.data.signature, {
      acquireTimeoutMs: config.acquireTimeoutMs,
    });
    return reply.send({ response });
  });

  return app;
}
