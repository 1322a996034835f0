import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import { loadEnv, type AppEnv } from "./config/env";
import { loadPipelineConfig, type PipelineConfig } from "./config/pipelineConfig";
import evaluateRoutes from "./routes/evaluate";
import healthRoutes from "./routes/health";
import importRoutes from "./routes/importReview";
import translateRoutes from "./routes/translate";
import validateRoutes from "./routes/validate";
import { createOpenAiAgentFactory, type AgentFactory } from "./services/agentFactory";
import { isPipelineError, SchemaError, type PipelineErrorCode } from "./services/errors";

const CLIENT_ERROR_CODES = new Set<PipelineErrorCode>([
  "schema_error",
  "config_error",
  "exchange_format_error",
]);

const BODY_LIMIT = 20 * 1024 * 1024;

export interface BuildServerOptions {
  config: PipelineConfig;
  agents: AgentFactory;
  concurrency?: number;
  /** `true` or pino options; tests pass `false`. */
  logger?: boolean | { level: string };
  corsOrigin?: string;
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true, bodyLimit: BODY_LIMIT });

  await app.register(cors, {
    origin: options.corsOrigin ?? false,
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isPipelineError(error) && CLIENT_ERROR_CODES.has(error.code)) {
      request.log.warn({ err: error }, "Rejected request");
      const details = error instanceof SchemaError ? error.details : [];
      return reply.status(400).send({
        error: { code: error.code, message: error.message, ...(details.length ? { details } : {}) },
      });
    }
    if (error.validation || (error.statusCode && error.statusCode < 500)) {
      return reply.status(error.statusCode ?? 400).send({
        error: { code: "invalid_request", message: error.message },
      });
    }
    request.log.error({ err: error }, "Request failed");
    return reply.status(500).send({
      error: {
        code: isPipelineError(error) ? error.code : "internal_error",
        message: error.message,
      },
    });
  });

  const deps = {
    config: options.config,
    agents: options.agents,
    concurrency: options.concurrency,
  };
  await app.register(healthRoutes, deps);
  await app.register(translateRoutes, deps);
  await app.register(evaluateRoutes, deps);
  await app.register(importRoutes, deps);
  await app.register(validateRoutes, deps);

  return app;
}

export async function startServer(env: AppEnv = loadEnv()): Promise<FastifyInstance> {
  const config = await loadPipelineConfig(env.TRANSLATION_CONFIG_DIR);
  const app = await buildServer({
    config,
    agents: createOpenAiAgentFactory(env, config),
    concurrency: env.LANGUAGE_CONCURRENCY,
    logger: { level: env.LOG_LEVEL },
    corsOrigin: env.CLIENT_ORIGIN,
  });

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`[STARTUP] Server started on port ${env.PORT}`);
  } catch (err) {
    app.log.error(err, "[FATAL] Failed to start server");
    throw err;
  }
  return app;
}

export * from "./services/errors";
export { loadPipelineConfig, type PipelineConfig } from "./config/pipelineConfig";
export { readTable, writeTable } from "./services/table/csvTable";
export { runTranslationJob } from "./services/translation/batchOrchestrator";
export { runTranslatePipeline } from "./services/translationJob";
export { scoreDimensions } from "./services/quality/scoring";
export { generateExchangeXml, writeExchangeFile } from "./services/xliff/xliffGenerator";
export { parseExchangeDocument } from "./services/xliff/xliffParser";
export { importReviewedDocuments } from "./services/xliff/roundTripImporter";
