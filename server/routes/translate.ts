import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { XLIFF_VERSIONS } from "../models/ExchangeDocument";
import { countWarnings } from "../services/errors";
import { parseTable } from "../services/table/csvTable";
import { runTranslatePipeline } from "../services/translationJob";
import { sendInvalidRequest, type RouteDeps } from "./types";

const translateSchema = z.object({
  csv: z.string().min(1),
  sourceLang: z.string().trim().min(1).default("en"),
  targetLangs: z.array(z.string().trim().min(1)).min(1),
  version: z.enum(XLIFF_VERSIONS).default("1.2"),
  lqa: z.boolean().default(false),
  batchSize: z.number().int().positive().optional(),
});

const translateRoutes: FastifyPluginAsync<RouteDeps> = async (fastify, deps) => {
  fastify.post("/api/translate", async (request, reply) => {
    const parsed = translateSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendInvalidRequest(reply, parsed.error);
    }
    const body = parsed.data;

    const { records, warnings: tableWarnings } = parseTable(body.csv, deps.config.table, request.log);
    const output = await runTranslatePipeline({
      records,
      config: deps.config,
      client: deps.agents.createTranslationClient(),
      evaluator: body.lqa ? deps.agents.createEvaluator() : null,
      sourceLang: body.sourceLang,
      targetLangs: body.targetLangs,
      version: body.version,
      batchSize: body.batchSize,
      concurrency: deps.concurrency,
      logger: request.log,
    });

    const warnings = [...tableWarnings, ...output.warnings];
    return reply.send({
      version: output.version,
      languages: output.languages.map((language) => ({
        targetLang: language.targetLang,
        xliff: language.xml,
        evaluations: language.evaluations,
      })),
      stats: output.stats,
      rejected: output.rejected.map((record) => record.id),
      cancelled: output.cancelled,
      warnings,
      warningCounts: countWarnings(warnings),
    });
  });
};

export default translateRoutes;
