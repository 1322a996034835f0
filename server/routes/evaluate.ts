import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { requireLanguage } from "../config/pipelineConfig";
import { scoreDimensions } from "../services/quality/scoring";
import { sendInvalidRequest, type RouteDeps } from "./types";

const evaluateSchema = z.object({
  sourceText: z.string().min(1),
  translatedText: z.string(),
  targetLang: z.string().trim().min(1),
  context: z.string().nullish(),
});

const evaluateRoutes: FastifyPluginAsync<RouteDeps> = async (fastify, deps) => {
  fastify.post("/api/evaluate", async (request, reply) => {
    const parsed = evaluateSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendInvalidRequest(reply, parsed.error);
    }
    const { sourceText, translatedText, targetLang, context } = parsed.data;
    requireLanguage(deps.config, targetLang);

    const scores = await deps.agents
      .createEvaluator()
      .evaluate(sourceText, translatedText, targetLang, context);
    return reply.send(scoreDimensions(scores, deps.config.quality));
  });
};

export default evaluateRoutes;
