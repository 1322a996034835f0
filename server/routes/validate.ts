import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { XLIFF_VERSIONS } from "../models/ExchangeDocument";
import { validateTableContent } from "../services/table/csvTable";
import { validateExchangeXml } from "../services/xliff/xliffParser";
import { sendInvalidRequest, type RouteDeps } from "./types";

const validateSchema = z
  .object({
    csv: z.string().optional(),
    xliff: z.string().optional(),
    version: z.enum(XLIFF_VERSIONS).optional(),
  })
  .refine((body) => body.csv !== undefined || body.xliff !== undefined, {
    message: "csv or xliff is required",
  });

const validateRoutes: FastifyPluginAsync<RouteDeps> = async (fastify, deps) => {
  fastify.post("/api/validate", async (request, reply) => {
    const parsed = validateSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendInvalidRequest(reply, parsed.error);
    }
    const { csv, xliff, version } = parsed.data;
    const table = csv === undefined ? null : validateTableContent(csv, deps.config.table);
    const exchange = xliff === undefined ? null : validateExchangeXml(xliff, version);

    return reply.send({
      valid: (table?.valid ?? true) && (exchange?.valid ?? true),
      table,
      xliff: exchange,
    });
  });
};

export default validateRoutes;
