import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { parseTable, stringifyTable } from "../services/table/csvTable";
import {
  importedRecordsToRows,
  importReviewedDocuments,
} from "../services/xliff/roundTripImporter";
import { parseExchangeDocument } from "../services/xliff/xliffParser";
import { sendInvalidRequest, type RouteDeps } from "./types";

const importSchema = z.object({
  csv: z.string().min(1),
  documents: z.array(z.string().min(1)).min(1),
});

const importRoutes: FastifyPluginAsync<RouteDeps> = async (fastify, deps) => {
  fastify.post("/api/import", async (request, reply) => {
    const parsed = importSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendInvalidRequest(reply, parsed.error);
    }

    const { header, records, warnings: tableWarnings } = parseTable(parsed.data.csv, deps.config.table, request.log);
    const documents = parsed.data.documents.map(parseExchangeDocument);
    const imported = importReviewedDocuments(records, documents, request.log);
    const rows = importedRecordsToRows(
      imported.records,
      imported.languages,
      deps.config.table,
      header,
    );

    return reply.send({
      csv: stringifyTable(rows),
      languages: imported.languages,
      stats: imported.stats,
      warnings: [...tableWarnings, ...imported.warnings],
    });
  });
};

export default importRoutes;
