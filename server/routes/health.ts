import type { FastifyPluginAsync } from "fastify";

import type { RouteDeps } from "./types";

const healthRoutes: FastifyPluginAsync<RouteDeps> = async (fastify, deps) => {
  fastify.get("/api/health", async (_request, reply) => {
    reply.send({
      status: "ok",
      languages: Object.keys(deps.config.languages),
      dimensions: deps.config.quality.dimensions.map((dim) => dim.name),
    });
  });
};

export default healthRoutes;
