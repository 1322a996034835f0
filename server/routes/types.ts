import type { FastifyReply } from "fastify";
import type { z } from "zod";

import type { PipelineConfig } from "../config/pipelineConfig";
import type { AgentFactory } from "../services/agentFactory";

export interface RouteDeps {
  config: PipelineConfig;
  agents: AgentFactory;
  /** Target languages translated at the same time. */
  concurrency?: number;
}

export function sendInvalidRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.status(400).send({
    error: {
      code: "invalid_request",
      message: "Invalid request payload",
      issues: error.issues,
    },
  });
}
