import { fastifyCors } from "@fastify/cors";
import { fastify, type FastifyError } from "fastify";
import { z } from "zod";
import {
  getCategoryAnalysis,
  getModelPerformance,
  getOverviewStats,
  getQualityInsights,
  getTemporalAnalysis,
  getUserAggregations,
} from "./analytics.js";
import type { Dataset } from "./db.js";
import type { Logger } from "./logger.js";
import { normalize } from "./normalize.js";
import { formatIssues } from "./schema.js";
import { analyzePrompt } from "./scoring.js";
import { TEMPORAL_PERIODS } from "./types.js";

export interface ServerOptions {
  dataset: Dataset;
  logger: Logger;
  corsOrigin: string[];
}

const usersQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).default(10),
});

const temporalQuerySchema = z.object({
  period: z.enum(["hourly", "daily", "weekly"]).default("daily"),
});

const analyzeBodySchema = z.object({
  prompt: z.string(),
});

function badRequest(error: z.ZodError) {
  return { error: formatIssues(error).join("; ") };
}

/** Build the HTTP app over an already-loaded dataset. Does not listen. */
export async function buildServer({ dataset, logger, corsOrigin }: ServerOptions) {
  const app = fastify({ loggerInstance: logger });

  await app.register(fastifyCors, {
    origin: corsOrigin,
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    const status = err.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err }, "request failed");
    }
    return reply.status(status).send({ error: err.message });
  });

  app.get("/", async () => {
    return { message: "Prompt analytics API is running" };
  });

  // Health check
  app.get("/health", async () => {
    return { status: "ok", records: dataset.size };
  });

  // Analytics endpoints
  app.get("/analytics/overview", async () => {
    return normalize(getOverviewStats(dataset));
  });

  app.get("/analytics/users", async (request, reply) => {
    const query = usersQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(badRequest(query.error));
    }
    return normalize(getUserAggregations(dataset, query.data.limit));
  });

  app.get("/analytics/temporal", async (request, reply) => {
    const query = temporalQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({
        error: `${formatIssues(query.error).join("; ")} (expected one of ${TEMPORAL_PERIODS.join(", ")})`,
      });
    }
    return normalize(getTemporalAnalysis(dataset, query.data.period));
  });

  app.get("/analytics/models", async () => {
    return normalize(getModelPerformance(dataset));
  });

  app.get("/analytics/categories", async () => {
    return normalize(getCategoryAnalysis(dataset));
  });

  app.get("/analytics/quality", async () => {
    return normalize(getQualityInsights(dataset));
  });

  // Prompt scoring
  app.post("/analyze", async (request, reply) => {
    const body = analyzeBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send(badRequest(body.error));
    }
    return normalize(analyzePrompt(body.data.prompt));
  });

  return app;
}
