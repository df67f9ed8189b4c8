import { readFile } from "node:fs/promises";
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import type { Logger } from "pino";
import type { Planner } from "../services/planner/planner.service.js";
import { createPlan } from "./modules/plan.controller.js";
import type { HealthResponse } from "./modules/plan.types.js";
import { plannerPlugin } from "./plugins/planner.plugin.js";

export const SERVICE_NAME = "leisure-planner";

/** Resolved against the working directory, like the sample catalog. */
export const HOME_PAGE_PATH = "./public/index.html";

export interface AppOptions {
  planner: Planner;
  logger: Logger;
  homePagePath?: string;
}

export async function buildApp({ planner, logger, homePagePath = HOME_PAGE_PATH }: AppOptions): Promise<FastifyInstance> {
  const homePage = await readFile(homePagePath, "utf8");
  const loggerInstance: FastifyBaseLogger = logger;
  const fastify = Fastify({ loggerInstance });

  await fastify.register(plannerPlugin, { planner });

  fastify.get("/", function (_, reply) {
    reply.type("text/html; charset=utf-8").send(homePage);
  });

  fastify.get("/health", function (_, reply) {
    const body: HealthResponse = { status: "healthy", service: SERVICE_NAME };
    reply.send(body);
  });

  fastify.post<{ Body: unknown }>("/plan", async function (request, reply) {
    // Raw body; Zod is the single source of validation and defaults.
    const result = await createPlan(fastify.planner, request.body);
    return reply.status(result.status).send(result.body);
  });

  return fastify;
}
