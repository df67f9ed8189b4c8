import { pino, type Logger } from "pino";
import { env } from "./env.js";

/** Shared logger; Fastify is given this instance so request and pipeline logs share one stream. */
export const logger: Logger = pino({
  name: "leisure-planner",
  level: env.LOG_LEVEL,
});
