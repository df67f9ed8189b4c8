import { buildApp } from "./app.js";
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { buildPlanner } from "./config/planner.js";

const fastify = await buildApp({ planner: buildPlanner(env, logger), logger });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error(err);
        process.exit(1);
      }
    );
  });
}

fastify.listen({ port: env.PORT, host: env.HOST }, function (err) {
  if (err) {
    fastify.log.error(err);
    process.exit(1);
  }
});
