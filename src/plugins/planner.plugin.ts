import fp from "fastify-plugin";
import { close } from "../../database/index.js";
import type { Planner } from "../../services/planner/planner.service.js";

declare module "fastify" {
  interface FastifyInstance {
    planner: Planner;
  }
}

export interface PlannerPluginOptions {
  planner: Planner;
}

export const plannerPlugin = fp<PlannerPluginOptions>(async function plannerPlugin(app, opts) {
  app.decorate("planner", opts.planner);

  app.addHook("onClose", async () => {
    await close();
  });
});
