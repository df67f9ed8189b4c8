/**
 * Run one plan from the command line — run with: npm run plan -- [zipCode] [message...]
 *
 * Uses the same configuration as the server (.env / environment). Without API
 * keys it plans against the sample catalog with fallback weather.
 * Prints the PlanResult as JSON on stdout.
 */

import { env } from "../src/config/env.js";
import { logger } from "../src/config/logger.js";
import { buildPlanner } from "../src/config/planner.js";
import { close } from "../database/index.js";

function elapsed(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

const [zipCode, ...words] = process.argv.slice(2);

async function main(): Promise<number> {
  const t0 = performance.now();
  try {
    const planner = buildPlanner(env, logger);
    const result = await planner.plan({ locationKey: zipCode, userMessage: words.join(" ") });
    console.log(JSON.stringify(result, null, 2));
    logger.info({ selection: result.selection?.name ?? null, elapsed: elapsed(performance.now() - t0) }, "plan finished");
    return result.status === "completed" ? 0 : 1;
  } finally {
    await close();
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    logger.error({ err: e }, "plan run failed");
    process.exit(1);
  }
);
