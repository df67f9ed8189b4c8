/**
 * Test the preferences database — run with: npm run check:db
 *
 * Connects with DATABASE_URL, creates the preferences table if needed and
 * counts its rows.
 */

import { readFile } from "node:fs/promises";
import { close, getClient, query } from "../database/index.js";

function elapsed(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

async function main(): Promise<void> {
  console.log("Testing DB connection...\n");

  const t0 = performance.now();
  const client = await getClient();
  try {
    console.log(`Client connected (${elapsed(performance.now() - t0)})\n`);
    await client.query(await readFile(new URL("../database/schema.sql", import.meta.url), "utf8"));
  } finally {
    client.release();
  }

  const t1 = performance.now();
  const [row] = await query("SELECT count(*)::text AS count FROM preferences");
  console.log(`✓ preferences table OK (${elapsed(performance.now() - t1)}): ${String(row?.count ?? "0")} rows`);
  console.log("\nConnection test passed. Finished successfully.");
}

main()
  .catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  })
  .finally(() => close());
