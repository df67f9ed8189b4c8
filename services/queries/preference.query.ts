/**
 * Preference queries — read and append labels in the `preferences` table.
 *
 * Schema (database/schema.sql): key, value, created_at; primary key (key, value).
 * The primary key makes the append idempotent: a repeated (key, value) insert
 * hits ON CONFLICT DO NOTHING and returns no row.
 */

import { z } from "zod";
import type { QueryFn } from "../../database/index.js";

// ─── Hard limits ────────────────────────────────────────────────────────────

/** Maximum labels read per key. */
export const PREFERENCE_HARD_LIMIT = 500;

// ─── Query builders ─────────────────────────────────────────────────────────

export function buildFetchPreferencesSql(key: string): { text: string; values: unknown[] } {
  return {
    text: `
SELECT value
FROM preferences
WHERE key = $1
ORDER BY created_at, value
LIMIT $2;
`.trim(),
    values: [key, PREFERENCE_HARD_LIMIT],
  };
}

export function buildInsertPreferenceSql(key: string, value: string): { text: string; values: unknown[] } {
  return {
    text: `
INSERT INTO preferences (key, value)
VALUES ($1, $2)
ON CONFLICT (key, value) DO NOTHING
RETURNING value;
`.trim(),
    values: [key, value],
  };
}

const PreferenceRowsSchema = z.array(z.object({ value: z.string() }));

// ─── Runners ────────────────────────────────────────────────────────────────

export async function runFetchPreferences(run: QueryFn, key: string): Promise<string[]> {
  const { text, values } = buildFetchPreferencesSql(key);
  const rows = PreferenceRowsSchema.parse(await run(text, values));
  return rows.map((r) => r.value);
}

/** True when a new row was written, false when the pair already existed. */
export async function runInsertPreference(run: QueryFn, key: string, value: string): Promise<boolean> {
  const { text, values } = buildInsertPreferenceSql(key, value);
  const rows = await run(text, values);
  return rows.length > 0;
}
