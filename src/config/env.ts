import "dotenv/config";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  DEFAULT_ZIP_CODE: z.string().min(1).default("10001"),
  // Nearby Search caps the radius at 50 000 m (about 31 miles).
  DEFAULT_RADIUS_MILES: z.coerce.number().positive().max(31).default(5),
  DEFAULT_MAX_PRICE: z.coerce.number().int().min(1).max(4).default(3),
  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PREFERENCE_KEY: z.string().min(1).default("liked_places"),

  WEATHER_API_KEY: optionalString,
  PLACES_API_KEY: optionalString,
  SAMPLE_CATALOG_PATH: z.string().default("./data/sample-venues.json"),

  CALENDAR_MODE: z.enum(["auto", "google", "placeholder"]).default("auto"),
  DEFAULT_CALENDAR_ID: z.string().min(1).default("primary"),
  CALENDAR_TIME_ZONE: z.string().min(1).default("America/Los_Angeles"),
  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  GOOGLE_REFRESH_TOKEN: optionalString,

  NOTIFICATION_CHANNEL: z.string().min(1).default("sms"),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  NOTIFICATION_FROM: optionalString,
  NOTIFICATION_TO: optionalString,

  MEMORY_TYPE: z.enum(["file", "postgres"]).default("file"),
  MEMORY_PATH: z.string().min(1).default("./agent_memory.json"),
  DATABASE_URL: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

/** Validate an environment map; throws with every offending key listed. */
export function loadEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((e) => `${e.path.length ? e.path.join(".") : "value"}: ${e.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  if (parsed.data.MEMORY_TYPE === "postgres" && !parsed.data.DATABASE_URL) {
    throw new Error("Invalid environment: DATABASE_URL is required when MEMORY_TYPE=postgres");
  }
  return parsed.data;
}

export const env = loadEnv(process.env);
