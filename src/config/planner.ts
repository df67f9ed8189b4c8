import type { Logger } from "pino";
import { query } from "../../database/index.js";
import { createCalendarWriter } from "../../services/collaborators/calendar.writer.js";
import { createNotifier } from "../../services/collaborators/notifier.js";
import { GooglePlacesCatalog } from "../../services/collaborators/places.client.js";
import { FilePreferenceStore, PostgresPreferenceStore } from "../../services/collaborators/preference.store.js";
import { SampleCatalog } from "../../services/collaborators/sample.catalog.js";
import { WeatherApiClient } from "../../services/collaborators/weather.client.js";
import { createPlanner, type Planner } from "../../services/planner/planner.service.js";
import type { CatalogSearch, PlannerCollaborators, PlannerSettings, PreferenceStore } from "../../services/planner/types.js";
import type { Env } from "./env.js";

export function plannerSettings(env: Env): PlannerSettings {
  return {
    defaultLocationKey: env.DEFAULT_ZIP_CODE,
    radiusMiles: env.DEFAULT_RADIUS_MILES,
    maxPrice: env.DEFAULT_MAX_PRICE,
    calendarId: env.DEFAULT_CALENDAR_ID,
    notificationChannel: env.NOTIFICATION_CHANNEL,
    preferenceKey: env.PREFERENCE_KEY,
    collaboratorTimeoutMs: env.COLLABORATOR_TIMEOUT_MS,
  };
}

function catalogFor(env: Env, logger: Logger): CatalogSearch {
  if (env.PLACES_API_KEY) {
    return new GooglePlacesCatalog({ apiKey: env.PLACES_API_KEY, timeoutMs: env.COLLABORATOR_TIMEOUT_MS, logger });
  }
  logger.warn("PLACES_API_KEY not set; searching the sample catalog");
  return new SampleCatalog(env.SAMPLE_CATALOG_PATH);
}

function preferencesFor(env: Env, logger: Logger): PreferenceStore {
  return env.MEMORY_TYPE === "postgres"
    ? new PostgresPreferenceStore(query, logger)
    : new FilePreferenceStore(env.MEMORY_PATH, logger);
}

/** Choose every collaborator strategy once, from configuration. */
export function plannerCollaborators(env: Env, logger: Logger): PlannerCollaborators {
  const timeoutMs = env.COLLABORATOR_TIMEOUT_MS;
  return {
    weather: new WeatherApiClient({ apiKey: env.WEATHER_API_KEY, timeoutMs }),
    catalog: catalogFor(env, logger.child({ collaborator: "catalog" })),
    preferences: preferencesFor(env, logger.child({ collaborator: "preferences" })),
    calendar: createCalendarWriter(
      {
        mode: env.CALENDAR_MODE,
        environment: env.NODE_ENV === "production" ? "production" : "local",
        credentials: {
          clientId: env.GOOGLE_CLIENT_ID,
          clientSecret: env.GOOGLE_CLIENT_SECRET,
          refreshToken: env.GOOGLE_REFRESH_TOKEN,
        },
        timeZone: env.CALENDAR_TIME_ZONE,
        timeoutMs,
      },
      logger.child({ collaborator: "calendar" })
    ),
    notifier: createNotifier(
      {
        channel: env.NOTIFICATION_CHANNEL,
        accountSid: env.TWILIO_ACCOUNT_SID,
        authToken: env.TWILIO_AUTH_TOKEN,
        from: env.NOTIFICATION_FROM,
        to: env.NOTIFICATION_TO,
        timeoutMs,
      },
      logger.child({ collaborator: "notifier" })
    ),
  };
}

export function buildPlanner(env: Env, logger: Logger): Planner {
  return createPlanner({
    settings: plannerSettings(env),
    collaborators: plannerCollaborators(env, logger),
    logger,
  });
}
